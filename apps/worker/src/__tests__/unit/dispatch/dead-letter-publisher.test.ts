import { describe, it, expect } from "vitest";
import { ChannelDeadLetterSink, deadLetterSubject } from "../../../dispatch/dead-letter-publisher.js";
import { DeadLetterWriteError } from "../../../errors.js";
import type { DeadLetterRecord } from "../../../types/index.js";
import { FakePublisher } from "../../helpers/channel-fakes.js";

const record: DeadLetterRecord = {
  originalItem: { id: "42", groupKey: "north", enqueuedAt: "2024-03-01T10:00:00.000Z" },
  failureReason: "HTTP 422",
  failureType: "RemotePermanent",
  attempts: 1,
  timestamp: "2024-03-01T10:05:00.000Z",
  originalChannel: "invoices.process.42",
  originalChannelOffset: 17,
};

describe("deadLetterSubject", () => {
  it("should partition records by failure type", () => {
    expect(deadLetterSubject(record)).toBe("invoices.dlq.RemotePermanent");
  });
});

describe("ChannelDeadLetterSink", () => {
  it("should publish the record with a per-message dedupe id", async () => {
    const publisher = new FakePublisher();
    const sink = new ChannelDeadLetterSink(publisher, 2000);

    await sink.publish(record);

    const [message] = publisher.published;
    expect(message.subject).toBe("invoices.dlq.RemotePermanent");
    expect(message.options).toEqual({
      key: "42",
      msgId: "dlq-42-17",
      headers: { "X-Failure-Type": "RemotePermanent" },
      timeoutMs: 2000,
    });
    expect(publisher.decoded(0)).toEqual(record);
  });

  it("should skip the dedupe id when the offset is unknown", async () => {
    const publisher = new FakePublisher();
    const { originalChannelOffset: _offset, ...withoutOffset } = record;

    await new ChannelDeadLetterSink(publisher, 2000).publish(withoutOffset);

    expect(publisher.published[0].options.msgId).toBeUndefined();
  });

  it("should wrap publish failures", async () => {
    const publisher = new FakePublisher();
    publisher.failuresLeft = 1;

    const error = await new ChannelDeadLetterSink(publisher, 2000).publish(record).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeadLetterWriteError);
    expect(error).toHaveProperty("message", "Dead-letter write failed for invoice 42: nats down");
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import { Dispatcher, dispatchMessageId, processSubject } from "../../../dispatch/dispatcher.js";
import { LocalDeadLetterSink } from "../../../dispatch/local-dead-letter.js";
import { InstantDelayProvider } from "../../../domain/utils/retry.js";
import { ChannelUnavailableError } from "../../../errors.js";
import { withTraceAsync } from "../../../logger.js";
import type { WorkItem } from "../../../types/index.js";
import { FakePublisher } from "../../helpers/channel-fakes.js";

const item: WorkItem = { id: "42", groupKey: "north", enqueuedAt: "2024-03-01T10:00:00.000Z", status: "NOT_SIGNED" };

describe("processSubject", () => {
  it("should put the key under the process prefix", () => {
    expect(processSubject("42")).toBe("invoices.process.42");
  });

  it("should replace characters NATS reserves in subject tokens", () => {
    expect(processSubject("a.b c*>")).toBe("invoices.process.a_b_c__");
  });
});

describe("dispatchMessageId", () => {
  it("should combine invoice id and run id", () => {
    expect(dispatchMessageId(item, "run-1")).toBe("invoice-42-run-1");
  });
});

describe("Dispatcher", () => {
  let publisher: FakePublisher;
  let sink: LocalDeadLetterSink;
  let delays: InstantDelayProvider;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    publisher = new FakePublisher();
    sink = new LocalDeadLetterSink(10);
    delays = new InstantDelayProvider();
    dispatcher = new Dispatcher(
      publisher,
      sink,
      { publishTimeoutMs: 5000, publishMaxAttempts: 3, publishRetryDelayMs: 100 },
      delays
    );
  });

  it("should publish the encoded item keyed by invoice id", async () => {
    const result = await dispatcher.enqueue(item, "run-1");

    expect(result).toEqual({ ok: true, sequence: 1, duplicate: false });
    expect(publisher.published).toHaveLength(1);
    expect(publisher.published[0].subject).toBe("invoices.process.42");
    expect(publisher.published[0].options).toEqual({
      key: "42",
      msgId: "invoice-42-run-1",
      traceId: undefined,
      timeoutMs: 5000,
    });
    expect(publisher.decoded(0)).toEqual(item);
  });

  it("should carry the current trace id", async () => {
    await withTraceAsync(() => dispatcher.enqueue(item, "run-1"), "trace-abc");

    expect(publisher.published[0].options.traceId).toBe("trace-abc");
  });

  it("should retry a failed publish with backoff", async () => {
    publisher.failuresLeft = 2;

    const result = await dispatcher.enqueue(item, "run-1");

    expect(result.ok).toBe(true);
    expect(publisher.attempts).toBe(3);
    expect(delays.delays).toEqual([100, 200]);
    expect(sink.size()).toBe(0);
  });

  it("should record a local dead letter once publishing is exhausted", async () => {
    publisher.failuresLeft = 3;

    const result = await dispatcher.enqueue(item, "run-1");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ChannelUnavailableError);
      expect(result.error.attempts).toBe(3);
      expect(result.error.failureType).toBe("ChannelUnavailable");
      expect(result.error.message).toBe("Channel unavailable after 3 publish attempt(s): nats down");
    }

    const [entry] = sink.entries();
    expect(entry.item).toEqual(item);
    expect(entry.failureType).toBe("ChannelUnavailable");
    expect(entry.reason).toBe("nats down");
    expect(entry.attempts).toBe(3);
  });
});

describe("LocalDeadLetterSink", () => {
  const entry = (id: string) => ({
    item: { ...item, id },
    failureType: "ChannelUnavailable" as const,
    reason: "nats down",
    attempts: 3,
    timestamp: "2024-03-01T10:00:00.000Z",
  });

  it("should keep the newest entries up to capacity", () => {
    const sink = new LocalDeadLetterSink(2);
    sink.record(entry("1"));
    sink.record(entry("2"));
    sink.record(entry("3"));

    expect(sink.entries().map((e) => e.item.id)).toEqual(["2", "3"]);
    expect(sink.evicted()).toBe(1);
  });

  it("should empty on drain", () => {
    const sink = new LocalDeadLetterSink(5);
    sink.record(entry("1"));

    expect(sink.drain()).toHaveLength(1);
    expect(sink.size()).toBe(0);
  });
});

import { describe, it, expect } from "vitest";
import { decodeWorkItem, encodeDeadLetter, encodeWorkItem } from "../../../domain/work-item/index.js";
import type { DeadLetterRecord, WorkItem } from "../../../types/index.js";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("work item codec", () => {
  const item: WorkItem = {
    id: "42",
    groupKey: "north",
    enqueuedAt: "2024-03-01T10:00:00.000Z",
    status: "NOT_SIGNED",
  };

  it("should decode what it encodes", () => {
    expect(decodeWorkItem(encodeWorkItem(item))).toEqual({ ok: true, item });
  });

  it("should accept an item without status", () => {
    const result = decodeWorkItem(bytes('{"id":"7","groupKey":"south","enqueuedAt":"2024-03-01T10:00:00Z"}'));

    expect(result).toEqual({
      ok: true,
      item: { id: "7", groupKey: "south", enqueuedAt: "2024-03-01T10:00:00Z" },
    });
  });

  it("should reject malformed JSON", () => {
    const result = decodeWorkItem(bytes("{not json"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason.startsWith("invalid JSON: ")).toBe(true);
    }
  });

  it("should name the missing field", () => {
    const result = decodeWorkItem(bytes('{"groupKey":"north","enqueuedAt":"2024-03-01T10:00:00Z"}'));

    expect(result).toEqual({ ok: false, reason: "invalid work item: id: Required" });
  });

  it("should reject an empty id", () => {
    const result = decodeWorkItem(bytes('{"id":"","groupKey":"north","enqueuedAt":"2024-03-01T10:00:00Z"}'));

    expect(result.ok).toBe(false);
  });

  it("should reject a completed invoice status", () => {
    const result = decodeWorkItem(
      bytes('{"id":"1","groupKey":"north","enqueuedAt":"2024-03-01T10:00:00Z","status":"COMPLETED"}')
    );

    expect(result.ok).toBe(false);
  });

  it("should report a non-object payload at the root", () => {
    expect(decodeWorkItem(bytes("[]"))).toEqual({
      ok: false,
      reason: "invalid work item: (root): Expected object, received array",
    });
  });
});

describe("encodeDeadLetter", () => {
  it("should write the record as JSON", () => {
    const record: DeadLetterRecord = {
      originalItem: { id: "1", groupKey: "north", enqueuedAt: "2024-03-01T10:00:00.000Z" },
      failureReason: "HTTP 422",
      failureType: "RemotePermanent",
      attempts: 1,
      timestamp: "2024-03-01T10:05:00.000Z",
      originalChannel: "invoices.process.north",
      originalChannelOffset: 17,
    };

    expect(JSON.parse(new TextDecoder().decode(encodeDeadLetter(record)))).toEqual(record);
  });
});

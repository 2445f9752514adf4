import { describe, it, expect } from "vitest";
import { BoundedBuffer } from "../../../domain/buffer/index.js";

describe("BoundedBuffer", () => {
  it("should throw for non-positive max size", () => {
    expect(() => new BoundedBuffer(0)).toThrow("Buffer maxSize must be positive");
  });

  it("should evict the oldest item once full", () => {
    const buffer = new BoundedBuffer<number>(2);

    expect(buffer.push(1)).toBeUndefined();
    expect(buffer.push(2)).toBeUndefined();
    expect(buffer.isFull()).toBe(true);
    expect(buffer.push(3)).toBe(1);

    expect(buffer.snapshot()).toEqual([2, 3]);
    expect(buffer.evictedCount()).toBe(1);
  });

  it("should hand over its contents on swap", () => {
    const buffer = new BoundedBuffer<string>(5);
    buffer.push("a");
    buffer.push("b");

    expect(buffer.swap()).toEqual(["a", "b"]);
    expect(buffer.isEmpty()).toBe(true);
  });

  it("should return a copy from snapshot", () => {
    const buffer = new BoundedBuffer<number>(5);
    buffer.push(1);

    buffer.snapshot().push(99);

    expect(buffer.size()).toBe(1);
  });
});

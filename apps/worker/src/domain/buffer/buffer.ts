/**
 * Generic bounded buffer implementation.
 * Used for the local dead-letter sink.
 */

export interface Buffer<T> {
  /** Add single item to buffer, returns the item evicted to make room */
  push(item: T): T | undefined;
  /** Check if buffer is at capacity */
  isFull(): boolean;
  /** Check if buffer has any items */
  isEmpty(): boolean;
  /** Get current item count */
  size(): number;
  /** Copy of the contents, oldest first */
  snapshot(): T[];
  /** Swap buffer contents with empty array (atomic for draining) */
  swap(): T[];
  /** Clear buffer without returning items */
  clear(): void;
}

/**
 * Buffer that keeps the newest maxSize items, evicting the oldest.
 * Safe for single-threaded async operations.
 */
export class BoundedBuffer<T> implements Buffer<T> {
  private items: T[] = [];
  private evicted = 0;

  constructor(private readonly maxSize: number) {
    if (maxSize <= 0) {
      throw new Error("Buffer maxSize must be positive");
    }
  }

  push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length > this.maxSize) {
      this.evicted++;
      return this.items.shift();
    }
    return undefined;
  }

  isFull(): boolean {
    return this.items.length >= this.maxSize;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  snapshot(): T[] {
    return [...this.items];
  }

  swap(): T[] {
    const current = this.items;
    this.items = [];
    return current;
  }

  clear(): void {
    this.items = [];
  }

  /** Items dropped because the buffer was full */
  evictedCount(): number {
    return this.evicted;
  }

  /** Get max size configuration */
  getMaxSize(): number {
    return this.maxSize;
  }
}

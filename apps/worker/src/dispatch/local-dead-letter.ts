import { log } from "../logger.js";
import { localDeadLetterSize } from "../metrics.js";
import { BoundedBuffer } from "../domain/buffer/buffer.js";
import type { LocalDeadLetterEntry } from "../types/index.js";

/**
 * In-memory sink for work items that never made it onto the channel.
 * Keeps the newest `capacity` entries; the next orchestrator run re-reads
 * the underlying invoices from the store anyway.
 */
export class LocalDeadLetterSink {
  private readonly buffer: BoundedBuffer<LocalDeadLetterEntry>;

  constructor(capacity: number) {
    this.buffer = new BoundedBuffer(capacity);
  }

  record(entry: LocalDeadLetterEntry): void {
    const evicted = this.buffer.push(entry);
    if (evicted) {
      log.dispatch.warn({ invoiceId: evicted.item.id }, "local dead-letter full, dropped oldest entry");
    }
    localDeadLetterSize.set(this.buffer.size());
  }

  entries(): LocalDeadLetterEntry[] {
    return this.buffer.snapshot();
  }

  size(): number {
    return this.buffer.size();
  }

  evicted(): number {
    return this.buffer.evictedCount();
  }

  /** Remove and return everything (operators replaying by hand) */
  drain(): LocalDeadLetterEntry[] {
    const drained = this.buffer.swap();
    localDeadLetterSize.set(0);
    return drained;
  }
}

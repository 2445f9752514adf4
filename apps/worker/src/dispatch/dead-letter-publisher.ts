import { DeadLetterWriteError } from "../errors.js";
import { encodeDeadLetter } from "../domain/work-item/codec.js";
import { HEADERS, SUBJECTS, type ChannelPublisher, type DeadLetterRecord } from "../types/index.js";

/**
 * Durable sink for records whose processing is over
 */
export interface DeadLetterSink {
  /** Resolves once the record is confirmed durable */
  publish(record: DeadLetterRecord): Promise<void>;
}

export function deadLetterSubject(record: DeadLetterRecord): string {
  return `${SUBJECTS.DEAD_LETTER_PREFIX}.${record.failureType}`;
}

/**
 * Writes dead-letter records to the dead-letter stream.
 */
export class ChannelDeadLetterSink implements DeadLetterSink {
  constructor(
    private readonly publisher: ChannelPublisher,
    private readonly timeoutMs: number
  ) {}

  async publish(record: DeadLetterRecord): Promise<void> {
    const invoiceId = record.originalItem.id;
    try {
      await this.publisher.publish(deadLetterSubject(record), encodeDeadLetter(record), {
        key: invoiceId,
        // One record per consumed message, even when it is redelivered
        msgId: record.originalChannelOffset !== undefined
          ? `dlq-${invoiceId}-${record.originalChannelOffset}`
          : undefined,
        headers: { [HEADERS.FAILURE_TYPE]: record.failureType },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new DeadLetterWriteError(invoiceId, error);
    }
  }
}

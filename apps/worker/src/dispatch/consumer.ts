import { log, withTraceAsync } from "../logger.js";
import { deadLettersTotal, invoicesConsumedTotal, natsMessageProcessingDuration } from "../metrics.js";
import { errorMessage } from "../errors.js";
import { calculateReleaseBackoff } from "../domain/utils/backoff.js";
import { decodeWorkItem } from "../domain/work-item/codec.js";
import {
  isFailure,
  type AckHandle,
  type CallFailure,
  type CallOutcome,
  type DeadLetterRecord,
  type LocalDeadLetterEntry,
  type MessageMeta,
  type WorkItem,
} from "../types/index.js";
import type { DeadLetterSink } from "./dead-letter-publisher.js";

export interface OutboundCaller {
  call(item: WorkItem): Promise<CallOutcome>;
}

export interface ConsumerConfig {
  /** Messages older than this are dead-lettered as stale without a call */
  maxMessageAgeMs: number;
  /** The channel's delivery limit; the last delivery is never redelivered */
  maxDeliver: number;
}

/** Process-local record of last resort, read through the status endpoint */
export interface LocalDeadLetterRecorder {
  record(entry: LocalDeadLetterEntry): void;
}

export type ConsumeResult = "success" | "dead_lettered" | "ignored";

type Failure = Pick<CallFailure, "failureType" | "reason" | "attempts">;

/**
 * Consumer side of the channel bridge.
 *
 * A message is committed only after a successful call or a confirmed
 * dead-letter write. Messages sharing a key run one after another in
 * arrival order; different keys run concurrently.
 */
export class InvoiceConsumer {
  private readonly keyChains = new Map<string, Promise<void>>();

  constructor(
    private readonly caller: OutboundCaller,
    private readonly deadLetters: DeadLetterSink,
    private readonly localDeadLetters: LocalDeadLetterRecorder,
    private readonly config: ConsumerConfig,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Entry point for raw deliveries from the channel.
   */
  async handleDelivery(payload: Uint8Array, ack: AckHandle, meta: MessageMeta): Promise<ConsumeResult> {
    return withTraceAsync(async () => {
      const decoded = decodeWorkItem(payload);
      if (!decoded.ok) {
        // Can never succeed; redelivery would loop forever
        log.consumer.error({ seq: meta.offset, subject: meta.subject, error: decoded.reason }, "invalid payload, discarding");
        await ack.commit();
        invoicesConsumedTotal.inc({ result: "ignored" });
        return "ignored";
      }

      const item = decoded.item;
      return this.serialize(meta.key, () => this.onMessage(item, ack, meta));
    }, meta.traceId);
  }

  /**
   * Process one decoded work item and settle its acknowledgment.
   *
   * @throws {DeadLetterWriteError} the record could not be written; the
   * message was released for redelivery and not committed
   */
  async onMessage(item: WorkItem, ack: AckHandle, meta: MessageMeta): Promise<ConsumeResult> {
    const endTimer = natsMessageProcessingDuration.startTimer();

    const ageMs = this.now() - meta.publishedAt;
    if (ageMs > this.config.maxMessageAgeMs) {
      log.consumer.warn({ invoiceId: item.id, seq: meta.offset, ageMs }, "stale message");
      const stale: Failure = {
        failureType: "Stale",
        reason: `message age ${ageMs}ms exceeds ${this.config.maxMessageAgeMs}ms`,
        attempts: 0,
      };
      return this.deadLetter(item, stale, ack, meta, endTimer);
    }

    const outcome = await this.caller.call(item);

    if (!isFailure(outcome)) {
      await ack.commit();
      invoicesConsumedTotal.inc({ result: "success" });
      endTimer({ result: "success" });
      log.consumer.info({ invoiceId: item.id, attempts: outcome.attempts }, "processed");
      return "success";
    }

    return this.deadLetter(item, outcome, ack, meta, endTimer);
  }

  private async deadLetter(
    item: WorkItem,
    failure: Failure,
    ack: AckHandle,
    meta: MessageMeta,
    endTimer: (labels: { result: string }) => void
  ): Promise<ConsumeResult> {
    const timestamp = new Date(this.now()).toISOString();
    const record: DeadLetterRecord = {
      originalItem: item,
      failureReason: failure.reason,
      failureType: failure.failureType,
      attempts: failure.attempts,
      timestamp,
      originalChannel: meta.subject,
      originalChannelOffset: meta.offset,
    };

    try {
      await this.deadLetters.publish(record);
    } catch (error) {
      const context = { invoiceId: item.id, groupKey: item.groupKey, failureType: failure.failureType, error: errorMessage(error) };

      if (meta.deliveryCount >= this.config.maxDeliver) {
        // The channel will not deliver this message again
        this.localDeadLetters.record({
          item,
          failureType: failure.failureType,
          reason: `${failure.reason}; dead-letter write failed: ${errorMessage(error)}`,
          attempts: failure.attempts,
          timestamp,
        });
        log.consumer.error({ ...context, deliveryCount: meta.deliveryCount }, "dead-letter write failed on last delivery, kept locally");
      }

      const delayMs = calculateReleaseBackoff(meta.deliveryCount);
      ack.release(delayMs);
      invoicesConsumedTotal.inc({ result: "released" });
      endTimer({ result: "released" });
      log.consumer.error({ ...context, delayMs }, "dead-letter write failed, released for redelivery");
      throw error;
    }

    await ack.commit();
    deadLettersTotal.inc({ failure_type: failure.failureType });
    invoicesConsumedTotal.inc({ result: "dead_lettered" });
    endTimer({ result: "dead_lettered" });
    log.consumer.error(
      {
        invoiceId: item.id,
        groupKey: item.groupKey,
        attempts: failure.attempts,
        failureType: failure.failureType,
        error: failure.reason,
      },
      "dead-lettered"
    );
    return "dead_lettered";
  }

  /** Keys with work queued or running */
  activeKeys(): number {
    return this.keyChains.size;
  }

  private serialize<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.keyChains.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The chain only orders work; failures surface through `result`
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.keyChains.set(key, tail);
    void tail.then(() => {
      if (this.keyChains.get(key) === tail) {
        this.keyChains.delete(key);
      }
    });

    return result;
  }
}

import { log, getTraceId } from "../logger.js";
import { invoicesEnqueuedTotal } from "../metrics.js";
import { ChannelUnavailableError } from "../errors.js";
import { executeWithRetry, TimeoutDelayProvider, type DelayProvider } from "../domain/utils/retry.js";
import { encodeWorkItem } from "../domain/work-item/codec.js";
import { SUBJECTS, type ChannelPublisher, type WorkItem } from "../types/index.js";
import type { LocalDeadLetterSink } from "./local-dead-letter.js";

export interface DispatcherConfig {
  publishTimeoutMs: number;
  publishMaxAttempts: number;
  publishRetryDelayMs: number;
}

export type DispatchResult =
  | { ok: true; sequence: number; duplicate: boolean }
  | { ok: false; error: ChannelUnavailableError };

/** Characters NATS does not allow inside a subject token */
const INVALID_SUBJECT_CHARS = /[\s.*>]/g;

export function processSubject(key: string): string {
  return `${SUBJECTS.PROCESS_PREFIX}.${key.replace(INVALID_SUBJECT_CHARS, "_")}`;
}

/**
 * De-duplication id: the same invoice is published at most once per run
 */
export function dispatchMessageId(item: WorkItem, runId: string): string {
  return `invoice-${item.id}-${runId}`;
}

/**
 * Producer side of the channel bridge.
 */
export class Dispatcher {
  private readonly delayProvider: DelayProvider;

  constructor(
    private readonly publisher: ChannelPublisher,
    private readonly localDeadLetters: LocalDeadLetterSink,
    private readonly config: DispatcherConfig,
    delayProvider?: DelayProvider
  ) {
    this.delayProvider = delayProvider ?? new TimeoutDelayProvider();
  }

  /**
   * Publish one work item. Never rejects: a publish that keeps failing ends in
   * the local dead-letter sink and an error result.
   */
  async enqueue(item: WorkItem, runId: string): Promise<DispatchResult> {
    const payload = encodeWorkItem(item);
    const subject = processSubject(item.id);
    const msgId = dispatchMessageId(item, runId);
    const traceId = getTraceId();

    const result = await executeWithRetry(
      () =>
        this.publisher.publish(subject, payload, {
          key: item.id,
          msgId,
          traceId,
          timeoutMs: this.config.publishTimeoutMs,
        }),
      {
        maxAttempts: this.config.publishMaxAttempts,
        baseDelayMs: this.config.publishRetryDelayMs,
        onRetry: (attempt, error, delayMs) => {
          log.dispatch.warn(
            { invoiceId: item.id, groupKey: item.groupKey, attempt, delayMs, error: error.message },
            "publish failed, retrying"
          );
        },
      },
      this.delayProvider
    );

    if (result.success) {
      const { sequence, duplicate } = result.value;
      invoicesEnqueuedTotal.inc({ status: duplicate ? "duplicate" : "published" });
      log.dispatch.debug({ invoiceId: item.id, seq: sequence, duplicate }, "enqueued");
      return { ok: true, sequence, duplicate };
    }

    const error = new ChannelUnavailableError(result.attempts, result.error, {
      invoiceId: item.id,
      groupKey: item.groupKey,
      runId,
    });

    this.localDeadLetters.record({
      item,
      failureType: error.failureType,
      reason: result.error.message,
      attempts: result.attempts,
      timestamp: new Date().toISOString(),
    });
    invoicesEnqueuedTotal.inc({ status: "failed" });
    log.dispatch.error(
      { invoiceId: item.id, groupKey: item.groupKey, attempts: result.attempts, failureType: error.failureType, error: result.error.message },
      "publish exhausted, sent to local dead-letter"
    );

    return { ok: false, error };
  }
}

/**
 * Channel Types - Shared across producer and consumer
 *
 * Single source of truth for NATS subjects, headers and the
 * transport-agnostic message contracts used in:
 * - Dispatcher (publish side)
 * - Consumer + invoice worker (consume side)
 * - Dead-letter publisher
 */

export const STREAMS = {
  /** Primary work stream (work-queue retention) */
  INVOICES: "invoices",
  /** Dead-letter stream (limits retention, kept for inspection/replay) */
  DEAD_LETTER: "invoices-dlq",
} as const;

export const SUBJECTS = {
  PROCESS_PREFIX: "invoices.process",
  DEAD_LETTER_PREFIX: "invoices.dlq",
} as const;

export const HEADERS = {
  MESSAGE_KEY: "X-Message-Key",
  TRACE_ID: "X-Trace-Id",
  FAILURE_TYPE: "X-Failure-Type",
} as const;

export const CONSUMER_NAME = "invoice-dispatcher";

/**
 * Receipt of a confirmed publish
 */
export interface PublishReceipt {
  stream: string;
  sequence: number;
  /** The server dropped the message as a duplicate of an earlier msgID */
  duplicate: boolean;
}

export interface PublishOptions {
  /** Partition/ordering key, carried as a header */
  key: string;
  /** Server-side de-duplication id */
  msgId?: string;
  traceId?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Publishes raw payloads and resolves only once the channel confirmed them.
 */
export interface ChannelPublisher {
  publish(subject: string, payload: Uint8Array, options: PublishOptions): Promise<PublishReceipt>;
}

/**
 * Manual acknowledgment for one delivered message.
 */
export interface AckHandle {
  /** Remove the message from the channel; resolves once confirmed */
  commit(): Promise<void>;
  /** Hand the message back for redelivery after delayMs */
  release(delayMs: number): void;
}

/**
 * Delivery metadata of one consumed message.
 */
export interface MessageMeta {
  key: string;
  subject: string;
  /** Stream sequence */
  offset: number;
  /** 1 on first delivery */
  deliveryCount: number;
  /** Epoch ms at which the channel stored the message */
  publishedAt: number;
  traceId?: string;
}

/**
 * Shared Types - Single Source of Truth
 *
 * Import types from here instead of scattered locations.
 *
 * @example
 * import type { WorkItem, CallOutcome, AckHandle } from "./types/index.js";
 *
 * Source hierarchy:
 * 1. @invoice-dispatch/db - Database entities and status enums (re-exported here)
 * 2. ./types/jobs.ts - NATS subjects and channel contracts
 * 3. ./types/domain.ts - Dispatch pipeline data model
 */

export type {
  InvoiceStatus,
  PendingInvoiceStatus,
  Invoice,
  Notary,
} from "@invoice-dispatch/db";

export type {
  WorkItem,
  PendingInvoiceRow,
  Credential,
  FailureType,
  CallSuccess,
  CallRetryableFailure,
  CallPermanentFailure,
  CallOutcome,
  CallFailure,
  DeadLetterRecord,
  LocalDeadLetterEntry,
} from "./domain.js";
export { isFailure } from "./domain.js";

export type {
  PublishReceipt,
  PublishOptions,
  ChannelPublisher,
  AckHandle,
  MessageMeta,
} from "./jobs.js";
export { STREAMS, SUBJECTS, HEADERS, CONSUMER_NAME } from "./jobs.js";

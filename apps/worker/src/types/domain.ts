/**
 * Domain Types - Shared across worker modules
 *
 * Single source of truth for the dispatch pipeline's data model:
 * - WorkItem (one invoice to deliver)
 * - Credential (the leased access token)
 * - CallOutcome (result of one outbound call, after retries)
 * - DeadLetterRecord (terminal failure record)
 */

import type { PendingInvoiceStatus } from "@invoice-dispatch/db";

// =============================================================================
// WORK ITEMS
// =============================================================================

/**
 * One invoice awaiting delivery to the external processing API.
 * Immutable once created by the orchestrator.
 */
export interface WorkItem {
  readonly id: string;
  /** Partition key for fan-out (the notary's region) */
  readonly groupKey: string;
  /** ISO timestamp of when the orchestrator created the item */
  readonly enqueuedAt: string;
  /** Pending status the invoice was in when read */
  readonly status?: PendingInvoiceStatus;
}

/**
 * One row of the pending-work query.
 */
export interface PendingInvoiceRow {
  invoiceId: string;
  status: PendingInvoiceStatus;
  region: string;
  createdAt: Date;
}

// =============================================================================
// CREDENTIALS
// =============================================================================

export interface Credential {
  readonly token: string;
  /** Epoch ms */
  readonly expiresAt: number;
}

// =============================================================================
// CALL OUTCOMES
// =============================================================================

export type FailureType =
  | "TransientInfra"
  | "AuthRejected"
  | "RemoteRetryable"
  | "RemotePermanent"
  | "ChannelUnavailable"
  | "CircuitOpen"
  | "RateLimited"
  /** Sat in the channel longer than the consumer's maximum message age */
  | "Stale";

export interface CallSuccess {
  kind: "success";
  attempts: number;
  /** Status reported by the external API */
  remoteStatus?: string;
}

export interface CallRetryableFailure {
  kind: "retryable";
  reason: string;
  failureType: FailureType;
  attempts: number;
}

export interface CallPermanentFailure {
  kind: "permanent";
  reason: string;
  failureType: FailureType;
  attempts: number;
}

export type CallOutcome = CallSuccess | CallRetryableFailure | CallPermanentFailure;
export type CallFailure = CallRetryableFailure | CallPermanentFailure;

export function isFailure(outcome: CallOutcome): outcome is CallFailure {
  return outcome.kind !== "success";
}

// =============================================================================
// DEAD LETTERS
// =============================================================================

export interface DeadLetterRecord {
  readonly originalItem: WorkItem;
  readonly failureReason: string;
  readonly failureType: FailureType;
  readonly attempts: number;
  /** ISO timestamp */
  readonly timestamp: string;
  /** Subject the item was consumed from */
  readonly originalChannel: string;
  /** Stream sequence of the consumed message */
  readonly originalChannelOffset?: number;
}

/**
 * Work item kept in process memory: the dispatcher could not publish it, or
 * its last delivery could not be written to the dead-letter channel.
 */
export interface LocalDeadLetterEntry {
  readonly item: WorkItem;
  readonly failureType: FailureType;
  readonly reason: string;
  readonly attempts: number;
  /** ISO timestamp */
  readonly timestamp: string;
}

/**
 * Pure mapping from an invoice API response to an attempt outcome.
 * Anything not recognized fails closed (permanent).
 */

import { z } from "zod";
import type { FailureType } from "../../types/index.js";

/** Status values as the remote API spells them; matched case-insensitively */
export const COMPLETED_REMOTE_STATUS = "COMPLETED";

export const RETRYABLE_REMOTE_STATUSES = [
  "NO_FIRMADO",
  "NO_WS1",
  "NO_WS2",
  "NO_ZIP",
  "ERROR",
] as const;

export const TRANSIENT_HTTP_STATUSES: ReadonlySet<number> = new Set([
  408, 425, 429, 500, 502, 503, 504,
]);

export const AUTH_HTTP_STATUSES: ReadonlySet<number> = new Set([401, 403]);

const responseBodySchema = z.object({
  success: z.boolean().optional(),
  status: z.string(),
  data: z.unknown().optional(),
});

export type AttemptResult =
  | { kind: "success"; remoteStatus: string }
  | { kind: "retryable" | "permanent"; reason: string; failureType: FailureType };

function retryable(failureType: FailureType, reason: string): AttemptResult {
  return { kind: "retryable", reason, failureType };
}

function permanent(failureType: FailureType, reason: string): AttemptResult {
  return { kind: "permanent", reason, failureType };
}

function isRetryableRemoteStatus(status: string): boolean {
  return RETRYABLE_REMOTE_STATUSES.some((candidate) => candidate === status);
}

function normalizeStatus(status: string): string {
  return status.trim().toUpperCase();
}

/**
 * Interpret an HTTP status plus the raw response text.
 *
 * @example
 * interpretResponse(200, '{"status":"COMPLETED"}') // { kind: "success", remoteStatus: "COMPLETED" }
 * interpretResponse(503, "")                      // retryable TransientInfra
 */
export function interpretResponse(httpStatus: number, bodyText: string): AttemptResult {
  if (httpStatus >= 200 && httpStatus < 300) {
    return interpretBody(bodyText);
  }

  if (TRANSIENT_HTTP_STATUSES.has(httpStatus)) {
    return retryable("TransientInfra", `HTTP ${httpStatus}`);
  }

  if (AUTH_HTTP_STATUSES.has(httpStatus)) {
    return permanent("AuthRejected", `HTTP ${httpStatus}`);
  }

  return permanent("RemotePermanent", `HTTP ${httpStatus}`);
}

function interpretBody(bodyText: string): AttemptResult {
  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    return permanent("RemotePermanent", "response body is not JSON");
  }

  const parsed = responseBodySchema.safeParse(json);
  if (!parsed.success) {
    return permanent("RemotePermanent", "response body has no status");
  }

  const status = normalizeStatus(parsed.data.status);

  if (status === COMPLETED_REMOTE_STATUS) {
    return { kind: "success", remoteStatus: status };
  }

  if (isRetryableRemoteStatus(status)) {
    return retryable("RemoteRetryable", `remote status ${status}`);
  }

  return permanent("RemotePermanent", `unrecognized remote status ${parsed.data.status}`);
}

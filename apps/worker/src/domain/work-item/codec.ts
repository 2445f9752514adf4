/**
 * JSON wire format for work items and dead-letter records.
 * Decoding validates with zod; encoding is plain JSON.
 */

import { z } from "zod";
import { PENDING_INVOICE_STATUSES } from "@invoice-dispatch/db";
import type { DeadLetterRecord, WorkItem } from "../../types/index.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const workItemSchema = z.object({
  id: z.string().min(1),
  groupKey: z.string().min(1),
  enqueuedAt: z.string().datetime(),
  status: z.enum(PENDING_INVOICE_STATUSES).optional(),
});

export type DecodeResult =
  | { ok: true; item: WorkItem }
  | { ok: false; reason: string };

export function encodeWorkItem(item: WorkItem): Uint8Array {
  return encoder.encode(JSON.stringify(item));
}

/**
 * Decode and validate a work item payload. Never throws.
 */
export function decodeWorkItem(data: Uint8Array): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(data));
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const parsed = workItemSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return { ok: false, reason: `invalid work item: ${issues.join("; ")}` };
  }

  return { ok: true, item: parsed.data };
}

export function encodeDeadLetter(record: DeadLetterRecord): Uint8Array {
  return encoder.encode(JSON.stringify(record));
}

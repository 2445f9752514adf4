import { and, asc, eq, gt, inArray } from "drizzle-orm";
import { invoices, notaries, PENDING_INVOICE_STATUSES, type Database } from "@invoice-dispatch/db";
import { log } from "../logger.js";
import { postgresQueryDuration } from "../metrics.js";
import { PendingQueryError } from "../errors.js";
import type { PendingInvoiceRow } from "../types/index.js";

/**
 * Source of invoices awaiting delivery
 */
export interface PendingInvoiceSource {
  /**
   * Pending invoices ordered by createdAt ascending, optionally only those
   * created after `since`.
   *
   * @throws {PendingQueryError}
   */
  findPending(since?: Date): Promise<PendingInvoiceRow[]>;
}

export class DrizzlePendingInvoiceSource implements PendingInvoiceSource {
  constructor(
    private readonly db: Database,
    private readonly limit: number
  ) {}

  async findPending(since?: Date): Promise<PendingInvoiceRow[]> {
    const endTimer = postgresQueryDuration.startTimer({ query: "find_pending_invoices" });

    const statusFilter = inArray(invoices.status, [...PENDING_INVOICE_STATUSES]);
    const where = since ? and(statusFilter, gt(invoices.createdAt, since)) : statusFilter;

    try {
      const rows = await this.db
        .select({
          id: invoices.id,
          status: invoices.status,
          region: notaries.region,
          createdAt: invoices.createdAt,
        })
        .from(invoices)
        .innerJoin(notaries, eq(invoices.notaryId, notaries.id))
        .where(where)
        .orderBy(asc(invoices.createdAt), asc(invoices.id))
        .limit(this.limit);

      const pending: PendingInvoiceRow[] = [];
      for (const row of rows) {
        const status = PENDING_INVOICE_STATUSES.find((candidate) => candidate === row.status);
        if (status) {
          pending.push({ invoiceId: String(row.id), status, region: row.region, createdAt: row.createdAt });
        }
      }

      log.db.debug({ count: pending.length, since: since?.toISOString() }, "pending invoices fetched");
      return pending;
    } catch (error) {
      throw new PendingQueryError(error);
    } finally {
      endTimer();
    }
  }
}

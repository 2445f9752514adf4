import { randomUUID } from "node:crypto";
import { log, withTraceAsync } from "../logger.js";
import { orchestratorRunDuration, pendingInvoicesGauge } from "../metrics.js";
import { CredentialError, errorMessage } from "../errors.js";
import { groupByKey, mapSettledWithConcurrency } from "../domain/utils/work-item-grouping.js";
import type { Credential, PendingInvoiceRow, WorkItem } from "../types/index.js";
import type { DispatchResult } from "../dispatch/dispatcher.js";
import type { PendingInvoiceSource } from "../repository/pending-invoices.js";
import type { WatermarkStore } from "../repository/watermark-store.js";

export interface ItemDispatcher {
  enqueue(item: WorkItem, runId: string): Promise<DispatchResult>;
}

export interface GroupSummary {
  groupKey: string;
  total: number;
  dispatched: number;
  failed: number;
  errors: string[];
}

export interface RunSummary {
  runId: string;
  pending: number;
  groups: GroupSummary[];
  dispatched: number;
  failed: number;
  durationMs: number;
  /** Set when a watermark store is configured */
  watermarkAdvanced?: boolean;
}

export interface OrchestratorConfig {
  /** Items of one group enqueued concurrently (1 = sequential) */
  groupConcurrency: number;
}

export interface OrchestratorDeps {
  source: PendingInvoiceSource;
  dispatcher: ItemDispatcher;
  config: OrchestratorConfig;
  /** Checked by every group before it enqueues anything */
  credentials?: { acquire(): Promise<Credential> };
  watermark?: WatermarkStore;
  now?: () => number;
  generateRunId?: () => string;
}

export function toWorkItem(row: PendingInvoiceRow, enqueuedAt: string): WorkItem {
  return {
    id: row.invoiceId,
    groupKey: row.region,
    enqueuedAt,
    status: row.status,
  };
}

/**
 * Orchestrator
 *
 * One run: read pending invoices, partition them by region, and fan out one
 * concurrent task per region that enqueues every item of its group. Item
 * failures stay inside their group; group failures stay inside the summary.
 */
export class Orchestrator {
  private readonly now: () => number;
  private readonly generateRunId: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now;
    this.generateRunId = deps.generateRunId ?? randomUUID;
  }

  /**
   * @throws {PendingQueryError} when the pending-work query fails
   */
  async runOnce(): Promise<RunSummary> {
    return withTraceAsync(() => this.run());
  }

  private async run(): Promise<RunSummary> {
    const runId = this.generateRunId();
    const startedAt = this.now();
    const endTimer = orchestratorRunDuration.startTimer();
    const { source, watermark } = this.deps;

    let rows: PendingInvoiceRow[];
    try {
      const since = watermark ? await watermark.get() : undefined;
      rows = await source.findPending(since);
    } catch (error) {
      endTimer({ status: "failure" });
      throw error;
    }

    pendingInvoicesGauge.set(rows.length);

    if (rows.length === 0) {
      endTimer({ status: "success" });
      log.orchestrator.debug({ runId }, "no pending invoices");
      return { runId, pending: 0, groups: [], dispatched: 0, failed: 0, durationMs: this.now() - startedAt };
    }

    const enqueuedAt = new Date(this.now()).toISOString();
    const groups = groupByKey(rows.map((row) => toWorkItem(row, enqueuedAt)));

    log.orchestrator.info({ runId, pending: rows.length, groups: groups.size }, "run started");

    const entries = [...groups.entries()];
    const settled = await Promise.allSettled(
      entries.map(([groupKey, items]) => this.dispatchGroup(groupKey, items, runId))
    );

    const summaries = settled.map((result, index): GroupSummary => {
      if (result.status === "fulfilled") {
        return result.value;
      }
      const [groupKey, items] = entries[index];
      log.orchestrator.error({ runId, groupKey, error: errorMessage(result.reason) }, "group task failed");
      return {
        groupKey,
        total: items.length,
        dispatched: 0,
        failed: items.length,
        errors: [errorMessage(result.reason)],
      };
    });

    const dispatched = summaries.reduce((sum, group) => sum + group.dispatched, 0);
    const failed = summaries.reduce((sum, group) => sum + group.failed, 0);

    const summary: RunSummary = {
      runId,
      pending: rows.length,
      groups: summaries,
      dispatched,
      failed,
      durationMs: 0,
    };

    if (watermark) {
      summary.watermarkAdvanced = await this.advanceWatermark(watermark, rows, failed, runId);
    }

    summary.durationMs = this.now() - startedAt;
    endTimer({ status: failed === 0 ? "success" : "failure" });

    const context = { runId, pending: rows.length, groups: summaries.length, dispatched, failed, durationMs: summary.durationMs };
    if (failed > 0) {
      log.orchestrator.warn(context, "run completed with failures");
    } else {
      log.orchestrator.info(context, "run completed");
    }

    return summary;
  }

  private async dispatchGroup(groupKey: string, items: WorkItem[], runId: string): Promise<GroupSummary> {
    const rejection = await this.credentialRejection();
    if (rejection) {
      // Every call would be refused; leave the items pending for the next run
      log.orchestrator.error({ runId, groupKey, failureType: "AuthRejected", error: rejection }, "credentials rejected, group skipped");
      return { groupKey, total: items.length, dispatched: 0, failed: items.length, errors: [rejection] };
    }

    const results = await mapSettledWithConcurrency(
      items,
      this.deps.config.groupConcurrency,
      (item) => this.deps.dispatcher.enqueue(item, runId)
    );

    const summary: GroupSummary = { groupKey, total: items.length, dispatched: 0, failed: 0, errors: [] };

    results.forEach((result, index) => {
      let reason: string;
      if (result.status === "fulfilled") {
        if (result.value.ok) {
          summary.dispatched++;
          return;
        }
        reason = result.value.error.message;
      } else {
        reason = errorMessage(result.reason);
      }
      summary.failed++;
      summary.errors.push(`${items[index].id}: ${reason}`);
    });

    log.orchestrator.debug({ runId, groupKey, total: summary.total, dispatched: summary.dispatched, failed: summary.failed }, "group done");
    return summary;
  }

  /**
   * Reason the credential exchange refused us, if it did. Transient
   * exchange failures are left to the consumer's retries.
   */
  private async credentialRejection(): Promise<string | null> {
    const { credentials } = this.deps;
    if (!credentials) return null;

    try {
      await credentials.acquire();
      return null;
    } catch (error) {
      if (error instanceof CredentialError && !error.retryable) {
        return error.message;
      }
      log.orchestrator.warn({ error: errorMessage(error) }, "credential check failed, dispatching anyway");
      return null;
    }
  }

  /**
   * Only a run that dispatched every item may move the watermark, so
   * anything that failed to enqueue is read again next time.
   */
  private async advanceWatermark(
    watermark: WatermarkStore,
    rows: PendingInvoiceRow[],
    failed: number,
    runId: string
  ): Promise<boolean> {
    if (failed > 0) return false;

    const newest = rows.reduce((max, row) => (row.createdAt > max ? row.createdAt : max), rows[0].createdAt);
    try {
      await watermark.advance(newest);
      return true;
    } catch (error) {
      log.orchestrator.error({ runId, error: errorMessage(error) }, "watermark advance failed");
      return false;
    }
  }
}

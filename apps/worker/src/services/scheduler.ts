import { log } from "../logger.js";
import { schedulerRunsTotal, schedulerSkippedTicksTotal } from "../metrics.js";
import { errorMessage } from "../errors.js";
import type { RunSummary } from "./orchestrator.js";

export interface ScheduledRun {
  runOnce(): Promise<RunSummary>;
}

export type SchedulerState = "idle" | "running";

export interface SchedulerStatus {
  state: SchedulerState;
  started: boolean;
  intervalMs: number;
  runs: number;
  skippedTicks: number;
  lastRun?: RunSummary;
  lastError?: string;
}

/**
 * Scheduler Service
 *
 * Fires the orchestrator every intervalMs with at most one run in flight.
 * A tick that arrives while a run is in progress is skipped and counted,
 * never queued. Run errors are logged and never stop the timer.
 *
 * Every worker runs its own scheduler; the channel drops duplicate
 * publishes of the same invoice within a run.
 */
export class SchedulerService {
  private intervalId?: ReturnType<typeof setInterval>;
  private isRunning = false;
  private inFlight: Promise<void> | null = null;
  private runs = 0;
  private skippedTicks = 0;
  private lastRun?: RunSummary;
  private lastError?: string;

  constructor(
    private readonly orchestrator: ScheduledRun,
    private readonly intervalMs: number
  ) {}

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.intervalId) {
      log.scheduler.warn("Scheduler already running");
      return;
    }

    log.scheduler.info({ intervalMs: this.intervalMs }, "Scheduler started");

    // Run immediately on start
    this.tick().catch((err: unknown) => {
      log.scheduler.error({ error: errorMessage(err) }, "Scheduler tick failed");
    });

    // Then run periodically
    this.intervalId = setInterval(() => {
      this.tick().catch((err: unknown) => {
        log.scheduler.error({ error: errorMessage(err) }, "Scheduler tick failed");
      });
    }, this.intervalMs);
  }

  /**
   * Stop the scheduler and wait for an in-flight run
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      log.scheduler.info("Scheduler stopped");
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run once unless a run is already in progress.
   *
   * @returns false when the tick was skipped
   */
  async tick(): Promise<boolean> {
    // Check and set happen in one synchronous step
    if (this.isRunning) {
      this.skippedTicks++;
      schedulerSkippedTicksTotal.inc();
      log.scheduler.debug({ skippedTicks: this.skippedTicks }, "run in progress, tick skipped");
      return false;
    }
    this.isRunning = true;

    const run = this.execute();
    this.inFlight = run;
    await run;
    return true;
  }

  status(): SchedulerStatus {
    return {
      state: this.isRunning ? "running" : "idle",
      started: this.intervalId !== undefined,
      intervalMs: this.intervalMs,
      runs: this.runs,
      skippedTicks: this.skippedTicks,
      lastRun: this.lastRun,
      lastError: this.lastError,
    };
  }

  private async execute(): Promise<void> {
    try {
      this.lastRun = await this.orchestrator.runOnce();
      this.lastError = undefined;
      schedulerRunsTotal.inc({ status: "success" });
    } catch (error) {
      this.lastError = errorMessage(error);
      schedulerRunsTotal.inc({ status: "failure" });
      log.scheduler.error({ error: this.lastError }, "Scheduled run failed");
    } finally {
      this.runs++;
      this.isRunning = false;
      this.inFlight = null;
    }
  }
}

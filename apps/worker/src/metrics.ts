import promClient from 'prom-client';

// Initialize Prometheus default metrics (CPU, memory, etc.)
// Guard against multiple registrations (e.g., in test environments)
if (!promClient.register.getSingleMetric('worker_process_cpu_user_seconds_total')) {
  promClient.collectDefaultMetrics({
    prefix: 'worker_',
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

// Create a registry for all metrics
const register = promClient.register;

// ============================================
// Orchestrator / Scheduler Metrics
// ============================================

/**
 * Histogram: Time to run one orchestrator pass (query + fan-out)
 * Labels: status (success/failure)
 */
export const orchestratorRunDuration = new promClient.Histogram({
  name: 'orchestrator_run_duration_seconds',
  help: 'Duration of orchestrator runs',
  labelNames: ['status'],
  buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 120], // 100ms to 2min
});

/**
 * Counter: Scheduler runs
 * Labels: status (success/failure)
 */
export const schedulerRunsTotal = new promClient.Counter({
  name: 'scheduler_runs_total',
  help: 'Total number of scheduler runs',
  labelNames: ['status'],
});

/**
 * Counter: Ticks skipped because a run was still in flight
 */
export const schedulerSkippedTicksTotal = new promClient.Counter({
  name: 'scheduler_skipped_ticks_total',
  help: 'Total number of scheduler ticks skipped while a run was in progress',
});

/**
 * Gauge: Pending invoices found by the last run
 */
export const pendingInvoicesGauge = new promClient.Gauge({
  name: 'pending_invoices',
  help: 'Number of pending invoices found by the last orchestrator run',
});

// ============================================
// Dispatch (producer) Metrics
// ============================================

/**
 * Counter: Work items published to NATS
 * Labels: status (published/duplicate/failed)
 */
export const invoicesEnqueuedTotal = new promClient.Counter({
  name: 'invoices_enqueued_total',
  help: 'Total number of invoice work items published',
  labelNames: ['status'],
});

/**
 * Gauge: Entries held by the local dead-letter sink
 */
export const localDeadLetterSize = new promClient.Gauge({
  name: 'local_dead_letter_size',
  help: 'Work items the dispatcher could not publish',
});

// ============================================
// Consumer Metrics
// ============================================

/**
 * Counter: Messages consumed
 * Labels: result (success/dead_lettered/ignored/released)
 */
export const invoicesConsumedTotal = new promClient.Counter({
  name: 'invoices_consumed_total',
  help: 'Total number of invoice messages consumed by result',
  labelNames: ['result'],
});

/**
 * Counter: Dead-letter records written
 * Labels: failure_type
 */
export const deadLettersTotal = new promClient.Counter({
  name: 'dead_letters_total',
  help: 'Total number of dead-letter records written',
  labelNames: ['failure_type'],
});

/**
 * Histogram: NATS message processing time
 */
export const natsMessageProcessingDuration = new promClient.Histogram({
  name: 'nats_message_processing_duration_seconds',
  help: 'Time to process a NATS message',
  labelNames: ['result'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30],
});

// ============================================
// Outbound API Metrics
// ============================================

/**
 * Histogram: One outbound call including retries
 * Labels: kind (success/retryable/permanent)
 */
export const apiCallDuration = new promClient.Histogram({
  name: 'invoice_api_call_duration_seconds',
  help: 'Duration of outbound invoice API calls including retries',
  labelNames: ['kind'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
});

/**
 * Counter: Outbound call outcomes
 * Labels: kind, failure_type (none when successful)
 */
export const apiCallOutcomesTotal = new promClient.Counter({
  name: 'invoice_api_call_outcomes_total',
  help: 'Outbound invoice API call outcomes',
  labelNames: ['kind', 'failure_type'],
});

/**
 * Counter: Credential refreshes
 * Labels: result (success/failure)
 */
export const credentialRefreshesTotal = new promClient.Counter({
  name: 'credential_refreshes_total',
  help: 'Total number of credential refresh attempts',
  labelNames: ['result'],
});

/**
 * Gauge: Circuit breaker state (0=closed, 1=half-open, 2=open)
 * Labels: endpoint
 */
export const circuitBreakerState = new promClient.Gauge({
  name: 'circuit_breaker_state',
  help: 'Circuit breaker state (0=closed, 1=half-open, 2=open)',
  labelNames: ['endpoint'],
});

/**
 * Counter: Calls rejected by the local rate limiter
 * Labels: reason (queue_full/timeout)
 */
export const rateLimitRejectionsTotal = new promClient.Counter({
  name: 'rate_limit_rejections_total',
  help: 'Calls rejected by the outbound rate limiter',
  labelNames: ['reason'],
});

// ============================================
// Database Metrics
// ============================================

/**
 * Histogram: PostgreSQL query duration
 * Labels: query
 */
export const postgresQueryDuration = new promClient.Histogram({
  name: 'postgres_query_duration_seconds',
  help: 'Duration of PostgreSQL queries',
  labelNames: ['query'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
});

// ============================================
// System Metrics
// ============================================

/**
 * Counter: Worker startups
 */
export const workerStartupsTotal = new promClient.Counter({
  name: 'worker_startups_total',
  help: 'Total number of worker process startups',
});

/**
 * Get all metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get metrics content type
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

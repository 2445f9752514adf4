import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV !== "production";
const usePretty = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage allows us to automatically propagate traceId through
// async operations without manually passing it everywhere.
//
// Usage:
//   await withTraceAsync(async () => {
//     log.orchestrator.info({ runId }, "run started"); // traceId added automatically
//     await dispatchGroups();                          // all nested logs get same traceId
//   });
//
// Or with existing traceId (from NATS message metadata):
//   await withTraceAsync(async () => { ... }, existingTraceId);
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a short, unique trace ID (12 chars, base62)
 * Format: xxxxxxxxxxxx (e.g., "a1B2c3D4e5F6")
 */
function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

/**
 * Get the current trace ID from context, or undefined if not in a trace
 */
export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Run an async function with a trace context. All logs within will include
 * the traceId. If no traceId is provided, a new one is generated.
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// Usage patterns:
//
// SUCCESS (short, info level):
//   log.orchestrator.info({ runId, pending: 120 }, "run completed")
//   log.consumer.info({ invoiceId, attempts }, "processed")
//
// FAILURE (detailed, error level):
//   log.consumer.error({ invoiceId, error: err.message, failureType, attempts }, "dead-lettered")
//
// DEBUG (verbose, only in dev):
//   log.dispatch.debug({ invoiceId, seq: 42 }, "enqueued")
//
// =============================================================================

// Base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  // Custom log levels formatting
  formatters: {
    level: (label) => ({ level: label }),
  },

  // Timestamp format
  timestamp: pino.stdTimeFunctions.isoTime,

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

// Create the base logger - use pretty printing in development
export const logger = usePretty
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================
// Each component gets its own child logger for easy filtering

export const log = {
  // Scheduler ticks and skips
  scheduler: logger.child({ component: "scheduler" }),

  // Orchestrator runs (query, grouping, fan-out)
  orchestrator: logger.child({ component: "orchestrator" }),

  // Producer side: publishing work items
  dispatch: logger.child({ component: "dispatch" }),

  // Consumer side: processing work items, dead-lettering
  consumer: logger.child({ component: "consumer" }),

  // Credential lease (token refresh)
  credential: logger.child({ component: "credential" }),

  // Outbound invoice API calls
  api: logger.child({ component: "api" }),

  // Circuit breaker transitions
  circuit: logger.child({ component: "circuit" }),

  // Rate limiting
  rateLimit: logger.child({ component: "rate-limiter" }),

  // Database operations
  db: logger.child({ component: "db" }),

  // System-level events
  system: logger.child({ component: "system" }),

  // NATS operations
  nats: logger.child({ component: "nats" }),
};

import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
export const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  WORKER_ID: z.string().default("worker-1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).optional(),

  // ===========================================================================
  // Database (PostgreSQL) - source of pending invoices
  // ===========================================================================
  DATABASE_URL: z.string().url(),
  PENDING_QUERY_LIMIT: z.coerce.number().int().positive().default(5000),

  // ===========================================================================
  // NATS JetStream
  // ===========================================================================
  NATS_CLUSTER: z.string().default("nats://localhost:4222"),
  NATS_REPLICAS: z.coerce.number().min(1).max(5).default(1),
  NATS_TLS_ENABLED: stringBoolean.default(false),
  NATS_TLS_CA_FILE: z.string().optional(),
  NATS_TLS_CERT_FILE: z.string().optional(),
  NATS_TLS_KEY_FILE: z.string().optional(),

  // ===========================================================================
  // Redis - last-dispatched watermark
  // ===========================================================================
  REDIS_URL: z.string().default("localhost:6379"),
  WATERMARK_ENABLED: stringBoolean.default(false),
  WATERMARK_KEY: z.string().default("invoice-dispatch:last-dispatched-at"),

  // ===========================================================================
  // Identity endpoint (credential lease)
  // ===========================================================================
  AUTH_TOKEN_URL: z.string().url(),
  AUTH_CLIENT_ID: z.string().min(1),
  AUTH_USERNAME: z.string().min(1),
  AUTH_PASSWORD: z.string().min(1),
  /** Renew this long before the real expiry */
  AUTH_REFRESH_SKEW_MS: z.coerce.number().nonnegative().default(60_000),
  /** Background pre-refresh interval, 0 disables it */
  AUTH_REFRESH_CHECK_INTERVAL_MS: z.coerce.number().nonnegative().default(30_000),
  AUTH_TIMEOUT_MS: z.coerce.number().positive().default(5000),

  // ===========================================================================
  // External invoice processing API
  // ===========================================================================
  INVOICE_API_BASE_URL: z.string().url(),
  INVOICE_API_TIMEOUT_MS: z.coerce.number().positive().default(5000),

  // Retry (per outbound call)
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().nonnegative().default(1000),
  RETRY_MAX_DELAY_MS: z.coerce.number().nonnegative().default(10_000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_JITTER_FACTOR: z.coerce.number().min(0).max(1).default(0.5),

  // Circuit breaker (one per downstream endpoint)
  CIRCUIT_FAILURE_RATE_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.5),
  CIRCUIT_MINIMUM_CALLS: z.coerce.number().int().min(1).default(10),
  CIRCUIT_WINDOW_MS: z.coerce.number().positive().default(60_000),
  CIRCUIT_RESET_TIMEOUT_MS: z.coerce.number().positive().default(30_000),
  CIRCUIT_HALF_OPEN_MAX_PROBES: z.coerce.number().int().min(1).default(1),

  // Rate limiter (outermost layer)
  RATE_LIMIT_MAX_CONCURRENT: z.coerce.number().int().min(1).default(20),
  RATE_LIMIT_MAX_QUEUED: z.coerce.number().int().nonnegative().default(500),
  RATE_LIMIT_ACQUIRE_TIMEOUT_MS: z.coerce.number().nonnegative().default(10_000),
  RATE_LIMIT_PER_SECOND: z.coerce.number().positive().default(50),

  // ===========================================================================
  // Dispatcher (producer side)
  // ===========================================================================
  PUBLISH_TIMEOUT_MS: z.coerce.number().positive().default(5000),
  PUBLISH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  PUBLISH_RETRY_DELAY_MS: z.coerce.number().nonnegative().default(1000),
  LOCAL_DEAD_LETTER_CAPACITY: z.coerce.number().int().positive().default(1000),

  // ===========================================================================
  // Consumer
  // ===========================================================================
  CONSUMER_CONCURRENCY: z.coerce.number().int().min(1).default(10),
  CONSUMER_ACK_WAIT_MS: z.coerce.number().positive().default(5 * 60 * 1000),
  CONSUMER_MAX_DELIVER: z.coerce.number().int().min(1).default(10),
  /** Messages older than this are acked and skipped */
  CONSUMER_MAX_MESSAGE_AGE_MS: z.coerce.number().positive().default(24 * 60 * 60 * 1000),
  DEAD_LETTER_TIMEOUT_MS: z.coerce.number().positive().default(5000),

  // ===========================================================================
  // Scheduler / Orchestrator
  // ===========================================================================
  SCHEDULER_ENABLED: stringBoolean.default(true),
  SCHEDULER_INTERVAL_MS: z.coerce.number().positive().default(60_000),
  GROUP_CONCURRENCY: z.coerce.number().int().min(1).default(1),

  // ===========================================================================
  // Server
  // ===========================================================================
  PORT: z.coerce.number().default(6001),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}

/** Singleton config instance */
export const config = loadConfig();

/**
 * Shared initialization logic for the worker entrypoint.
 *
 * Builds every pipeline component from config so index.ts only wires
 * lifecycles together.
 */

import { Redis } from "ioredis";
import { config, type Config } from "../config.js";
import { log } from "../logger.js";
import { errorMessage } from "../errors.js";
import { db } from "../db.js";
import { NatsClient } from "../nats/client.js";
import { JetStreamPublisher } from "../nats/publisher.js";
import { InvoiceWorker } from "../nats/invoice-worker.js";
import { PasswordGrantTokenClient } from "../credentials/token-client.js";
import { CredentialLease } from "../credentials/credential-lease.js";
import { InvoiceApiClient } from "../http/invoice-api-client.js";
import { CircuitBreaker } from "../http/circuit-breaker.js";
import { ResilientCaller } from "../http/resilient-caller.js";
import { CallRateLimiter } from "../rate-limiting/call-rate-limiter.js";
import { Dispatcher } from "../dispatch/dispatcher.js";
import { LocalDeadLetterSink } from "../dispatch/local-dead-letter.js";
import { ChannelDeadLetterSink } from "../dispatch/dead-letter-publisher.js";
import { InvoiceConsumer } from "../dispatch/consumer.js";
import { DrizzlePendingInvoiceSource } from "../repository/pending-invoices.js";
import { RedisWatermarkStore } from "../repository/watermark-store.js";
import { Orchestrator } from "../services/orchestrator.js";
import { SchedulerService } from "../services/scheduler.js";

export { config, log };

// Shared NATS setup
export async function initNats(): Promise<NatsClient> {
  const natsClient = new NatsClient();
  await natsClient.connect();

  log.system.info({ cluster: config.NATS_CLUSTER }, "NATS connected");
  return natsClient;
}

// Redis (watermark store)
export function initRedis(redisUrl: string): Redis {
  const redis = redisUrl.startsWith("redis://") || redisUrl.startsWith("rediss://")
    ? new Redis(redisUrl, { maxRetriesPerRequest: 3 })
    : new Redis({
        host: redisUrl.split(":")[0] || "localhost",
        port: parseInt(redisUrl.split(":")[1] || "6379"),
        maxRetriesPerRequest: 3,
      });

  redis.on("error", (error: Error) => {
    log.system.error({ error: error.message }, "Redis connection error");
  });

  return redis;
}

export interface Pipeline {
  lease: CredentialLease;
  breaker: CircuitBreaker;
  caller: ResilientCaller;
  localDeadLetters: LocalDeadLetterSink;
  dispatcher: Dispatcher;
  consumer: InvoiceConsumer;
  worker: InvoiceWorker;
  orchestrator: Orchestrator;
  scheduler: SchedulerService;
}

/**
 * Build the dispatch pipeline, leaf components first.
 */
export function buildPipeline(cfg: Config, natsClient: NatsClient, redis: Redis | null): Pipeline {
  const lease = new CredentialLease(
    new PasswordGrantTokenClient({
      tokenUrl: cfg.AUTH_TOKEN_URL,
      clientId: cfg.AUTH_CLIENT_ID,
      username: cfg.AUTH_USERNAME,
      password: cfg.AUTH_PASSWORD,
      timeoutMs: cfg.AUTH_TIMEOUT_MS,
    }),
    {
      refreshSkewMs: cfg.AUTH_REFRESH_SKEW_MS,
      refreshCheckIntervalMs: cfg.AUTH_REFRESH_CHECK_INTERVAL_MS,
    }
  );

  const api = new InvoiceApiClient({
    baseUrl: cfg.INVOICE_API_BASE_URL,
    timeoutMs: cfg.INVOICE_API_TIMEOUT_MS,
  });

  const breaker = new CircuitBreaker(api.endpoint, {
    failureRateThreshold: cfg.CIRCUIT_FAILURE_RATE_THRESHOLD,
    minimumCalls: cfg.CIRCUIT_MINIMUM_CALLS,
    windowMs: cfg.CIRCUIT_WINDOW_MS,
    resetMs: cfg.CIRCUIT_RESET_TIMEOUT_MS,
    halfOpenMaxProbes: cfg.CIRCUIT_HALF_OPEN_MAX_PROBES,
  });

  const caller = new ResilientCaller({
    api,
    credentials: lease,
    breaker,
    limiter: new CallRateLimiter({
      maxConcurrent: cfg.RATE_LIMIT_MAX_CONCURRENT,
      maxQueued: cfg.RATE_LIMIT_MAX_QUEUED,
      acquireTimeoutMs: cfg.RATE_LIMIT_ACQUIRE_TIMEOUT_MS,
      tokensPerSecond: cfg.RATE_LIMIT_PER_SECOND,
    }),
    retry: {
      maxAttempts: cfg.RETRY_MAX_ATTEMPTS,
      baseDelayMs: cfg.RETRY_BASE_DELAY_MS,
      maxDelayMs: cfg.RETRY_MAX_DELAY_MS,
      multiplier: cfg.RETRY_MULTIPLIER,
      jitterFactor: cfg.RETRY_JITTER_FACTOR,
    },
  });

  const publisher = new JetStreamPublisher(natsClient);
  const localDeadLetters = new LocalDeadLetterSink(cfg.LOCAL_DEAD_LETTER_CAPACITY);
  const dispatcher = new Dispatcher(publisher, localDeadLetters, {
    publishTimeoutMs: cfg.PUBLISH_TIMEOUT_MS,
    publishMaxAttempts: cfg.PUBLISH_MAX_ATTEMPTS,
    publishRetryDelayMs: cfg.PUBLISH_RETRY_DELAY_MS,
  });

  const consumer = new InvoiceConsumer(
    caller,
    new ChannelDeadLetterSink(publisher, cfg.DEAD_LETTER_TIMEOUT_MS),
    localDeadLetters,
    { maxMessageAgeMs: cfg.CONSUMER_MAX_MESSAGE_AGE_MS, maxDeliver: cfg.CONSUMER_MAX_DELIVER }
  );
  const worker = new InvoiceWorker(natsClient, consumer, { concurrency: cfg.CONSUMER_CONCURRENCY });

  const orchestrator = new Orchestrator({
    source: new DrizzlePendingInvoiceSource(db, cfg.PENDING_QUERY_LIMIT),
    dispatcher,
    config: { groupConcurrency: cfg.GROUP_CONCURRENCY },
    credentials: lease,
    watermark: redis ? new RedisWatermarkStore(redis, cfg.WATERMARK_KEY) : undefined,
  });
  const scheduler = new SchedulerService(orchestrator, cfg.SCHEDULER_INTERVAL_MS);

  return { lease, breaker, caller, localDeadLetters, dispatcher, consumer, worker, orchestrator, scheduler };
}

// Graceful shutdown helper
const SHUTDOWN_TIMEOUT_MS = 30000;

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  name: string
): Promise<T | void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<void>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn({ error: errorMessage(error), component: name }, "shutdown step failed");
  } finally {
    clearTimeout(timer);
  }
}

export function createShutdownHandler(
  serviceName: string,
  shutdownFn: () => Promise<void>
): void {
  let shutdownInProgress = false;

  async function initiateShutdown(): Promise<void> {
    if (shutdownInProgress) {
      log.system.warn({ service: serviceName }, "shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;

    log.system.info({ service: serviceName }, "shutting down");

    const forceExitTimer = setTimeout(() => {
      log.system.error({ service: serviceName }, "shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await shutdownFn();
      log.system.info({ service: serviceName }, "shutdown complete");
      process.exit(0);
    } catch (error) {
      log.system.error({ service: serviceName, error: errorMessage(error) }, "shutdown error");
      process.exit(1);
    }
  }

  const onSignal = (): void => {
    void initiateShutdown();
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

// Service banner for dev
export function printBanner(serviceName: string, extras: Record<string, string | number | boolean> = {}): void {
  if (config.NODE_ENV !== "production") {
    const lines = [
      `  ${serviceName}`,
      `  Port: ${config.PORT}`,
      ...Object.entries(extras).map(([k, v]) => `  ${k}: ${v}`),
    ];

    console.log(`
========================================
${lines.join("\n")}
========================================
`);
  }
}

/**
 * Invoice Dispatch Worker
 *
 * One process runs the whole pipeline:
 * - scheduler -> orchestrator -> dispatcher (publish to NATS)
 * - invoice worker -> consumer -> resilient caller (external API)
 * - /health, /metrics, /status for operators
 */

import type { Redis } from "ioredis";
import { workerStartupsTotal } from "./metrics.js";
import { closeDb } from "./db.js";
import { buildApiServer } from "./api.js";
import {
  config,
  log,
  initNats,
  initRedis,
  buildPipeline,
  withTimeout,
  createShutdownHandler,
  printBanner,
  type Pipeline,
} from "./entrypoints/shared.js";
import type { NatsClient } from "./nats/client.js";
import type { FastifyInstance } from "fastify";

let natsClient: NatsClient | null = null;
let redis: Redis | null = null;
let pipeline: Pipeline | null = null;
let app: FastifyInstance | null = null;

async function start(): Promise<void> {
  log.system.info({ service: "invoice-dispatch", workerId: config.WORKER_ID }, "starting");
  workerStartupsTotal.inc();

  const nats = await initNats();
  natsClient = nats;

  if (config.WATERMARK_ENABLED) {
    redis = initRedis(config.REDIS_URL);
  }

  const built = buildPipeline(config, nats, redis);
  pipeline = built;

  built.worker.start();
  built.lease.start();
  if (config.SCHEDULER_ENABLED) {
    built.scheduler.start();
  } else {
    log.system.info({}, "scheduler disabled, consuming only");
  }

  const server = buildApiServer({
    serviceName: "invoice-dispatch",
    production: config.NODE_ENV === "production",
    healthCheck: () => nats.healthCheck(),
    scheduler: built.scheduler,
    lease: built.lease,
    caller: built.caller,
    breaker: built.breaker,
    localDeadLetters: built.localDeadLetters,
    consumerRunning: () => built.worker.isRunning(),
  });
  app = server;

  await server.listen({ port: config.PORT, host: "0.0.0.0" });

  log.system.info({
    service: "invoice-dispatch",
    port: config.PORT,
    env: config.NODE_ENV,
  }, "worker started");

  printBanner("Invoice Dispatch Worker", {
    NATS: config.NATS_CLUSTER,
    Scheduler: config.SCHEDULER_ENABLED ? `${config.SCHEDULER_INTERVAL_MS}ms` : "disabled",
    Watermark: config.WATERMARK_ENABLED,
  });
}

async function shutdown(): Promise<void> {
  // Stop producing first, then drain consumption, then close connections
  if (pipeline) {
    await withTimeout(pipeline.scheduler.stop(), 10000, "Scheduler");
    pipeline.lease.stop();
    await withTimeout(pipeline.worker.stop(), 10000, "InvoiceWorker");
  }
  if (app) {
    await withTimeout(app.close(), 2000, "Fastify");
  }
  if (natsClient) {
    await withTimeout(natsClient.close(), 5000, "NATS");
  }
  if (redis) {
    await withTimeout(redis.quit(), 2000, "Redis");
  }
  await withTimeout(closeDb(), 5000, "PostgreSQL");
}

createShutdownHandler("invoice-dispatch", shutdown);

start().catch((err: unknown) => {
  log.system.error({ error: err instanceof Error ? err.message : String(err) }, "startup failed");
  process.exit(1);
});

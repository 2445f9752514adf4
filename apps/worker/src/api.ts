import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import { log } from "./logger.js";
import { getMetrics, getMetricsContentType } from "./metrics.js";
import type { SchedulerStatus } from "./services/scheduler.js";
import type { CredentialLeaseStatus } from "./credentials/credential-lease.js";
import type { ResilientCallerStatus } from "./http/resilient-caller.js";
import type { CircuitState } from "./domain/circuit-breaker/types.js";
import type { LocalDeadLetterEntry } from "./types/index.js";

const circuitParamsSchema = z.object({
  state: z.enum(["closed", "open", "half-open"]),
});

/**
 * What the operator endpoints read from the running worker
 */
export interface ApiDeps {
  serviceName: string;
  production: boolean;
  healthCheck: () => Promise<boolean>;
  scheduler: { status(): SchedulerStatus };
  lease: { status(): CredentialLeaseStatus };
  caller: { status(): ResilientCallerStatus };
  breaker: { force(state: CircuitState): void; getState(): CircuitState };
  localDeadLetters: { entries(): LocalDeadLetterEntry[]; evicted(): number; drain(): LocalDeadLetterEntry[] };
  consumerRunning: () => boolean;
}

export function buildApiServer(deps: ApiDeps): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own structured logger
  });

  // Global error handler - prevent stack trace leakage in production
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    log.api.error({
      error: error.message,
      url: request.url,
      method: request.method,
      requestId: request.id,
      statusCode,
    }, "unhandled error");

    return reply.status(statusCode).send({
      error: deps.production && statusCode === 500 ? "Internal server error" : error.message,
      requestId: request.id,
    });
  });

  app.get("/health", async (_request, reply) => {
    const natsHealthy = await deps.healthCheck();
    const body = {
      status: natsHealthy ? "ok" : "degraded",
      service: deps.serviceName,
      nats: natsHealthy,
      consumer: deps.consumerRunning(),
      timestamp: new Date().toISOString(),
    };
    return reply.status(natsHealthy ? 200 : 503).send(body);
  });

  app.get("/metrics", async (_request, reply) => {
    const metrics = await getMetrics();
    return reply.header("Content-Type", getMetricsContentType()).send(metrics);
  });

  app.get("/status", async () => {
    const entries = deps.localDeadLetters.entries();
    return {
      scheduler: deps.scheduler.status(),
      credential: deps.lease.status(),
      caller: deps.caller.status(),
      localDeadLetters: {
        size: entries.length,
        evicted: deps.localDeadLetters.evicted(),
        entries,
      },
    };
  });

  // Hand the local dead letters to an operator for replay; they are gone afterwards
  app.post("/local-dead-letters/drain", async () => {
    const drained = deps.localDeadLetters.drain();
    log.system.warn({ count: drained.length }, "local dead letters drained");
    return { drained };
  });

  app.post("/circuit/:state", async (request, reply) => {
    const parsed = circuitParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({ error: "unknown circuit state" });
    }

    const previous = deps.breaker.getState();
    deps.breaker.force(parsed.data.state);
    log.system.warn({ from: previous, to: parsed.data.state }, "circuit forced by operator");
    return { previous, state: deps.breaker.getState() };
  });

  return app;
}

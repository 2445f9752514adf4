import type { ConsumerMessages } from "nats";
import { log } from "../logger.js";
import { errorMessage, DeadLetterWriteError } from "../errors.js";
import { calculateNatsBackoff } from "../domain/utils/backoff.js";
import { CONSUMER_NAME, HEADERS, STREAMS, type AckHandle, type MessageMeta } from "../types/index.js";
import type { InvoiceConsumer } from "../dispatch/consumer.js";
import type { NatsClient } from "./client.js";

/**
 * The parts of a JetStream message the worker relies on
 */
export interface DeliveredMessage {
  data: Uint8Array;
  subject: string;
  seq: number;
  headers?: { get(key: string): string };
  info: { redeliveryCount: number; timestampNanos: number };
  ackAck(): Promise<boolean>;
  nak(millis?: number): void;
}

/**
 * commit = server-confirmed ack, release = nak with delay
 */
export function toAckHandle(msg: DeliveredMessage): AckHandle {
  return {
    commit: async () => {
      const confirmed = await msg.ackAck();
      if (!confirmed) {
        throw new Error(`ack for message ${msg.seq} was not confirmed`);
      }
    },
    release: (delayMs) => msg.nak(delayMs),
  };
}

export function toMessageMeta(msg: DeliveredMessage): MessageMeta {
  const key = msg.headers?.get(HEADERS.MESSAGE_KEY) || msg.subject;
  const traceId = msg.headers?.get(HEADERS.TRACE_ID) || undefined;

  return {
    key,
    subject: msg.subject,
    offset: msg.seq,
    deliveryCount: msg.info.redeliveryCount,
    publishedAt: Math.floor(msg.info.timestampNanos / 1e6),
    traceId,
  };
}

export interface InvoiceWorkerOptions {
  /** Messages processed concurrently */
  concurrency: number;
}

/**
 * Pull loop over the durable invoice consumer.
 */
export class InvoiceWorker {
  private messages: ConsumerMessages | null = null;
  private running: Promise<void> | null = null;
  private isShuttingDown = false;

  constructor(
    private readonly natsClient: NatsClient,
    private readonly consumer: InvoiceConsumer,
    private readonly options: InvoiceWorkerOptions
  ) {}

  start(): void {
    if (this.running) {
      log.consumer.warn({}, "invoice worker already running");
      return;
    }

    this.running = this.runConsumerLoop().finally(() => {
      this.running = null;
    });
  }

  async stop(): Promise<void> {
    this.isShuttingDown = true;
    if (this.messages) {
      await this.messages.close();
    }
    if (this.running) {
      await this.running;
    }
    log.consumer.info({}, "invoice worker stopped");
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  private async runConsumerLoop(): Promise<void> {
    try {
      const js = this.natsClient.getJetStream();
      const consumer = await js.consumers.get(STREAMS.INVOICES, CONSUMER_NAME);
      const messages = await consumer.consume({ max_messages: this.options.concurrency * 2 });
      this.messages = messages;

      log.consumer.info({ consumer: CONSUMER_NAME, concurrency: this.options.concurrency }, "Consumer processor started");

      // Track in-flight messages for graceful shutdown
      const inFlight = new Set<Promise<void>>();

      for await (const msg of messages) {
        if (this.isShuttingDown) {
          // Not started; hand it straight back
          msg.nak();
          continue;
        }

        // Backpressure: wait if we've hit the limit before accepting more
        if (inFlight.size >= this.options.concurrency) {
          await Promise.race(inFlight);
        }

        const processingPromise = this.process(msg);
        inFlight.add(processingPromise);
        void processingPromise.finally(() => inFlight.delete(processingPromise));
      }

      if (inFlight.size > 0) {
        log.consumer.info({ inFlight: inFlight.size }, "Waiting for in-flight messages");
        await Promise.allSettled(inFlight);
      }
    } catch (error) {
      log.consumer.error({ error: errorMessage(error), consumer: CONSUMER_NAME }, "Consumer processor error");
    }
  }

  private async process(msg: DeliveredMessage): Promise<void> {
    try {
      await this.consumer.handleDelivery(msg.data, toAckHandle(msg), toMessageMeta(msg));
    } catch (error) {
      if (error instanceof DeadLetterWriteError) {
        // Already released by the consumer
        return;
      }
      const delayMs = calculateNatsBackoff(msg.info.redeliveryCount);
      log.consumer.error({ error: errorMessage(error), seq: msg.seq, delayMs }, "Message processing failed");
      msg.nak(delayMs);
    }
  }
}

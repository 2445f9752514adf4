import {
  connect,
  NatsConnection,
  JetStreamClient,
  JetStreamManager,
  RetentionPolicy,
  StorageType,
  DiscardPolicy,
  AckPolicy,
  DeliverPolicy,
  ReplayPolicy,
  type ConnectionOptions,
  type TlsOptions,
} from "nats";
import { config } from "../config.js";
import { log } from "../logger.js";
import { errorMessage } from "../errors.js";
import { readFileSync } from "node:fs";
import { calculateBackoff } from "../domain/utils/backoff.js";
import { CONSUMER_NAME, STREAMS, SUBJECTS } from "../types/index.js";

const NANOS_PER_MS = 1e6;

export class NatsClient {
  private nc: NatsConnection | null = null;
  private js: JetStreamClient | null = null;
  private jsm: JetStreamManager | null = null;
  private isClosing = false;

  async connect(): Promise<void> {
    const servers = config.NATS_CLUSTER.split(",").map((server) => server.trim());
    const maxRetries = 10;

    // Build connection options
    const connectionOptions: ConnectionOptions = {
      servers,
      name: `worker-${config.WORKER_ID}`,
      reconnect: true,
      maxReconnectAttempts: -1,
      reconnectTimeWait: 1000,
      reconnectJitter: 1000,
      reconnectJitterTLS: 2000,
      pingInterval: 30000,
      maxPingOut: 3,
    };

    // Configure TLS if enabled
    if (config.NATS_TLS_ENABLED) {
      log.nats.info({}, "NATS TLS enabled");

      const tlsOptions: TlsOptions = {};

      if (config.NATS_TLS_CA_FILE) {
        tlsOptions.ca = readFileSync(config.NATS_TLS_CA_FILE, "utf-8");
        log.nats.debug({ caFile: config.NATS_TLS_CA_FILE }, "Loaded NATS CA certificate");
      }

      // Client certificate for mutual TLS
      if (config.NATS_TLS_CERT_FILE && config.NATS_TLS_KEY_FILE) {
        tlsOptions.cert = readFileSync(config.NATS_TLS_CERT_FILE, "utf-8");
        tlsOptions.key = readFileSync(config.NATS_TLS_KEY_FILE, "utf-8");
        log.nats.debug({}, "Loaded NATS client certificate for mutual TLS");
      }

      connectionOptions.tls = tlsOptions;
    }

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        log.nats.info({ servers, attempt, maxRetries, tls: config.NATS_TLS_ENABLED }, "Connecting to NATS cluster");

        const nc = await connect(connectionOptions);
        this.nc = nc;
        this.js = nc.jetstream();
        const jsm = await nc.jetstreamManager();
        this.jsm = jsm;

        void nc.closed().then((err) => {
          if (!this.isClosing) {
            // Unexpected closure - trigger graceful shutdown instead of immediate exit
            log.nats.error({ error: err ? err.message : undefined }, "NATS connection closed unexpectedly, initiating graceful shutdown");
            process.emit("SIGTERM");
          } else {
            log.nats.info({}, "NATS connection closed (expected during shutdown)");
          }
        });

        void (async () => {
          for await (const status of nc.status()) {
            log.nats.info({ status: status.type, data: status.data }, "NATS status update");
          }
        })();

        await this.ensureStreams(jsm);
        await this.ensureConsumer(jsm);

        log.nats.info("Successfully connected to NATS and initialized JetStream");
        return;
      } catch (error) {
        const isLastAttempt = attempt === maxRetries;

        if (isLastAttempt) {
          log.nats.error({ error: errorMessage(error), attempt }, "Failed to connect to NATS after all retries");
          throw error;
        }

        // Exponential backoff: 1s, 2s, 4s, 8s, 16s, 32s (capped at 32s)
        const delay = calculateBackoff(attempt - 1, { baseDelayMs: 1000, maxDelayMs: 32000 });
        log.nats.warn({ error: errorMessage(error), attempt, maxRetries, retryInMs: delay }, "NATS connection failed, retrying");

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private async ensureStreams(jsm: JetStreamManager): Promise<void> {
    await this.ensureStream(jsm, STREAMS.INVOICES, {
      subjects: [`${SUBJECTS.PROCESS_PREFIX}.>`],
      retention: RetentionPolicy.Workqueue,
      max_age: 24 * 60 * 60 * 1e9, // 24 hours
      duplicate_window: 2 * 60 * 1e9, // 2 minutes deduplication window
    });

    await this.ensureStream(jsm, STREAMS.DEAD_LETTER, {
      subjects: [`${SUBJECTS.DEAD_LETTER_PREFIX}.>`],
      retention: RetentionPolicy.Limits,
      max_age: 14 * 24 * 60 * 60 * 1e9, // 14 days for inspection and replay
      duplicate_window: 2 * 60 * 1e9,
    });
  }

  private async ensureStream(
    jsm: JetStreamManager,
    name: string,
    settings: {
      subjects: string[];
      retention: RetentionPolicy;
      max_age: number;
      duplicate_window: number;
    }
  ): Promise<void> {
    try {
      await jsm.streams.info(name);
      log.nats.info({ stream: name }, "Stream already exists");
      return;
    } catch {
      log.nats.info({ stream: name }, "Creating stream");
    }

    try {
      await jsm.streams.add({
        name,
        ...settings,
        storage: StorageType.File,
        num_replicas: config.NATS_REPLICAS,
        discard: DiscardPolicy.Old,
        deny_delete: true, // Prevent accidental stream deletion
        deny_purge: true, // Prevent accidental purge
      });
      log.nats.info({ stream: name }, "Stream created successfully");
    } catch (createError) {
      // Another worker may have created it
      if (errorMessage(createError).includes("stream name already in use")) {
        log.nats.info({ stream: name }, "Stream was created by another worker");
      } else {
        throw createError;
      }
    }
  }

  private async ensureConsumer(jsm: JetStreamManager): Promise<void> {
    try {
      await jsm.consumers.info(STREAMS.INVOICES, CONSUMER_NAME);
      log.nats.debug({ consumer: CONSUMER_NAME }, "Consumer already exists");
      return;
    } catch {
      log.nats.info({ consumer: CONSUMER_NAME }, "Creating consumer");
    }

    try {
      await jsm.consumers.add(STREAMS.INVOICES, {
        name: CONSUMER_NAME,
        durable_name: CONSUMER_NAME,
        filter_subject: `${SUBJECTS.PROCESS_PREFIX}.>`,
        ack_policy: AckPolicy.Explicit,
        ack_wait: config.CONSUMER_ACK_WAIT_MS * NANOS_PER_MS,
        max_deliver: config.CONSUMER_MAX_DELIVER,
        max_ack_pending: config.CONSUMER_CONCURRENCY * 10,
        deliver_policy: DeliverPolicy.All,
        replay_policy: ReplayPolicy.Instant,
      });
      log.nats.info({ consumer: CONSUMER_NAME }, "Consumer created successfully");
    } catch (createError) {
      if (errorMessage(createError).includes("consumer name already in use")) {
        log.nats.info({ consumer: CONSUMER_NAME }, "Consumer was created by another worker");
      } else {
        throw createError;
      }
    }
  }

  getConnection(): NatsConnection {
    if (!this.nc) {
      throw new Error("NATS not connected");
    }
    return this.nc;
  }

  getJetStream(): JetStreamClient {
    if (!this.js) {
      throw new Error("JetStream not initialized");
    }
    return this.js;
  }

  getJetStreamManager(): JetStreamManager {
    if (!this.jsm) {
      throw new Error("JetStream Manager not initialized");
    }
    return this.jsm;
  }

  async close(): Promise<void> {
    this.isClosing = true;
    if (this.nc) {
      await this.nc.drain();
      log.nats.info({}, "NATS connection closed gracefully");
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.nc) return false;

    try {
      await this.nc.flush();
      return true;
    } catch (error) {
      log.nats.error({ error: errorMessage(error) }, "NATS health check failed");
      return false;
    }
  }
}

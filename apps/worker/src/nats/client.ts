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
import { config } from "@missive/config";
import { log } from "../logger.js";
import { readFileSync } from "node:fs";
import { calculateBackoff } from "../domain/utils/backoff.js";
import { describeCause } from "../errors.js";

export const DELIVERY_STREAM = "notifications";
export const DELIVERY_SUBJECT = "delivery.send";
export const DELIVERY_CONSUMER = "delivery-worker";

export class NatsClient {
  private nc: NatsConnection | null = null;
  private js: JetStreamClient | null = null;
  private isClosing = false;

  async connect(): Promise<void> {
    const servers = config.NATS_CLUSTER.split(",");
    const maxRetries = 10;

    const connectionOptions: ConnectionOptions = {
      servers,
      name: `missive-${config.WORKER_ID}`,
      reconnect: true,
      maxReconnectAttempts: -1,
      reconnectTimeWait: 2000,
      pingInterval: 30000,
      maxPingOut: 3,
    };

    if (config.NATS_TLS_ENABLED) {
      log.nats.info({}, "NATS TLS enabled");

      const tlsOptions: TlsOptions = {};

      if (config.NATS_TLS_CA_FILE) {
        tlsOptions.ca = readFileSync(config.NATS_TLS_CA_FILE, "utf-8");
        log.nats.debug({ caFile: config.NATS_TLS_CA_FILE }, "Loaded NATS CA certificate");
      }

      // Mutual TLS
      if (config.NATS_TLS_CERT_FILE && config.NATS_TLS_KEY_FILE) {
        tlsOptions.cert = readFileSync(config.NATS_TLS_CERT_FILE, "utf-8");
        tlsOptions.key = readFileSync(config.NATS_TLS_KEY_FILE, "utf-8");
        log.nats.debug({}, "Loaded NATS client certificate for mutual TLS");
      }

      connectionOptions.tls = tlsOptions;
    }

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        log.nats.info({ servers, attempt, maxRetries, tls: config.NATS_TLS_ENABLED }, "Connecting to NATS");

        const nc = await connect(connectionOptions);
        this.nc = nc;
        this.js = nc.jetstream();
        const jsm = await nc.jetstreamManager();

        void nc.closed().then(() => {
          if (!this.isClosing) {
            // Queued deliveries cannot proceed without the broker
            log.nats.error({}, "NATS connection closed unexpectedly, initiating graceful shutdown");
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

        await this.ensureStream(jsm);

        log.nats.info({}, "Connected to NATS and initialized JetStream");
        return;
      } catch (error) {
        if (attempt === maxRetries) {
          log.nats.error({ error, attempt }, "Failed to connect to NATS after all retries");
          throw error;
        }

        // 1s, 2s, 4s, ... capped at 32s, plus up to 20% jitter
        const delay = calculateBackoff(attempt - 1, { baseDelayMs: 1000, maxDelayMs: 32000, jitterFactor: 0.2 });
        log.nats.warn({ error, attempt, maxRetries, retryInMs: delay }, "NATS connection failed, retrying");

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  private async ensureStream(jsm: JetStreamManager): Promise<void> {
    try {
      await jsm.streams.info(DELIVERY_STREAM);
      log.nats.info({ stream: DELIVERY_STREAM }, "Stream already exists");
    } catch {
      log.nats.info({ stream: DELIVERY_STREAM }, "Creating stream");

      try {
        await jsm.streams.add({
          name: DELIVERY_STREAM,
          subjects: ["delivery.>"],
          retention: RetentionPolicy.Workqueue,
          storage: StorageType.File,
          num_replicas: config.NATS_REPLICAS,
          max_age: 24 * 60 * 60 * 1e9, // 24 hours in nanoseconds
          discard: DiscardPolicy.Old,
          duplicate_window: 2 * 60 * 1e9, // msgID dedup window
          deny_delete: true,
          deny_purge: true,
        });
        log.nats.info({ stream: DELIVERY_STREAM }, "Stream created");
      } catch (createError) {
        // Another worker won the race
        if (describeCause(createError).includes("stream name already in use")) {
          log.nats.info({ stream: DELIVERY_STREAM }, "Stream was created by another worker");
        } else {
          throw createError;
        }
      }
    }

    await this.ensureConsumer(jsm);
  }

  private async ensureConsumer(jsm: JetStreamManager): Promise<void> {
    try {
      await jsm.consumers.info(DELIVERY_STREAM, DELIVERY_CONSUMER);
      log.nats.debug({ consumer: DELIVERY_CONSUMER }, "Consumer already exists");
    } catch {
      log.nats.info({ consumer: DELIVERY_CONSUMER }, "Creating consumer");

      try {
        await jsm.consumers.add(DELIVERY_STREAM, {
          name: DELIVERY_CONSUMER,
          durable_name: DELIVERY_CONSUMER,
          filter_subject: DELIVERY_SUBJECT,
          ack_policy: AckPolicy.Explicit,
          // Must outlast one bounded transport call plus the log writes
          ack_wait: (config.TRANSPORT_TIMEOUT_MS + 20_000) * 1e6,
          max_deliver: config.DELIVERY_MAX_ATTEMPTS,
          max_ack_pending: config.DELIVERY_CONCURRENCY * 2,
          deliver_policy: DeliverPolicy.All,
          replay_policy: ReplayPolicy.Instant,
        });
        log.nats.info({ consumer: DELIVERY_CONSUMER }, "Consumer created");
      } catch (createError) {
        if (describeCause(createError).includes("consumer name already in use")) {
          log.nats.info({ consumer: DELIVERY_CONSUMER }, "Consumer was created by another worker");
        } else {
          throw createError;
        }
      }
    }
  }

  getJetStream(): JetStreamClient {
    if (!this.js) {
      throw new Error("JetStream not initialized");
    }
    return this.js;
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
      log.nats.error({ error }, "NATS health check failed");
      return false;
    }
  }
}

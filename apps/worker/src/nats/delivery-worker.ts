import { StringCodec, type ConsumerMessages, type JetStreamClient } from "nats";
import { z } from "zod";
import type { DeliveryJobHandler } from "../dispatch/job-handler.js";
import type { DeliveryJob } from "../dispatch/types.js";
import { calculateDeliveryBackoff } from "../domain/utils/backoff.js";
import { describeCause } from "../errors.js";
import { logFailure, withTraceAsync, type Logger } from "../logger.js";
import { deliveryRetriesTotal } from "../metrics.js";
import { DELIVERY_CONSUMER, DELIVERY_STREAM } from "./client.js";

const deliveryJobSchema = z.object({
  deliveryLogId: z.string().uuid(),
});

/**
 * The slice of a JetStream message the worker touches.
 */
export interface DeliveryMessage {
  data: Uint8Array;
  seq: number;
  headers?: { get(key: string): string };
  info: { redeliveryCount: number };
  ack(): void;
  nak(millis?: number): void;
  /** Resets the consumer's ack_wait timer */
  working(): void;
}

export interface DeliveryWorkerOptions {
  /** Matches the consumer's max_deliver */
  maxAttempts: number;
  concurrency: number;
  /** How often an in-flight job extends its ack deadline (default 10s) */
  heartbeatMs?: number;
}

/**
 * Consumes `delivery.send` jobs.
 *
 * Transport rejections are terminal and acked (the executor already wrote
 * FAILED). Anything thrown is an infrastructure problem: nak with backoff,
 * and on the last attempt mark the log FAILED so it does not stay PENDING.
 */
export class NatsDeliveryWorker {
  private sc = StringCodec();
  private messages: ConsumerMessages | null = null;
  private isShuttingDown = false;
  private inFlight = new Set<Promise<void>>();

  constructor(
    private handler: DeliveryJobHandler,
    private options: DeliveryWorkerOptions,
    private logger: Logger
  ) {}

  async start(js: JetStreamClient): Promise<void> {
    const consumer = await js.consumers.get(DELIVERY_STREAM, DELIVERY_CONSUMER);
    const messages = await consumer.consume({ max_messages: this.options.concurrency });
    this.messages = messages;

    this.logger.info(
      { consumer: DELIVERY_CONSUMER, concurrency: this.options.concurrency },
      "delivery worker started"
    );

    for await (const msg of messages) {
      if (this.isShuttingDown) break;

      // Backpressure
      if (this.inFlight.size >= this.options.concurrency) {
        msg.working();
        await Promise.race(this.inFlight);
      }

      const processing = this.process(msg).catch((error: unknown) => {
        logFailure(this.logger, "delivery message processing failed", error, { seq: msg.seq });
      });
      this.inFlight.add(processing);
      void processing.finally(() => this.inFlight.delete(processing));
    }

    if (this.inFlight.size > 0) {
      this.logger.info({ inFlight: this.inFlight.size }, "waiting for in-flight deliveries");
      await Promise.allSettled(this.inFlight);
    }
  }

  async stop(): Promise<void> {
    this.isShuttingDown = true;
    this.messages?.stop();
    await Promise.allSettled(this.inFlight);
  }

  /** Handles one message and always settles it with ack or nak */
  async process(msg: DeliveryMessage): Promise<void> {
    const job = this.parse(msg);
    if (!job) {
      // Redelivery would not make it parse
      msg.ack();
      return;
    }

    const traceId = msg.headers?.get("X-Trace-Id") || undefined;
    // Keep JetStream from redelivering while the transport call is running
    const heartbeat = setInterval(() => msg.working(), this.options.heartbeatMs ?? 10_000);

    try {
      await withTraceAsync(async () => {
        try {
          const result = await this.handler.handle(job);
          this.logger.debug({ deliveryLogId: job.deliveryLogId, status: result.status, seq: msg.seq }, "job done");
          msg.ack();
        } catch (error) {
          await this.onError(msg, job, error);
        }
      }, traceId);
    } finally {
      clearInterval(heartbeat);
    }
  }

  private async onError(msg: DeliveryMessage, job: DeliveryJob, error: unknown): Promise<void> {
    const attempt = msg.info.redeliveryCount;

    if (attempt < this.options.maxAttempts) {
      const delay = calculateDeliveryBackoff(attempt);
      deliveryRetriesTotal.inc();
      this.logger.warn(
        { deliveryLogId: job.deliveryLogId, attempt, retryInMs: delay, error: describeCause(error) },
        "delivery job failed, retrying"
      );
      msg.nak(delay);
      return;
    }

    try {
      await this.handler.handleExhausted(job, error);
    } catch (markError) {
      // Left PENDING; stale recovery picks it up
      logFailure(this.logger, "could not mark exhausted delivery failed", markError, {
        deliveryLogId: job.deliveryLogId,
        originalError: describeCause(error),
      });
    }
    msg.ack();
  }

  private parse(msg: DeliveryMessage): DeliveryJob | null {
    try {
      const result = deliveryJobSchema.safeParse(JSON.parse(this.sc.decode(msg.data)));
      if (result.success) return result.data;
      this.logger.error({ seq: msg.seq, issues: result.error.issues }, "invalid delivery job, dropping");
    } catch (error) {
      this.logger.error({ seq: msg.seq, error: describeCause(error) }, "unparseable delivery job, dropping");
    }
    return null;
  }
}

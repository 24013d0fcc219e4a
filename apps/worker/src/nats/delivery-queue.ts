import { StringCodec, headers as natsHeaders, type JetStreamClient } from "nats";
import type { Logger } from "../logger.js";
import { createTimer, getTraceId } from "../logger.js";
import type { DeliveryJob, DeliveryQueue } from "../dispatch/types.js";
import { DELIVERY_STREAM, DELIVERY_SUBJECT } from "./client.js";

/**
 * Publishes delivery jobs to JetStream. The log id doubles as msgID so a
 * retried publish inside the dedup window is not delivered twice.
 */
export class NatsDeliveryQueue implements DeliveryQueue {
  private sc = StringCodec();

  constructor(
    private js: Pick<JetStreamClient, "publish">,
    private logger: Logger
  ) {}

  async enqueue(job: DeliveryJob): Promise<void> {
    const timer = createTimer();

    // Resumed by the delivery worker
    const hdrs = natsHeaders();
    const traceId = getTraceId();
    if (traceId) {
      hdrs.set("X-Trace-Id", traceId);
    }

    try {
      const ack = await this.js.publish(DELIVERY_SUBJECT, this.sc.encode(JSON.stringify(job)), {
        msgID: `delivery-${job.deliveryLogId}`,
        headers: hdrs,
        expect: {
          streamName: DELIVERY_STREAM,
        },
      });

      this.logger.debug(
        { deliveryLogId: job.deliveryLogId, seq: ack.seq, duplicate: ack.duplicate, duration: timer() },
        "delivery enqueued"
      );
    } catch (error) {
      this.logger.error({ error, deliveryLogId: job.deliveryLogId }, "failed to enqueue delivery");
      throw error;
    }
  }
}

import type { DeliveryLog } from "@missive/db";
import { QueueError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { DeliveryLogStore } from "../stores/types.js";
import type { DispatchPreparer } from "./preparer.js";
import type { DeliveryQueue, DispatchRequest, Dispatcher } from "./types.js";

/**
 * Persists PENDING and hands the log id to the delivery queue. The caller
 * gets the PENDING log back; SENT/FAILED is only visible on a later read.
 */
export class QueuedDispatcher implements Dispatcher {
  readonly mode = "queued";

  constructor(
    private preparer: DispatchPreparer,
    private queue: DeliveryQueue,
    private deliveryLogs: DeliveryLogStore,
    private logger: Logger
  ) {}

  async dispatch(request: DispatchRequest): Promise<DeliveryLog> {
    const entry = await this.preparer.prepare(request);

    try {
      await this.queue.enqueue({ deliveryLogId: entry.id });
    } catch (cause) {
      const error = new QueueError({ deliveryLogId: entry.id, cause });
      await this.deliveryLogs.conditionalUpdate(entry.id, "pending", {
        status: "failed",
        errorMessage: error.message,
      });
      this.logger.error({ deliveryLogId: entry.id, error: error.message }, "enqueue failed");
      throw error;
    }

    this.logger.info({ deliveryLogId: entry.id, templateKey: entry.templateKey, to: entry.toAddress }, "queued");
    return entry;
  }
}

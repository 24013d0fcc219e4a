import { describeCause } from "../errors.js";
import type { Logger } from "../logger.js";
import type { DeliveryLogStore } from "../stores/types.js";
import type { DeliveryExecutor, DeliveryOutcome } from "./executor.js";
import type { DeliveryJob } from "./types.js";

export type JobResult =
  | DeliveryOutcome
  | { status: "missing"; log: null }
  | { status: "in-progress"; log: null };

/**
 * Queued half of a dispatch: load the log by id and deliver it.
 *
 * Logs that are no longer PENDING were handled by an earlier delivery of
 * the same job (or failed by recovery) and are acknowledged untouched.
 * A redelivery that arrives while this process is still sending the same
 * log is skipped, so the recipient is not mailed twice.
 */
export class DeliveryJobHandler {
  private claimed = new Set<string>();

  constructor(
    private deliveryLogs: DeliveryLogStore,
    private executor: DeliveryExecutor,
    private logger: Logger
  ) {}

  async handle(job: DeliveryJob): Promise<JobResult> {
    if (this.claimed.has(job.deliveryLogId)) {
      this.logger.warn({ deliveryLogId: job.deliveryLogId }, "delivery already in progress, skipping redelivered job");
      return { status: "in-progress", log: null };
    }

    this.claimed.add(job.deliveryLogId);
    try {
      return await this.deliver(job);
    } finally {
      this.claimed.delete(job.deliveryLogId);
    }
  }

  private async deliver(job: DeliveryJob): Promise<JobResult> {
    const entry = await this.deliveryLogs.get(job.deliveryLogId);

    if (!entry) {
      this.logger.error({ deliveryLogId: job.deliveryLogId }, "delivery log not found, dropping job");
      return { status: "missing", log: null };
    }

    if (entry.status !== "pending") {
      this.logger.debug({ deliveryLogId: entry.id, status: entry.status }, "already processed, skipping");
      return { status: "skipped", log: entry };
    }

    return this.executor.deliver(entry);
  }

  /**
   * Last delivery attempt failed with an unexpected error. The log must
   * not stay PENDING forever.
   */
  async handleExhausted(job: DeliveryJob, error: unknown): Promise<void> {
    const updated = await this.deliveryLogs.conditionalUpdate(job.deliveryLogId, "pending", {
      status: "failed",
      errorMessage: `Unexpected error in delivery worker: ${describeCause(error)}`,
    });

    if (updated) {
      this.logger.error({ deliveryLogId: job.deliveryLogId, error: describeCause(error) }, "retries exhausted, marked failed");
    }
  }
}

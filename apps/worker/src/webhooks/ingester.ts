import type { DeliveryStatus } from "@missive/db";
import { decideTransition, normalizeEventType } from "../domain/delivery/state-machine.js";
import type { Logger } from "../logger.js";
import { webhookCorrelationNotFoundTotal, webhookEventsTotal } from "../metrics.js";
import type { DeliveryLogStore } from "../stores/types.js";
import type { WebhookEvent } from "./events.js";

export type IngestOutcome =
  /** Status moved forward */
  | "applied"
  /** Only a timestamp was recorded */
  | "recorded"
  /** Timestamp was already set; nothing written */
  | "duplicate"
  /** Terminal log, or a bounce after delivery */
  | "rejected"
  /** Event name not recognized */
  | "ignored"
  /** No log carries the correlation id */
  | "unmatched"
  /** Status kept changing under every attempt */
  | "conflict";

export interface IngestResult {
  outcome: IngestOutcome;
  deliveryLogId?: string;
  status?: DeliveryStatus;
}

export interface WebhookIngesterOptions {
  /** Conditional-update attempts before giving up (default 5) */
  maxAttempts?: number;
  now?: () => Date;
}

/**
 * Applies provider events to delivery logs.
 *
 * Every write is a conditional update guarded by the status the decision
 * was made against. When another event moved the log first, the log is
 * re-read and the decision re-made, so concurrent events for one log
 * never lose an update or move status backward.
 */
export class WebhookIngester {
  private maxAttempts: number;
  private now: () => Date;

  constructor(
    private deliveryLogs: DeliveryLogStore,
    private logger: Logger,
    options: WebhookIngesterOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 5;
    this.now = options.now ?? (() => new Date());
  }

  async ingest(event: WebhookEvent): Promise<IngestResult> {
    const result = await this.apply(event);
    webhookEventsTotal.inc({
      event: normalizeEventType(event.eventType) ?? "unknown",
      outcome: result.outcome,
    });
    return result;
  }

  private async apply(event: WebhookEvent): Promise<IngestResult> {
    const { correlationId } = event;
    const type = normalizeEventType(event.eventType);

    if (!type) {
      this.logger.debug({ correlationId, event: event.eventType, provider: event.provider }, "unknown event, ignored");
      return { outcome: "ignored" };
    }

    const occurredAt = event.occurredAt ?? this.now();

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const entry = await this.deliveryLogs.findByCorrelationId(correlationId);

      if (!entry) {
        webhookCorrelationNotFoundTotal.inc();
        this.logger.warn({ correlationId, event: type, provider: event.provider }, "no delivery log for correlation id");
        return { outcome: "unmatched" };
      }

      const decision = decideTransition(entry, type, occurredAt);

      if (decision.action === "reject") {
        this.logger.info(
          { deliveryLogId: entry.id, correlationId, event: type, status: entry.status, reason: decision.reason },
          "transition rejected"
        );
        return { outcome: "rejected", deliveryLogId: entry.id, status: entry.status };
      }

      if (decision.action === "noop") {
        this.logger.debug({ deliveryLogId: entry.id, event: type }, "already recorded");
        return { outcome: "duplicate", deliveryLogId: entry.id, status: entry.status };
      }

      const updated = await this.deliveryLogs.conditionalUpdate(entry.id, decision.from, decision.patch);

      if (updated) {
        const outcome = decision.action === "advance" ? "applied" : "recorded";
        this.logger.info(
          { deliveryLogId: entry.id, correlationId, event: type, from: decision.from, status: updated.status },
          outcome === "applied" ? "status advanced" : "timestamp recorded"
        );
        return { outcome, deliveryLogId: entry.id, status: updated.status };
      }

      this.logger.debug({ deliveryLogId: entry.id, event: type, attempt }, "status changed concurrently, retrying");
    }

    this.logger.warn({ correlationId, event: type, attempts: this.maxAttempts }, "gave up after repeated conflicts");
    return { outcome: "conflict" };
  }
}

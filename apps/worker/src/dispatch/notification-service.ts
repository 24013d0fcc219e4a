import type { DeliveryLog } from "@missive/db";
import { NotificationError, describeCause } from "../errors.js";
import type { Logger } from "../logger.js";
import { notificationsDispatchedTotal } from "../metrics.js";
import type { RenderedContent } from "../domain/rendering/renderer.js";
import type { DeliveryLogStore } from "../stores/types.js";
import type { DispatchPreparer } from "./preparer.js";
import type { DispatchMode, DispatchRequest, Dispatcher } from "./types.js";

export const MAX_RECENT_DELIVERIES = 100;

export interface BulkDispatchRequest {
  templateKey: string;
  recipients: string[];
  context?: Record<string, unknown>;
  initiator?: string | null;
}

export interface BulkDispatchResult {
  totalSent: number;
  totalFailed: number;
  failedRecipients: string[];
  deliveryLogIds: string[];
}

export interface NotificationServiceDeps {
  immediate: Dispatcher;
  /** Absent when no queue is configured; queued calls then fall back to immediate */
  queued?: Dispatcher;
  preparer: DispatchPreparer;
  deliveryLogs: DeliveryLogStore;
  logger: Logger;
}

/**
 * Entry point for callers: picks the dispatch mode and adds the
 * operations built on top of single dispatch.
 */
export class NotificationService {
  constructor(private deps: NotificationServiceDeps) {}

  get queueAvailable(): boolean {
    return this.deps.queued !== undefined;
  }

  async dispatch(request: DispatchRequest, options: { mode?: DispatchMode } = {}): Promise<DeliveryLog> {
    const dispatcher = this.pick(options.mode ?? "immediate");

    try {
      const entry = await dispatcher.dispatch(request);
      notificationsDispatchedTotal.inc({
        mode: dispatcher.mode,
        outcome: dispatcher.mode === "queued" ? "accepted" : "sent",
      });
      return entry;
    } catch (error) {
      notificationsDispatchedTotal.inc({ mode: dispatcher.mode, outcome: outcomeOf(error) });
      throw error;
    }
  }

  /** Rendered parts for an active template; writes no log */
  async preview(templateKey: string, context: Record<string, unknown> = {}): Promise<RenderedContent> {
    const { content } = await this.deps.preparer.render(templateKey, context);
    return content;
  }

  /**
   * Immediate dispatch per recipient, in order. A failing recipient is
   * counted and the rest still go out.
   */
  async sendBulk(request: BulkDispatchRequest): Promise<BulkDispatchResult> {
    const result: BulkDispatchResult = {
      totalSent: 0,
      totalFailed: 0,
      failedRecipients: [],
      deliveryLogIds: [],
    };

    for (const to of request.recipients) {
      try {
        const entry = await this.deps.immediate.dispatch({
          templateKey: request.templateKey,
          to,
          context: request.context,
          initiator: request.initiator,
        });
        result.totalSent++;
        result.deliveryLogIds.push(entry.id);
        notificationsDispatchedTotal.inc({ mode: "bulk", outcome: "sent" });
      } catch (error) {
        result.totalFailed++;
        result.failedRecipients.push(to);
        if (error instanceof NotificationError && error.deliveryLogId) {
          result.deliveryLogIds.push(error.deliveryLogId);
        }
        notificationsDispatchedTotal.inc({ mode: "bulk", outcome: outcomeOf(error) });
        this.deps.logger.warn(
          { templateKey: request.templateKey, to, error: describeCause(error) },
          "bulk recipient failed"
        );
      }
    }

    this.deps.logger.info(
      { templateKey: request.templateKey, sent: result.totalSent, failed: result.totalFailed },
      "bulk dispatch complete"
    );
    return result;
  }

  async getDelivery(id: string): Promise<DeliveryLog | null> {
    return this.deps.deliveryLogs.get(id);
  }

  async listRecentDeliveries(limit = 20): Promise<DeliveryLog[]> {
    const bounded = Math.min(Math.max(1, Math.floor(limit)), MAX_RECENT_DELIVERIES);
    return this.deps.deliveryLogs.listRecent(bounded);
  }

  private pick(mode: DispatchMode): Dispatcher {
    if (mode === "queued" && this.deps.queued) return this.deps.queued;
    return this.deps.immediate;
  }
}

function outcomeOf(error: unknown): string {
  if (!(error instanceof NotificationError)) return "failed";
  switch (error.code) {
    case "TEMPLATE_NOT_FOUND":
      return "not_found";
    case "RENDER_ERROR":
      return "render_error";
    case "QUEUE_ERROR":
      return "queue_error";
    default:
      return "failed";
  }
}

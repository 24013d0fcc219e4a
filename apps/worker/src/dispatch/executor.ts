import type { DeliveryLog } from "@missive/db";
import { TransportError, describeCause } from "../errors.js";
import type { Logger } from "../logger.js";
import { deliveriesTotal, startTimer, transportSendDuration } from "../metrics.js";
import type { EmailProvider, SendEmailResult } from "../providers/types.js";
import type { DeliveryLogStore } from "../stores/types.js";
import { TimeoutError, withTimeout } from "../domain/utils/timeout.js";

export interface DeliveryExecutorDeps {
  provider: EmailProvider;
  deliveryLogs: DeliveryLogStore;
  /** Upper bound on one transport call */
  timeoutMs: number;
  logger: Logger;
  now?: () => Date;
}

export type DeliveryOutcome =
  | { status: "sent"; log: DeliveryLog }
  | { status: "failed"; log: DeliveryLog; error: TransportError }
  /** The log was no longer PENDING when the transport result came back */
  | { status: "skipped"; log: DeliveryLog | null };

interface TransportAttempt {
  result: SendEmailResult;
  timedOut: boolean;
  cause?: unknown;
}

/**
 * Hands a PENDING log to the transport and records SENT or FAILED.
 * Shared by the immediate dispatcher and the queued delivery worker.
 */
export class DeliveryExecutor {
  private now: () => Date;

  constructor(private deps: DeliveryExecutorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async deliver(entry: DeliveryLog): Promise<DeliveryOutcome> {
    const { provider, deliveryLogs, logger } = this.deps;
    const attempt = await this.transmit(entry);

    if (attempt.result.success) {
      const correlationId = attempt.result.providerMessageId ?? null;
      const updated = await deliveryLogs.conditionalUpdate(entry.id, "pending", {
        status: "sent",
        sentAt: this.now(),
        correlationId,
      });

      if (!updated) {
        return { status: "skipped", log: await this.keepLateCorrelation(entry.id, correlationId) };
      }
      if (!correlationId) {
        logger.warn({ deliveryLogId: entry.id, provider: provider.name }, "transport returned no message id");
      }

      deliveriesTotal.inc({ provider: provider.name, status: "sent" });
      logger.info({ deliveryLogId: entry.id, to: entry.toAddress, provider: provider.name, correlationId }, "sent");
      return { status: "sent", log: updated };
    }

    const reason = attempt.timedOut
      ? `Transport timed out after ${this.deps.timeoutMs}ms`
      : attempt.result.error ?? "Unknown transport error";

    const error = new TransportError({
      deliveryLogId: entry.id,
      provider: provider.name,
      reason,
      timedOut: attempt.timedOut,
      cause: attempt.cause,
    });

    const updated = await deliveryLogs.conditionalUpdate(entry.id, "pending", {
      status: "failed",
      errorMessage: reason,
    });

    if (!updated) {
      logger.warn({ deliveryLogId: entry.id, error: reason }, "transport failed, but log was no longer pending");
      return { status: "skipped", log: await deliveryLogs.get(entry.id) };
    }

    deliveriesTotal.inc({ provider: provider.name, status: "failed" });
    logger.error(
      { deliveryLogId: entry.id, to: entry.toAddress, provider: provider.name, error: reason, timedOut: attempt.timedOut },
      "transport failed"
    );
    return { status: "failed", log: updated, error };
  }

  /**
   * The transport accepted a message for a log that stale recovery already
   * failed. The message id stays on the row so its webhooks still correlate.
   */
  private async keepLateCorrelation(id: string, correlationId: string | null): Promise<DeliveryLog | null> {
    const { deliveryLogs, logger } = this.deps;
    const current = await deliveryLogs.get(id);
    logger.warn(
      { deliveryLogId: id, correlationId, status: current?.status ?? null },
      "sent, but log was no longer pending"
    );

    if (!current || !correlationId || current.status !== "failed" || current.correlationId !== null) {
      return current;
    }
    const updated = await deliveryLogs.conditionalUpdate(id, "failed", { correlationId });
    return updated ?? current;
  }

  /**
   * One bounded transport call. Thrown errors and timeouts become a failed result.
   */
  private async transmit(entry: DeliveryLog): Promise<TransportAttempt> {
    const { provider, timeoutMs } = this.deps;
    const endTimer = startTimer(transportSendDuration, { provider: provider.name });

    try {
      const result = await withTimeout(
        provider.send({
          to: entry.toAddress,
          from: entry.fromAddress,
          cc: entry.cc,
          bcc: entry.bcc,
          subject: entry.subject,
          html: entry.htmlBody || undefined,
          text: entry.textBody,
          reference: entry.id,
        }),
        timeoutMs,
        `${provider.name} send`
      );
      endTimer({ status: result.success ? "success" : "failure" });
      return { result, timedOut: false };
    } catch (error) {
      const timedOut = error instanceof TimeoutError;
      endTimer({ status: timedOut ? "timeout" : "failure" });
      return {
        result: { success: false, error: describeCause(error) },
        timedOut,
        cause: error,
      };
    }
  }
}

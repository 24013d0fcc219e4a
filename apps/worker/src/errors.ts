/**
 * Typed failures of the notification pipeline.
 *
 * Every error carries a stable `code` and the HTTP status the API maps it to,
 * so route handlers and the global error handler never inspect messages.
 */

export interface ErrorResponse {
  error: string;
  code: string;
  deliveryLogId?: string;
}

export abstract class NotificationError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly deliveryLogId?: string;

  protected constructor(message: string, options: { cause?: unknown; deliveryLogId?: string } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.deliveryLogId = options.deliveryLogId;
  }

  toResponse(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.deliveryLogId ? { deliveryLogId: this.deliveryLogId } : {}),
    };
  }
}

/**
 * No active template exists for the key. Dispatch aborts before any log is written.
 */
export class TemplateNotFoundError extends NotificationError {
  readonly code = "TEMPLATE_NOT_FOUND";
  readonly statusCode = 404;

  constructor(readonly templateKey: string) {
    super(`Template "${templateKey}" not found or inactive`);
  }
}

export type TemplatePart = "subject" | "html" | "text" | "context";

/**
 * Template syntax or expansion failure, or a context that cannot be stored.
 */
export class RenderError extends NotificationError {
  readonly code = "RENDER_ERROR";
  readonly statusCode = 422;
  readonly templateKey: string;
  readonly part: TemplatePart;

  constructor(params: { templateKey: string; part: TemplatePart; cause: unknown; deliveryLogId?: string }) {
    super(`Failed to render ${params.part} of template "${params.templateKey}": ${describeCause(params.cause)}`, {
      cause: params.cause,
      deliveryLogId: params.deliveryLogId,
    });
    this.templateKey = params.templateKey;
    this.part = params.part;
  }

  /** Same failure, bound to the FAILED log written for it */
  withDeliveryLog(deliveryLogId: string): RenderError {
    return new RenderError({
      templateKey: this.templateKey,
      part: this.part,
      cause: this.cause,
      deliveryLogId,
    });
  }
}

/**
 * The transport rejected the message, threw, or did not answer in time.
 * The delivery log is already FAILED when this is raised.
 */
export class TransportError extends NotificationError {
  readonly code = "TRANSPORT_ERROR";
  readonly statusCode = 502;
  readonly provider: string;
  readonly timedOut: boolean;

  constructor(params: { deliveryLogId: string; provider: string; reason: string; timedOut?: boolean; cause?: unknown }) {
    super(params.reason, { cause: params.cause, deliveryLogId: params.deliveryLogId });
    this.provider = params.provider;
    this.timedOut = params.timedOut ?? false;
  }
}

/**
 * A queued dispatch could not be handed to the queue. The log is FAILED.
 */
export class QueueError extends NotificationError {
  readonly code = "QUEUE_ERROR";
  readonly statusCode = 503;

  constructor(params: { deliveryLogId: string; cause: unknown }) {
    super(`Enqueue failed: ${describeCause(params.cause)}`, {
      cause: params.cause,
      deliveryLogId: params.deliveryLogId,
    });
  }
}

/**
 * Webhook body is not JSON, or not a JSON object.
 */
export class MalformedWebhookPayloadError extends NotificationError {
  readonly code = "MALFORMED_WEBHOOK_PAYLOAD";
  readonly statusCode = 400;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return String(cause);
}

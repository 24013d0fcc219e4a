import { z } from "zod";
import { MalformedWebhookPayloadError, describeCause } from "../errors.js";

// =============================================================================
// Webhook Event Types
// =============================================================================

export interface WebhookEvent {
  provider: "generic" | "resend";
  /** Event name as the provider sent it; normalized by the ingester */
  eventType: string;
  /** The transport's message id, matched against DeliveryLog.correlationId */
  correlationId: string;
  /** When the provider says the event happened */
  occurredAt?: Date;
}

export type WebhookPayload = Record<string, unknown>;

// =============================================================================
// Payload parsing
// =============================================================================

/**
 * Parse a raw webhook body. Anything that is not a JSON object is malformed.
 */
export function parseWebhookBody(raw: string): WebhookPayload {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedWebhookPayloadError(describeCause(error), error);
  }

  if (!isPlainObject(parsed)) {
    throw new MalformedWebhookPayloadError("Payload must be a JSON object");
  }
  return parsed;
}

function isPlainObject(value: unknown): value is WebhookPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Below this a numeric timestamp is read as seconds, above it as milliseconds */
const EPOCH_MS_THRESHOLD = 1e12;

/**
 * Event time from an ISO string, epoch seconds or epoch milliseconds
 * (numeric strings included). Undefined when absent or unreadable.
 */
export function parseEventTimestamp(value: unknown): Date | undefined {
  if (typeof value === "number") return fromEpoch(value);
  if (typeof value !== "string" || value.trim() === "") return undefined;

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) return fromEpoch(Number(trimmed));

  const ms = Date.parse(trimmed);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

function fromEpoch(value: number): Date | undefined {
  if (!Number.isFinite(value) || value < 0) return undefined;
  return new Date(value < EPOCH_MS_THRESHOLD ? value * 1000 : value);
}

// =============================================================================
// Provider payload shapes
// =============================================================================

const genericEventSchema = z.object({
  event: z.string().min(1),
  message_id: z.string().min(1),
  timestamp: z.union([z.string(), z.number()]).optional(),
  created_at: z.union([z.string(), z.number()]).optional(),
});

const resendEventSchema = z.object({
  type: z.string().min(1),
  created_at: z.string().optional(),
  data: z.object({
    email_id: z.string().min(1),
  }),
});

// =============================================================================
// Webhook Event Factory
// =============================================================================

/**
 * Turns provider payloads into WebhookEvents. Returns null for a payload
 * that is an object but carries no usable event (answered 200, no-op).
 */
export class WebhookEventFactory {
  /**
   * `{"event": "...", "message_id": "...", "timestamp"?: ...}`
   */
  static fromGeneric(payload: WebhookPayload): WebhookEvent | null {
    const result = genericEventSchema.safeParse(payload);
    if (!result.success) return null;

    const { event, message_id, timestamp, created_at } = result.data;
    return {
      provider: "generic",
      eventType: event,
      correlationId: message_id,
      occurredAt: parseEventTimestamp(timestamp ?? created_at),
    };
  }

  /**
   * `{"type": "email.delivered", "created_at": "...", "data": {"email_id": "..."}}`
   */
  static fromResend(payload: WebhookPayload): WebhookEvent | null {
    const result = resendEventSchema.safeParse(payload);
    if (!result.success) return null;

    return {
      provider: "resend",
      eventType: result.data.type,
      correlationId: result.data.data.email_id,
      occurredAt: parseEventTimestamp(result.data.created_at),
    };
  }
}

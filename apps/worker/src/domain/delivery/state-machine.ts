/**
 * Delivery status state machine.
 *
 * Pure decision logic: given a log's current status and timestamps and an
 * incoming provider event, decide what (if anything) to write. Persistence
 * applies the decision with a conditional update guarded by the status the
 * decision was made against.
 */

import type { DeliveryLog, DeliveryStatus } from "@missive/db";

// =============================================================================
// Statuses and events
// =============================================================================

/** Provider events that map onto a delivery status */
export const WEBHOOK_EVENT_TYPES = ["sent", "delivered", "opened", "clicked", "bounced"] as const;
export type WebhookEventType = (typeof WEBHOOK_EVENT_TYPES)[number];

export const TERMINAL_STATUSES: readonly DeliveryStatus[] = ["failed", "bounced"];

/** Normal lifecycle order; terminal statuses sit outside it */
const PRECEDENCE: Record<Exclude<DeliveryStatus, "failed" | "bounced">, number> = {
  pending: 0,
  sent: 1,
  delivered: 2,
  opened: 3,
  clicked: 4,
};

/** Statuses a bounce may interrupt */
const BOUNCEABLE: readonly DeliveryStatus[] = ["pending", "sent"];

export type TimestampField = "sentAt" | "deliveredAt" | "openedAt" | "clickedAt" | "bouncedAt";

export const EVENT_TIMESTAMP_FIELD: Record<WebhookEventType, TimestampField> = {
  sent: "sentAt",
  delivered: "deliveredAt",
  opened: "openedAt",
  clicked: "clickedAt",
  bounced: "bouncedAt",
};

export function isTerminal(status: DeliveryStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Lifecycle position of a status, or null for terminal statuses.
 */
export function precedenceOf(status: DeliveryStatus): number | null {
  if (status === "failed" || status === "bounced") return null;
  return PRECEDENCE[status];
}

/**
 * Map a provider event name onto a known event type.
 * Case-insensitive; accepts the "email." prefix Resend uses.
 * Returns null for anything else (including "failed", which only the
 * dispatcher may set).
 */
export function normalizeEventType(raw: string): WebhookEventType | null {
  const name = raw.trim().toLowerCase().replace(/^email\./, "");
  return WEBHOOK_EVENT_TYPES.find((type) => type === name) ?? null;
}

// =============================================================================
// Transition decision
// =============================================================================

export interface TransitionPatch {
  status?: DeliveryStatus;
  sentAt?: Date;
  deliveredAt?: Date;
  openedAt?: Date;
  clickedAt?: Date;
  bouncedAt?: Date;
}

export type TransitionDecision =
  /** Move status forward and stamp the event's timestamp */
  | { action: "advance"; from: DeliveryStatus; to: DeliveryStatus; patch: TransitionPatch }
  /** Keep status, stamp the event's timestamp (late lower-precedence event) */
  | { action: "record"; from: DeliveryStatus; patch: TransitionPatch }
  /** Nothing to write */
  | { action: "reject"; from: DeliveryStatus; reason: "terminal" | "bounce-after-delivery" }
  | { action: "noop"; from: DeliveryStatus; reason: "already-recorded" };

function stamp(field: TimestampField, at: Date, base: TransitionPatch = {}): TransitionPatch {
  const patch: TransitionPatch = { ...base };
  patch[field] = at;
  return patch;
}

export type TransitionSubject = Pick<DeliveryLog, "status" | TimestampField>;

/**
 * Decide how an event changes a delivery log.
 *
 * - FAILED/BOUNCED logs accept nothing.
 * - A bounce moves PENDING/SENT to BOUNCED; later statuses reject it.
 * - A higher-precedence event advances status and sets its timestamp.
 * - An equal or lower-precedence event only sets its timestamp, and only
 *   if that timestamp is still unset.
 */
export function decideTransition(
  log: TransitionSubject,
  event: WebhookEventType,
  occurredAt: Date
): TransitionDecision {
  const from = log.status;
  const field = EVENT_TIMESTAMP_FIELD[event];

  if (isTerminal(from)) {
    return { action: "reject", from, reason: "terminal" };
  }

  if (event === "bounced") {
    if (!BOUNCEABLE.includes(from)) {
      return { action: "reject", from, reason: "bounce-after-delivery" };
    }
    return { action: "advance", from, to: "bounced", patch: stamp(field, occurredAt, { status: "bounced" }) };
  }

  const current = precedenceOf(from) ?? 0;
  const target = PRECEDENCE[event];

  if (target > current) {
    return {
      action: "advance",
      from,
      to: event,
      patch: log[field] === null ? stamp(field, occurredAt, { status: event }) : { status: event },
    };
  }

  if (log[field] !== null) {
    return { action: "noop", from, reason: "already-recorded" };
  }

  return { action: "record", from, patch: stamp(field, occurredAt) };
}

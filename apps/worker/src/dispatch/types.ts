import type { DeliveryLog } from "@missive/db";

export type DispatchMode = "immediate" | "queued";

export interface DispatchRequest {
  templateKey: string;
  to: string;
  context?: Record<string, unknown>;
  /** Overrides the configured default sender */
  from?: string;
  cc?: string[];
  bcc?: string[];
  /** Identity of the caller, stored on the log */
  initiator?: string | null;
}

/**
 * resolve -> render -> persist PENDING -> transmit -> persist SENT/FAILED.
 * Not idempotent: every call writes a new delivery log.
 */
export interface Dispatcher {
  readonly mode: DispatchMode;
  dispatch(request: DispatchRequest): Promise<DeliveryLog>;
}

// =============================================================================
// Queue
// =============================================================================

export interface DeliveryJob {
  deliveryLogId: string;
}

export interface DeliveryQueue {
  /** Resolves once the broker has accepted the job */
  enqueue(job: DeliveryJob): Promise<void>;
}

/**
 * Persistence contracts for templates and delivery logs.
 *
 * Each interface has a Drizzle implementation for production and an
 * in-memory one for tests and local tooling.
 */

import type { DeliveryLog, DeliveryStatus, EmailTemplate } from "@missive/db";

// =============================================================================
// Templates
// =============================================================================

export interface TemplateInput {
  key: string;
  name: string;
  description?: string | null;
  category?: string;
  language?: string;
  subjectTemplate: string;
  htmlTemplate?: string;
  textTemplate?: string;
  isActive?: boolean;
  declaredVariables?: string[];
}

export interface TemplateListFilter {
  /** Default true */
  activeOnly?: boolean;
  category?: string;
}

export interface TemplateStore {
  /**
   * Active template for an exact, case-sensitive key.
   * @throws TemplateNotFoundError when absent or inactive
   */
  resolve(key: string): Promise<EmailTemplate>;

  /** Template regardless of active flag */
  get(key: string): Promise<EmailTemplate | null>;

  /** Ordered by category, then name */
  list(filter?: TemplateListFilter): Promise<EmailTemplate[]>;

  /** Create or edit by key */
  save(input: TemplateInput, actor?: string | null): Promise<EmailTemplate>;

  /** Returns null when no template has the key */
  deactivate(key: string, actor?: string | null): Promise<EmailTemplate | null>;
}

// =============================================================================
// Delivery logs
// =============================================================================

export interface NewDeliveryLogInput {
  templateId: string | null;
  templateKey: string;
  toAddress: string;
  fromAddress: string;
  cc: string[];
  bcc: string[];
  subject: string;
  htmlBody: string;
  textBody: string;
  status: Extract<DeliveryStatus, "pending" | "failed">;
  contextData: Record<string, unknown>;
  initiator: string | null;
  errorMessage?: string | null;
}

/**
 * Fields a conditional update may write. Timestamp fields are set only
 * while still null; a later write for the same field is ignored.
 */
export interface DeliveryLogPatch {
  status?: DeliveryStatus;
  correlationId?: string | null;
  errorMessage?: string | null;
  sentAt?: Date;
  deliveredAt?: Date;
  openedAt?: Date;
  clickedAt?: Date;
  bouncedAt?: Date;
}

export interface DeliveryLogStore {
  create(input: NewDeliveryLogInput): Promise<DeliveryLog>;

  get(id: string): Promise<DeliveryLog | null>;

  /** Most recent log handed to the transport under this id */
  findByCorrelationId(correlationId: string): Promise<DeliveryLog | null>;

  /** Newest first */
  listRecent(limit: number): Promise<DeliveryLog[]>;

  /** PENDING logs created before `olderThan`, oldest first */
  findStalePending(olderThan: Date, limit: number): Promise<DeliveryLog[]>;

  /**
   * Atomically apply `patch` if the stored status still equals
   * `expectedStatus`. Returns the updated log, or null when the status
   * moved on (or the log does not exist).
   */
  conditionalUpdate(id: string, expectedStatus: DeliveryStatus, patch: DeliveryLogPatch): Promise<DeliveryLog | null>;
}

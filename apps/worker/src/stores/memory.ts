/**
 * In-memory stores (for tests and local tooling).
 *
 * Every method is async and returns copies, so callers interleave and
 * observe each other's writes the same way they would against Postgres.
 */

import { randomUUID } from "node:crypto";
import type { DeliveryLog, DeliveryStatus, EmailTemplate } from "@missive/db";
import { TemplateNotFoundError } from "../errors.js";
import type {
  DeliveryLogPatch,
  DeliveryLogStore,
  NewDeliveryLogInput,
  TemplateInput,
  TemplateListFilter,
  TemplateStore,
} from "./types.js";

const TIMESTAMP_FIELDS = ["sentAt", "deliveredAt", "openedAt", "clickedAt", "bouncedAt"] as const;

export class InMemoryTemplateStore implements TemplateStore {
  private templates = new Map<string, EmailTemplate>();

  constructor(private now: () => Date = () => new Date()) {}

  async resolve(key: string): Promise<EmailTemplate> {
    const template = this.templates.get(key);
    if (!template || !template.isActive) {
      throw new TemplateNotFoundError(key);
    }
    return structuredClone(template);
  }

  async get(key: string): Promise<EmailTemplate | null> {
    const template = this.templates.get(key);
    return template ? structuredClone(template) : null;
  }

  async list(filter: TemplateListFilter = {}): Promise<EmailTemplate[]> {
    const activeOnly = filter.activeOnly ?? true;
    return [...this.templates.values()]
      .filter((t) => (activeOnly ? t.isActive : true))
      .filter((t) => (filter.category ? t.category === filter.category : true))
      .sort((a, b) => a.category.localeCompare(b.category) || a.name.localeCompare(b.name))
      .map((t) => structuredClone(t));
  }

  async save(input: TemplateInput, actor: string | null = null): Promise<EmailTemplate> {
    const existing = this.templates.get(input.key);
    const now = this.now();

    const template: EmailTemplate = {
      id: existing?.id ?? randomUUID(),
      key: input.key,
      name: input.name,
      description: input.description ?? null,
      category: input.category ?? "general",
      language: input.language ?? "en",
      subjectTemplate: input.subjectTemplate,
      htmlTemplate: input.htmlTemplate ?? "",
      textTemplate: input.textTemplate ?? "",
      isActive: input.isActive ?? true,
      declaredVariables: input.declaredVariables ?? [],
      createdBy: existing ? existing.createdBy : actor,
      updatedBy: actor,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    this.templates.set(template.key, template);
    return structuredClone(template);
  }

  async deactivate(key: string, actor: string | null = null): Promise<EmailTemplate | null> {
    const existing = this.templates.get(key);
    if (!existing) return null;

    const updated: EmailTemplate = { ...existing, isActive: false, updatedBy: actor, updatedAt: this.now() };
    this.templates.set(key, updated);
    return structuredClone(updated);
  }
}

export class InMemoryDeliveryLogStore implements DeliveryLogStore {
  private logs = new Map<string, DeliveryLog>();

  constructor(private now: () => Date = () => new Date()) {}

  async create(input: NewDeliveryLogInput): Promise<DeliveryLog> {
    const now = this.now();
    const entry: DeliveryLog = {
      id: randomUUID(),
      templateId: input.templateId,
      templateKey: input.templateKey,
      toAddress: input.toAddress,
      fromAddress: input.fromAddress,
      cc: [...input.cc],
      bcc: [...input.bcc],
      subject: input.subject,
      htmlBody: input.htmlBody,
      textBody: input.textBody,
      status: input.status,
      correlationId: null,
      contextData: structuredClone(input.contextData),
      initiator: input.initiator,
      errorMessage: input.errorMessage ?? null,
      createdAt: now,
      updatedAt: now,
      sentAt: null,
      deliveredAt: null,
      openedAt: null,
      clickedAt: null,
      bouncedAt: null,
    };

    this.logs.set(entry.id, entry);
    return structuredClone(entry);
  }

  async get(id: string): Promise<DeliveryLog | null> {
    const entry = this.logs.get(id);
    return entry ? structuredClone(entry) : null;
  }

  async findByCorrelationId(correlationId: string): Promise<DeliveryLog | null> {
    let match: DeliveryLog | null = null;
    for (const entry of this.logs.values()) {
      if (entry.correlationId === correlationId && (!match || entry.createdAt >= match.createdAt)) {
        match = entry;
      }
    }
    return match ? structuredClone(match) : null;
  }

  async listRecent(limit: number): Promise<DeliveryLog[]> {
    return this.sortedByCreation()
      .reverse()
      .slice(0, limit)
      .map((entry) => structuredClone(entry));
  }

  async findStalePending(olderThan: Date, limit: number): Promise<DeliveryLog[]> {
    return this.sortedByCreation()
      .filter((entry) => entry.status === "pending" && entry.createdAt < olderThan)
      .slice(0, limit)
      .map((entry) => structuredClone(entry));
  }

  async conditionalUpdate(
    id: string,
    expectedStatus: DeliveryStatus,
    patch: DeliveryLogPatch
  ): Promise<DeliveryLog | null> {
    const entry = this.logs.get(id);
    if (!entry || entry.status !== expectedStatus) {
      return null;
    }

    const updated: DeliveryLog = { ...entry, updatedAt: this.now() };
    if (patch.status !== undefined) updated.status = patch.status;
    if (patch.correlationId !== undefined) updated.correlationId = patch.correlationId;
    if (patch.errorMessage !== undefined) updated.errorMessage = patch.errorMessage;
    for (const field of TIMESTAMP_FIELDS) {
      const value = patch[field];
      if (value !== undefined && updated[field] === null) {
        updated[field] = value;
      }
    }

    this.logs.set(id, updated);
    return structuredClone(updated);
  }

  /** Test helper: current row count */
  get size(): number {
    return this.logs.size;
  }

  private sortedByCreation(): DeliveryLog[] {
    // Map preserves insertion order, which breaks ties between equal timestamps
    return [...this.logs.values()].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}

import { and, asc, desc, eq, lt, sql } from "drizzle-orm";
import type { PgColumn, PgUpdateSetSource } from "drizzle-orm/pg-core";
import { deliveryLogs, type Database, type DeliveryLog, type DeliveryStatus } from "@missive/db";
import type { DeliveryLogPatch, DeliveryLogStore, NewDeliveryLogInput } from "./types.js";

/** Keeps the first value written to a timestamp column */
function setOnce(column: PgColumn, value: Date) {
  return sql`coalesce(${column}, ${value.toISOString()}::timestamp)`;
}

export class DrizzleDeliveryLogStore implements DeliveryLogStore {
  constructor(private db: Database) {}

  async create(input: NewDeliveryLogInput): Promise<DeliveryLog> {
    const [entry] = await this.db
      .insert(deliveryLogs)
      .values({
        templateId: input.templateId,
        templateKey: input.templateKey,
        toAddress: input.toAddress,
        fromAddress: input.fromAddress,
        cc: input.cc,
        bcc: input.bcc,
        subject: input.subject,
        htmlBody: input.htmlBody,
        textBody: input.textBody,
        status: input.status,
        contextData: input.contextData,
        initiator: input.initiator,
        errorMessage: input.errorMessage ?? null,
      })
      .returning();

    if (!entry) {
      throw new Error("Insert into delivery_logs returned no row");
    }
    return entry;
  }

  async get(id: string): Promise<DeliveryLog | null> {
    const entry = await this.db.query.deliveryLogs.findFirst({
      where: eq(deliveryLogs.id, id),
    });
    return entry ?? null;
  }

  async findByCorrelationId(correlationId: string): Promise<DeliveryLog | null> {
    const entry = await this.db.query.deliveryLogs.findFirst({
      where: eq(deliveryLogs.correlationId, correlationId),
      orderBy: [desc(deliveryLogs.createdAt)],
    });
    return entry ?? null;
  }

  async listRecent(limit: number): Promise<DeliveryLog[]> {
    return this.db.query.deliveryLogs.findMany({
      orderBy: [desc(deliveryLogs.createdAt)],
      limit,
    });
  }

  async findStalePending(olderThan: Date, limit: number): Promise<DeliveryLog[]> {
    return this.db.query.deliveryLogs.findMany({
      where: and(eq(deliveryLogs.status, "pending"), lt(deliveryLogs.createdAt, olderThan)),
      orderBy: [asc(deliveryLogs.createdAt)],
      limit,
    });
  }

  async conditionalUpdate(
    id: string,
    expectedStatus: DeliveryStatus,
    patch: DeliveryLogPatch
  ): Promise<DeliveryLog | null> {
    const [entry] = await buildConditionalUpdate(this.db, id, expectedStatus, patch);
    return entry ?? null;
  }
}

/**
 * Single UPDATE ... WHERE id = $1 AND status = $2 RETURNING *, so two
 * webhook events for the same log can never interleave their writes.
 */
export function buildConditionalUpdate(
  db: Database,
  id: string,
  expectedStatus: DeliveryStatus,
  patch: DeliveryLogPatch,
  now: Date = new Date()
) {
  const set: PgUpdateSetSource<typeof deliveryLogs> = { updatedAt: now };

  if (patch.status !== undefined) set.status = patch.status;
  if (patch.correlationId !== undefined) set.correlationId = patch.correlationId;
  if (patch.errorMessage !== undefined) set.errorMessage = patch.errorMessage;
  if (patch.sentAt) set.sentAt = setOnce(deliveryLogs.sentAt, patch.sentAt);
  if (patch.deliveredAt) set.deliveredAt = setOnce(deliveryLogs.deliveredAt, patch.deliveredAt);
  if (patch.openedAt) set.openedAt = setOnce(deliveryLogs.openedAt, patch.openedAt);
  if (patch.clickedAt) set.clickedAt = setOnce(deliveryLogs.clickedAt, patch.clickedAt);
  if (patch.bouncedAt) set.bouncedAt = setOnce(deliveryLogs.bouncedAt, patch.bouncedAt);

  return db
    .update(deliveryLogs)
    .set(set)
    .where(and(eq(deliveryLogs.id, id), eq(deliveryLogs.status, expectedStatus)))
    .returning();
}

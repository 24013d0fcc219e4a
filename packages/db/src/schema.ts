import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  boolean,
  jsonb,
  index,
  pgEnum,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Enums
export const deliveryStatusEnum = pgEnum("delivery_status", [
  "pending",
  "sent",
  "failed",
  "delivered",
  "opened",
  "clicked",
  "bounced",
]);

export type DeliveryStatus = (typeof deliveryStatusEnum.enumValues)[number];

// Notification templates, keyed by a stable caller-facing key
export const emailTemplates = pgTable(
  "email_templates",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    key: varchar("key", { length: 100 }).notNull().unique(),
    name: varchar("name", { length: 255 }).notNull(),
    description: text("description"),
    category: varchar("category", { length: 50 }).default("general").notNull(),
    language: varchar("language", { length: 10 }).default("en").notNull(),
    subjectTemplate: varchar("subject_template", { length: 500 }).notNull(),
    htmlTemplate: text("html_template").default("").notNull(),
    textTemplate: text("text_template").default("").notNull(),
    isActive: boolean("is_active").default(true).notNull(),
    // Documentation only; rendering does not enforce it
    declaredVariables: jsonb("declared_variables").$type<string[]>().default([]).notNull(),
    createdBy: varchar("created_by", { length: 255 }),
    updatedBy: varchar("updated_by", { length: 255 }),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    activeCategoryIdx: index("email_templates_active_category_idx").on(table.isActive, table.category),
  })
);

// One row per dispatch attempt; rendered content is frozen at creation
export const deliveryLogs = pgTable(
  "delivery_logs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    templateId: uuid("template_id").references(() => emailTemplates.id, { onDelete: "set null" }),
    templateKey: varchar("template_key", { length: 100 }).notNull(),
    toAddress: varchar("to_address", { length: 320 }).notNull(),
    fromAddress: varchar("from_address", { length: 320 }).notNull(),
    cc: jsonb("cc").$type<string[]>().default([]).notNull(),
    bcc: jsonb("bcc").$type<string[]>().default([]).notNull(),
    subject: text("subject").notNull(),
    htmlBody: text("html_body").default("").notNull(),
    textBody: text("text_body").default("").notNull(),
    status: deliveryStatusEnum("status").default("pending").notNull(),
    // Transport's message id; webhook events are routed back through it
    correlationId: varchar("correlation_id", { length: 255 }),
    contextData: jsonb("context_data").$type<Record<string, unknown>>().default({}).notNull(),
    initiator: varchar("initiator", { length: 255 }),
    errorMessage: text("error_message"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
    sentAt: timestamp("sent_at"),
    deliveredAt: timestamp("delivered_at"),
    openedAt: timestamp("opened_at"),
    clickedAt: timestamp("clicked_at"),
    bouncedAt: timestamp("bounced_at"),
  },
  (table) => ({
    correlationIdIdx: index("delivery_logs_correlation_id_idx").on(table.correlationId),
    statusCreatedIdx: index("delivery_logs_status_created_idx").on(table.status, table.createdAt),
    createdAtIdx: index("delivery_logs_created_at_idx").on(table.createdAt),
    templateKeyIdx: index("delivery_logs_template_key_idx").on(table.templateKey),
  })
);

// Relations
export const emailTemplatesRelations = relations(emailTemplates, ({ many }) => ({
  deliveryLogs: many(deliveryLogs),
}));

export const deliveryLogsRelations = relations(deliveryLogs, ({ one }) => ({
  template: one(emailTemplates, {
    fields: [deliveryLogs.templateId],
    references: [emailTemplates.id],
  }),
}));

// Types
export type EmailTemplate = typeof emailTemplates.$inferSelect;
export type NewEmailTemplate = typeof emailTemplates.$inferInsert;
export type DeliveryLog = typeof deliveryLogs.$inferSelect;
export type NewDeliveryLog = typeof deliveryLogs.$inferInsert;

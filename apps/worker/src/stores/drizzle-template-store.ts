import { and, asc, eq, type SQL } from "drizzle-orm";
import { emailTemplates, type Database, type EmailTemplate } from "@missive/db";
import { TemplateNotFoundError } from "../errors.js";
import type { TemplateInput, TemplateListFilter, TemplateStore } from "./types.js";

export class DrizzleTemplateStore implements TemplateStore {
  constructor(private db: Database) {}

  async resolve(key: string): Promise<EmailTemplate> {
    const [template] = await buildActiveTemplateQuery(this.db, key);

    if (!template) {
      throw new TemplateNotFoundError(key);
    }
    return template;
  }

  async get(key: string): Promise<EmailTemplate | null> {
    const template = await this.db.query.emailTemplates.findFirst({
      where: eq(emailTemplates.key, key),
    });
    return template ?? null;
  }

  async list(filter: TemplateListFilter = {}): Promise<EmailTemplate[]> {
    const conditions: SQL[] = [];
    if (filter.activeOnly ?? true) {
      conditions.push(eq(emailTemplates.isActive, true));
    }
    if (filter.category) {
      conditions.push(eq(emailTemplates.category, filter.category));
    }

    return this.db.query.emailTemplates.findMany({
      where: conditions.length > 0 ? and(...conditions) : undefined,
      orderBy: [asc(emailTemplates.category), asc(emailTemplates.name)],
    });
  }

  async save(input: TemplateInput, actor: string | null = null): Promise<EmailTemplate> {
    const now = new Date();
    const values = {
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
      updatedBy: actor,
      updatedAt: now,
    };

    const [template] = await this.db
      .insert(emailTemplates)
      .values({ ...values, createdBy: actor, createdAt: now })
      .onConflictDoUpdate({ target: emailTemplates.key, set: values })
      .returning();

    if (!template) {
      throw new Error(`Upsert of template "${input.key}" returned no row`);
    }
    return template;
  }

  async deactivate(key: string, actor: string | null = null): Promise<EmailTemplate | null> {
    const [template] = await this.db
      .update(emailTemplates)
      .set({ isActive: false, updatedBy: actor, updatedAt: new Date() })
      .where(eq(emailTemplates.key, key))
      .returning();

    return template ?? null;
  }
}

/** Only active rows resolve; a deactivated key reads as not found */
export function buildActiveTemplateQuery(db: Database, key: string) {
  return db
    .select()
    .from(emailTemplates)
    .where(and(eq(emailTemplates.key, key), eq(emailTemplates.isActive, true)))
    .limit(1);
}

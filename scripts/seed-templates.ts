#!/usr/bin/env tsx

/**
 * Upsert the starter templates into the database
 * Usage: tsx scripts/seed-templates.ts [path/to/templates.json]
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { templateBodySchema } from "../apps/worker/src/api.js";
import { closeDatabase, connectDatabase } from "../apps/worker/src/db.js";
import { DrizzleTemplateStore } from "../apps/worker/src/stores/drizzle-template-store.js";

const seedFileSchema = templateBodySchema.extend({ key: z.string().min(1).max(100) }).array();

const DEFAULT_FILE = fileURLToPath(new URL("./fixtures/templates.json", import.meta.url));

async function seedTemplates(file: string) {
  const templates = seedFileSchema.parse(JSON.parse(readFileSync(file, "utf8")));

  const db = connectDatabase();
  const store = new DrizzleTemplateStore(db);

  try {
    for (const input of templates) {
      const saved = await store.save(input, "seed");
      console.log(`✅ ${saved.key} (${saved.category})`);
    }
    console.log(`\n${templates.length} templates seeded from ${file}`);
  } finally {
    await closeDatabase(db);
  }
}

seedTemplates(process.argv[2] ?? DEFAULT_FILE).catch((error) => {
  console.error("❌ Seeding failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});

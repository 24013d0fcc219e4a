import { Redis } from "ioredis";
import { z } from "zod";
import type { EmailTemplate } from "@missive/db";
import type { Logger } from "../logger.js";

/**
 * Cache of active templates by key.
 * Implementations fail open: a broken cache reads as a miss and writes are dropped.
 *
 * Every key carries a generation that `invalidate` bumps. A reader takes the
 * generation before loading from the store and hands it to `set`, which only
 * stores the entry if no invalidation happened in between.
 */
export interface TemplateCache {
  get(key: string): Promise<EmailTemplate | null>;
  generation(key: string): Promise<number>;
  /** Returns false when the entry was not stored */
  set(template: EmailTemplate, ttlSeconds: number, generation: number): Promise<boolean>;
  invalidate(key: string): Promise<void>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

// =============================================================================
// Serialization
// =============================================================================

const cachedTemplateSchema = z.object({
  id: z.string(),
  key: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  category: z.string(),
  language: z.string(),
  subjectTemplate: z.string(),
  htmlTemplate: z.string(),
  textTemplate: z.string(),
  isActive: z.boolean(),
  declaredVariables: z.array(z.string()),
  createdBy: z.string().nullable(),
  updatedBy: z.string().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

/**
 * Parse a cached JSON entry back into a template (dates revived).
 * Returns null for entries that no longer match the row shape.
 */
export function parseCachedTemplate(raw: string): EmailTemplate | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = cachedTemplateSchema.safeParse(json);
  return result.success ? result.data : null;
}

// =============================================================================
// Redis
// =============================================================================

// Store only while the generation is unchanged
const SET_IF_GENERATION = `
  local current = redis.call("GET", KEYS[2]) or "0"
  if current == ARGV[1] then
    redis.call("SETEX", KEYS[1], ARGV[2], ARGV[3])
    return 1
  end
  return 0
`;

const INVALIDATE = `
  redis.call("INCR", KEYS[2])
  redis.call("DEL", KEYS[1])
  return 1
`;

export class RedisTemplateCache implements TemplateCache {
  private redis: Redis;
  private isConnected = false;

  constructor(url: string, private logger: Logger, private prefix = "template:") {
    this.redis = new Redis(url, {
      enableOfflineQueue: false,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) {
          logger.error({ attempts: times }, "Cache connection failed");
          return null; // Stop retrying
        }
        return Math.min(times * 100, 2000);
      },
      reconnectOnError: (err) => err.message.includes("READONLY"),
    });

    this.redis.on("connect", () => {
      this.isConnected = true;
      logger.info("Cache connected");
    });

    this.redis.on("error", (error: Error) => {
      logger.error({ error: error.message }, "Cache error");
      this.isConnected = false;
    });

    this.redis.on("close", () => {
      this.isConnected = false;
      logger.info("Cache disconnected");
    });
  }

  async get(key: string): Promise<EmailTemplate | null> {
    if (!this.isConnected) return null;

    try {
      const raw = await this.redis.get(this.prefix + key);
      if (raw === null) return null;

      const template = parseCachedTemplate(raw);
      if (!template) {
        this.logger.warn({ key }, "Discarding unreadable cached template");
        await this.redis.del(this.prefix + key);
      }
      return template;
    } catch (error) {
      this.logger.debug({ error, key }, "Failed to read cached template");
      return null;
    }
  }

  async generation(key: string): Promise<number> {
    if (!this.isConnected) return 0;

    try {
      const raw = await this.redis.get(this.generationKey(key));
      return raw === null ? 0 : Number(raw);
    } catch (error) {
      this.logger.debug({ error, key }, "Failed to read template generation");
      return 0;
    }
  }

  async set(template: EmailTemplate, ttlSeconds: number, generation: number): Promise<boolean> {
    if (!this.isConnected || ttlSeconds <= 0) return false;

    try {
      const result = await this.redis.eval(
        SET_IF_GENERATION,
        2,
        this.prefix + template.key,
        this.generationKey(template.key),
        String(generation),
        ttlSeconds,
        JSON.stringify(template)
      );
      return result === 1;
    } catch (error) {
      this.logger.debug({ error, key: template.key }, "Failed to cache template");
      return false;
    }
  }

  async invalidate(key: string): Promise<void> {
    if (!this.isConnected) {
      this.logger.warn({ key }, "Cache offline, template invalidation skipped");
      return;
    }

    try {
      await this.redis.eval(INVALIDATE, 2, this.prefix + key, this.generationKey(key));
    } catch (error) {
      this.logger.warn({ error, key }, "Failed to invalidate cached template");
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this.isConnected) return false;

    try {
      await this.redis.ping();
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private generationKey(key: string): string {
    return `gen:${this.prefix}${key}`;
  }
}

// =============================================================================
// In-process
// =============================================================================

/**
 * Process-local cache, used when no Redis URL is configured and in tests.
 * Invalidations do not reach other processes, so the composition root caps
 * its TTL at TEMPLATE_CACHE_LOCAL_TTL_SECONDS.
 */
export class InMemoryTemplateCache implements TemplateCache {
  private entries = new Map<string, { template: EmailTemplate; expiresAt: number }>();
  private generations = new Map<string, number>();

  constructor(private now: () => number = () => Date.now()) {}

  async get(key: string): Promise<EmailTemplate | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.template);
  }

  async generation(key: string): Promise<number> {
    return this.generations.get(key) ?? 0;
  }

  async set(template: EmailTemplate, ttlSeconds: number, generation: number): Promise<boolean> {
    if (ttlSeconds <= 0 || generation !== (this.generations.get(template.key) ?? 0)) {
      return false;
    }
    this.entries.set(template.key, {
      template: structuredClone(template),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return true;
  }

  async invalidate(key: string): Promise<void> {
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    this.entries.delete(key);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

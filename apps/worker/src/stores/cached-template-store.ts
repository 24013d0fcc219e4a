import type { EmailTemplate } from "@missive/db";
import type { Logger } from "../logger.js";
import { templateCacheRequestsTotal } from "../metrics.js";
import type { TemplateCache } from "../services/cache-service.js";
import type { TemplateInput, TemplateListFilter, TemplateStore } from "./types.js";

/**
 * Read-through cache in front of a TemplateStore.
 *
 * Only active templates are cached, so a miss always falls through to the
 * store's own not-found handling. Writes through this store invalidate the
 * key, and a resolve that overlapped an invalidation does not repopulate it.
 */
export class CachedTemplateStore implements TemplateStore {
  constructor(
    private inner: TemplateStore,
    private cache: TemplateCache,
    private ttlSeconds: number,
    private logger: Logger
  ) {}

  async resolve(key: string): Promise<EmailTemplate> {
    const cached = await this.cache.get(key);
    if (cached) {
      templateCacheRequestsTotal.inc({ result: "hit" });
      return cached;
    }

    templateCacheRequestsTotal.inc({ result: "miss" });
    const generation = await this.cache.generation(key);
    const template = await this.inner.resolve(key);

    if (await this.cache.set(template, this.ttlSeconds, generation)) {
      this.logger.debug({ key, ttlSeconds: this.ttlSeconds }, "template cached");
    }
    return template;
  }

  get(key: string): Promise<EmailTemplate | null> {
    return this.inner.get(key);
  }

  list(filter?: TemplateListFilter): Promise<EmailTemplate[]> {
    return this.inner.list(filter);
  }

  async save(input: TemplateInput, actor?: string | null): Promise<EmailTemplate> {
    const template = await this.inner.save(input, actor);
    await this.cache.invalidate(input.key);
    return template;
  }

  async deactivate(key: string, actor?: string | null): Promise<EmailTemplate | null> {
    const template = await this.inner.deactivate(key, actor);
    await this.cache.invalidate(key);
    return template;
  }
}

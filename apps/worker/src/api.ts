import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import crypto from "crypto";
import type { NotificationService } from "./dispatch/notification-service.js";
import { MAX_RECENT_DELIVERIES } from "./dispatch/notification-service.js";
import type { Logger } from "./logger.js";
import type { TemplateStore } from "./stores/types.js";

export interface ApiOptions {
  notifications: NotificationService;
  templates: TemplateStore;
  apiToken: string;
  logger: Logger;
}

// =============================================================================
// Auth
// =============================================================================

function digest(value: string): Buffer {
  return crypto.createHash("sha256").update(value).digest();
}

/** Bearer token check; digests keep the comparison length-independent */
export function isAuthorized(authHeader: string | undefined, apiToken: string): boolean {
  if (!authHeader?.startsWith("Bearer ")) {
    return false;
  }
  return crypto.timingSafeEqual(digest(authHeader.slice(7)), digest(apiToken));
}

function initiatorOf(request: FastifyRequest): string | null {
  const value = request.headers["x-initiator"];
  const first = Array.isArray(value) ? value[0] : value;
  return first ? first.slice(0, 255) : null;
}

// =============================================================================
// Schemas
// =============================================================================

const contextSchema = z.record(z.unknown());

// Column widths in delivery_logs
const address = z.string().email().max(320);
const initiator = z.string().min(1).max(255);

const notificationSchema = z.object({
  templateKey: z.string().min(1).max(100),
  to: address,
  context: contextSchema.optional(),
  from: z.string().min(1).max(320).optional(),
  cc: z.array(address).optional(),
  bcc: z.array(address).optional(),
  async: z.boolean().optional(),
  initiator: initiator.optional(),
});

const bulkSchema = z.object({
  templateKey: z.string().min(1).max(100),
  recipients: z.array(address).min(1).max(1000),
  context: contextSchema.optional(),
  initiator: initiator.optional(),
});

const listDeliveriesSchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_RECENT_DELIVERIES).default(20),
});

const listTemplatesSchema = z.object({
  category: z.string().min(1).optional(),
  includeInactive: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

export const templateBodySchema = z.object({
  name: z.string().min(1).max(200),
  description: z.string().nullable().optional(),
  category: z.string().min(1).max(50).optional(),
  language: z.string().min(2).max(10).optional(),
  subjectTemplate: z.string().min(1).max(500),
  htmlTemplate: z.string().optional(),
  textTemplate: z.string().optional(),
  isActive: z.boolean().optional(),
  declaredVariables: z.array(z.string().min(1)).optional(),
});

const previewSchema = z.object({
  context: contextSchema.optional(),
});

interface KeyParams {
  key: string;
}

interface IdParams {
  id: string;
}

// =============================================================================
// Routes
// =============================================================================

export async function registerApi(app: FastifyInstance, options: ApiOptions): Promise<void> {
  const { notifications, templates, apiToken, logger } = options;

  await app.register(
    async (scope) => {
      scope.addHook("onRequest", async (request, reply) => {
        if (!isAuthorized(request.headers.authorization, apiToken)) {
          logger.warn({ url: request.url, method: request.method }, "unauthorized");
          return reply.status(401).send({ error: "Unauthorized" });
        }
      });

      // ---------------------------------------------------------------------
      // Notifications
      // ---------------------------------------------------------------------

      scope.post("/notifications", async (request, reply) => {
        const data = notificationSchema.parse(request.body);
        const queued = data.async === true && notifications.queueAvailable;

        const entry = await notifications.dispatch(
          {
            templateKey: data.templateKey,
            to: data.to,
            context: data.context,
            from: data.from,
            cc: data.cc,
            bcc: data.bcc,
            initiator: data.initiator ?? initiatorOf(request),
          },
          { mode: queued ? "queued" : "immediate" }
        );

        return reply.status(queued ? 202 : 201).send(entry);
      });

      scope.post("/notifications/bulk", async (request) => {
        const data = bulkSchema.parse(request.body);
        return notifications.sendBulk({
          templateKey: data.templateKey,
          recipients: data.recipients,
          context: data.context,
          initiator: data.initiator ?? initiatorOf(request),
        });
      });

      // ---------------------------------------------------------------------
      // Deliveries
      // ---------------------------------------------------------------------

      scope.get("/deliveries", async (request) => {
        const { limit } = listDeliveriesSchema.parse(request.query);
        const deliveries = await notifications.listRecentDeliveries(limit);
        return { deliveries };
      });

      scope.get<{ Params: IdParams }>("/deliveries/:id", async (request, reply) => {
        const entry = await notifications.getDelivery(request.params.id);
        if (!entry) {
          return reply.status(404).send({ error: "Delivery not found" });
        }
        return entry;
      });

      // ---------------------------------------------------------------------
      // Templates
      // ---------------------------------------------------------------------

      scope.get("/templates", async (request) => {
        const { category, includeInactive } = listTemplatesSchema.parse(request.query);
        const list = await templates.list({ category, activeOnly: !includeInactive });
        return { templates: list };
      });

      scope.get<{ Params: KeyParams }>("/templates/:key", async (request, reply) => {
        const template = await templates.get(request.params.key);
        if (!template) {
          return reply.status(404).send({ error: "Template not found" });
        }
        return template;
      });

      scope.put<{ Params: KeyParams }>("/templates/:key", async (request) => {
        const data = templateBodySchema.parse(request.body);
        const template = await templates.save({ ...data, key: request.params.key }, initiatorOf(request));
        logger.info({ templateKey: template.key, isActive: template.isActive }, "template saved");
        return template;
      });

      scope.delete<{ Params: KeyParams }>("/templates/:key", async (request, reply) => {
        const template = await templates.deactivate(request.params.key, initiatorOf(request));
        if (!template) {
          return reply.status(404).send({ error: "Template not found" });
        }
        logger.info({ templateKey: template.key }, "template deactivated");
        return template;
      });

      scope.post<{ Params: KeyParams }>("/templates/:key/preview", async (request) => {
        const { context } = previewSchema.parse(request.body ?? {});
        return notifications.preview(request.params.key, context);
      });
    },
    { prefix: "/api" }
  );
}

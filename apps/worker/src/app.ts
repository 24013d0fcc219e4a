import Fastify, { type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { registerApi } from "./api.js";
import type { NotificationService } from "./dispatch/notification-service.js";
import { NotificationError } from "./errors.js";
import { generateTraceId, log, withTrace, type Logger } from "./logger.js";
import { getMetrics, getMetricsContentType } from "./metrics.js";
import type { TemplateStore } from "./stores/types.js";
import type { WebhookIngester } from "./webhooks/ingester.js";
import { registerWebhookRoutes } from "./webhooks/routes.js";

export interface AppDeps {
  notifications: NotificationService;
  templates: TemplateStore;
  ingester: WebhookIngester;
  apiToken: string;
  webhookSecret?: string;
  resendWebhookSecret?: string;
  bodyLimit?: number;
  /** Hide internal error messages from 500 responses */
  production?: boolean;
  /** Named dependency probes reported by /health */
  healthChecks?: Record<string, () => Promise<boolean>>;
  loggers?: { api: Logger; webhook: Logger };
}

const TRACE_ID_PATTERN = /^[\w-]{1,64}$/;

/** Caller's X-Trace-Id when it is well formed, otherwise a fresh id */
function traceIdOf(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  return value && TRACE_ID_PATTERN.test(value) ? value : generateTraceId();
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const loggers = deps.loggers ?? { api: log.api, webhook: log.webhook };

  const app = Fastify({
    logger: false, // Own structured logger
    bodyLimit: deps.bodyLimit ?? 1024 * 1024,
  });

  // Handlers run inside a trace; queued jobs carry it to the delivery worker
  app.addHook("preHandler", (request, reply, done) => {
    const traceId = traceIdOf(request.headers["x-trace-id"]);
    reply.header("x-trace-id", traceId);
    withTrace(() => done(), traceId);
  });

  // Typed pipeline errors carry their own status; everything else is sanitized in production
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NotificationError) {
      loggers.api.warn({ url: request.url, code: error.code, error: error.message }, "request failed");
      return reply.status(error.statusCode).send(error.toResponse());
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({ error: "Invalid input", details: error.errors });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      loggers.api.error(
        { error: error.message, stack: error.stack, url: request.url, method: request.method, requestId: request.id },
        "unhandled error"
      );
    }

    if (deps.production && statusCode >= 500) {
      return reply.status(statusCode).send({ error: "Internal server error", requestId: request.id });
    }
    return reply.status(statusCode).send({ error: error.message, requestId: request.id });
  });

  // Health check endpoint for k8s probes
  app.get("/health", async (_request, reply) => {
    const checks: Record<string, boolean> = {};
    for (const [name, check] of Object.entries(deps.healthChecks ?? {})) {
      checks[name] = await check().catch(() => false);
    }
    const healthy = Object.values(checks).every(Boolean);
    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? "ok" : "degraded",
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/metrics", async (_request, reply) => {
    return reply.header("content-type", getMetricsContentType()).send(await getMetrics());
  });

  await registerWebhookRoutes(app, {
    ingester: deps.ingester,
    logger: loggers.webhook,
    webhookSecret: deps.webhookSecret,
    resendWebhookSecret: deps.resendWebhookSecret,
  });

  await registerApi(app, {
    notifications: deps.notifications,
    templates: deps.templates,
    apiToken: deps.apiToken,
    logger: loggers.api,
  });

  return app;
}

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { MalformedWebhookPayloadError } from "../errors.js";
import type { Logger } from "../logger.js";
import { webhookRejectedTotal } from "../metrics.js";
import { WebhookEventFactory, parseWebhookBody, type WebhookEvent, type WebhookPayload } from "./events.js";
import type { WebhookIngester } from "./ingester.js";
import { verifyHmacSignature, verifySvixSignature } from "./signatures.js";

export interface WebhookRouteOptions {
  ingester: WebhookIngester;
  logger: Logger;
  /** Enables x-webhook-signature checks on /webhooks/email */
  webhookSecret?: string;
  /** Enables Svix checks on /webhooks/resend */
  resendWebhookSecret?: string;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function rawBodyOf(request: FastifyRequest): string {
  return typeof request.body === "string" ? request.body : "";
}

// =============================================================================
// Webhook Routes
// =============================================================================

/**
 * Provider callbacks. Bodies are read as raw strings so signatures cover
 * the exact bytes and parse errors surface as 400.
 */
export async function registerWebhookRoutes(app: FastifyInstance, options: WebhookRouteOptions): Promise<void> {
  await app.register(async (scope) => {
    scope.removeAllContentTypeParsers();
    scope.addContentTypeParser("*", { parseAs: "string" }, (_request, body, done) => {
      done(null, body);
    });

    const { ingester, logger } = options;

    /**
     * Parse the body and hand the event to the ingester. Returns false when
     * a 400 has already been sent.
     */
    async function ingestBody(
      request: FastifyRequest,
      reply: FastifyReply,
      toEvent: (payload: WebhookPayload) => WebhookEvent | null
    ): Promise<boolean> {
      let payload: WebhookPayload;
      try {
        payload = parseWebhookBody(rawBodyOf(request));
      } catch (error) {
        if (!(error instanceof MalformedWebhookPayloadError)) throw error;
        webhookRejectedTotal.inc({ reason: "malformed" });
        logger.warn({ url: request.url, error: error.message }, "malformed webhook payload");
        await reply.status(400).send({ error: error.message });
        return false;
      }

      const event = toEvent(payload);
      if (!event) {
        logger.debug({ url: request.url }, "webhook without event or message id, ignored");
        return true;
      }

      await ingester.ingest(event);
      return true;
    }

    // =========================================================================
    // Generic provider webhook
    // =========================================================================
    scope.post("/webhooks/email", async (request, reply) => {
      if (options.webhookSecret) {
        const signature = headerValue(request.headers["x-webhook-signature"]);
        if (!verifyHmacSignature(rawBodyOf(request), signature, options.webhookSecret)) {
          webhookRejectedTotal.inc({ reason: "signature" });
          logger.warn({}, "invalid webhook signature");
          return reply.status(401).send({ error: "Invalid signature" });
        }
      }

      if (!(await ingestBody(request, reply, WebhookEventFactory.fromGeneric))) return reply;
      return reply.send({ status: "ok" });
    });

    scope.route({
      method: ["GET", "PUT", "PATCH", "DELETE"],
      url: "/webhooks/email",
      handler: async (_request, reply) => {
        return reply.status(405).header("allow", "POST").send({ error: "POST method required" });
      },
    });

    // =========================================================================
    // Resend Webhook
    // =========================================================================
    scope.post("/webhooks/resend", async (request, reply) => {
      if (options.resendWebhookSecret) {
        const valid = verifySvixSignature({
          payload: rawBodyOf(request),
          id: headerValue(request.headers["svix-id"]),
          timestamp: headerValue(request.headers["svix-timestamp"]),
          signature: headerValue(request.headers["svix-signature"]),
          secret: options.resendWebhookSecret,
        });
        if (!valid) {
          webhookRejectedTotal.inc({ reason: "signature" });
          logger.warn({}, "invalid Resend signature");
          return reply.status(401).send({ error: "Invalid signature" });
        }
      }

      if (!(await ingestBody(request, reply, WebhookEventFactory.fromResend))) return reply;
      return reply.send({ received: true });
    });
  });

  options.logger.info({}, "webhook routes registered");
}

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { isAuthorized } from "../../../api.js";
import { buildApp } from "../../../app.js";
import type { DeliveryJob } from "../../../dispatch/types.js";
import { getTraceId } from "../../../logger.js";
import { ScriptedProvider, createHarness, silentLogger, welcomeTemplate, type Harness } from "../../helpers/fixtures.js";

const AUTH = { authorization: "Bearer test-token" };

describe("isAuthorized", () => {
  it("should accept only the exact bearer token", () => {
    expect(isAuthorized("Bearer test-token", "test-token")).toBe(true);
    expect(isAuthorized("Bearer test-token2", "test-token")).toBe(false);
    expect(isAuthorized("test-token", "test-token")).toBe(false);
    expect(isAuthorized(undefined, "test-token")).toBe(false);
  });
});

describe("API routes", () => {
  let h: Harness;
  let app: FastifyInstance;

  async function start(harness: Harness, healthChecks?: Record<string, () => Promise<boolean>>) {
    h = harness;
    await h.templates.save(welcomeTemplate());
    app = await buildApp({
      notifications: h.notifications,
      templates: h.templates,
      ingester: h.ingester,
      apiToken: "test-token",
      loggers: { api: silentLogger, webhook: silentLogger },
      healthChecks,
    });
  }

  beforeEach(async () => {
    await start(createHarness());
  });

  afterEach(async () => {
    await app.close();
  });

  describe("auth", () => {
    it("should reject requests without the bearer token", async () => {
      const missing = await app.inject({ method: "GET", url: "/api/deliveries" });
      const wrong = await app.inject({
        method: "GET",
        url: "/api/deliveries",
        headers: { authorization: "Bearer nope" },
      });

      expect(missing.statusCode).toBe(401);
      expect(missing.json()).toEqual({ error: "Unauthorized" });
      expect(wrong.statusCode).toBe(401);
    });
  });

  describe("POST /api/notifications", () => {
    it("should send immediately and return the SENT log", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: { ...AUTH, "x-initiator": "ops@example.com" },
        payload: { templateKey: "welcome", to: "a@example.com", context: { name: "Ann" } },
      });

      expect(res.statusCode).toBe(201);
      const body = res.json();
      expect(body.status).toBe("sent");
      expect(body.subject).toBe("Hi Ann");
      expect(body.initiator).toBe("ops@example.com");
    });

    it("should queue when async is set", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "welcome", to: "a@example.com", async: true },
      });

      expect(res.statusCode).toBe(202);
      expect(res.json().status).toBe("pending");
      expect(h.queue.pending).toHaveLength(1);
    });

    it("should enqueue under the caller's trace id", async () => {
      const seen: Array<string | undefined> = [];
      const enqueue = h.queue.enqueue.bind(h.queue);
      vi.spyOn(h.queue, "enqueue").mockImplementation(async (job: DeliveryJob) => {
        seen.push(getTraceId());
        await enqueue(job);
      });

      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: { ...AUTH, "x-trace-id": "trace-abc" },
        payload: { templateKey: "welcome", to: "a@example.com", async: true },
      });

      expect(res.statusCode).toBe(202);
      expect(res.headers["x-trace-id"]).toBe("trace-abc");
      expect(seen).toEqual(["trace-abc"]);
    });

    it("should open a fresh trace when the caller sends none", async () => {
      const seen: Array<string | undefined> = [];
      const enqueue = h.queue.enqueue.bind(h.queue);
      vi.spyOn(h.queue, "enqueue").mockImplementation(async (job: DeliveryJob) => {
        seen.push(getTraceId());
        await enqueue(job);
      });

      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "welcome", to: "a@example.com", async: true },
      });

      expect(seen).toHaveLength(1);
      expect(seen[0]).toMatch(/^[\w-]{12}$/);
      expect(res.headers["x-trace-id"]).toBe(seen[0]);
    });

    it("should answer 404 for an unknown template", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "nope", to: "a@example.com" },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Template "nope" not found or inactive', code: "TEMPLATE_NOT_FOUND" });
    });

    it("should answer 422 with the FAILED log's id when rendering fails", async () => {
      await h.templates.save(welcomeTemplate({ key: "broken", subjectTemplate: "{{#if}}" }));

      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "broken", to: "a@example.com" },
      });

      expect(res.statusCode).toBe(422);
      const body = res.json();
      expect(body.code).toBe("RENDER_ERROR");
      expect((await h.deliveryLogs.get(body.deliveryLogId))?.status).toBe("failed");
    });

    it("should answer 502 when the transport rejects the message", async () => {
      await start(createHarness({ provider: new ScriptedProvider(async () => ({ success: false, error: "Rejected" })) }));

      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "welcome", to: "a@example.com" },
      });

      expect(res.statusCode).toBe(502);
      expect(res.json()).toMatchObject({ error: "Rejected", code: "TRANSPORT_ERROR" });
    });

    it("should answer 400 for invalid input", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "welcome", to: "not-an-email" },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("Invalid input");
    });

    it("should answer 400 for a sender longer than the column", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "welcome", to: "a@example.com", from: `${"a".repeat(310)}@example.com` },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe("Invalid input");
      expect(h.deliveryLogs.size).toBe(0);
    });
  });

  describe("POST /api/notifications/bulk", () => {
    it("should report per-recipient results", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/notifications/bulk",
        headers: AUTH,
        payload: { templateKey: "welcome", recipients: ["a@example.com", "b@example.com"] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ totalSent: 2, totalFailed: 0, failedRecipients: [] });
    });
  });

  describe("deliveries", () => {
    it("should list recent deliveries and fetch one by id", async () => {
      const sent = await h.notifications.dispatch({ templateKey: "welcome", to: "a@example.com" });

      const list = await app.inject({ method: "GET", url: "/api/deliveries?limit=5", headers: AUTH });
      const one = await app.inject({ method: "GET", url: `/api/deliveries/${sent.id}`, headers: AUTH });

      expect(list.json().deliveries).toHaveLength(1);
      expect(one.json().id).toBe(sent.id);
    });

    it("should reject an out-of-range limit", async () => {
      const res = await app.inject({ method: "GET", url: "/api/deliveries?limit=101", headers: AUTH });
      expect(res.statusCode).toBe(400);
    });

    it("should answer 404 for an unknown delivery", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/api/deliveries/6f1d8a52-8c4e-4a0b-9a51-2d8b1f0c7e11",
        headers: AUTH,
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: "Delivery not found" });
    });
  });

  describe("templates", () => {
    it("should save a template and record who changed it", async () => {
      const res = await app.inject({
        method: "PUT",
        url: "/api/templates/reset",
        headers: { ...AUTH, "x-initiator": "ops@example.com" },
        payload: { name: "Password reset", subjectTemplate: "Reset your password", textTemplate: "Go to {{link}}" },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        key: "reset",
        name: "Password reset",
        isActive: true,
        createdBy: "ops@example.com",
        updatedBy: "ops@example.com",
      });
    });

    it("should fetch and list templates", async () => {
      const one = await app.inject({ method: "GET", url: "/api/templates/welcome", headers: AUTH });
      const list = await app.inject({ method: "GET", url: "/api/templates?category=account", headers: AUTH });
      const missing = await app.inject({ method: "GET", url: "/api/templates/nope", headers: AUTH });

      expect(one.json().subjectTemplate).toBe("Hi {{name}}");
      expect(list.json().templates.map((t: { key: string }) => t.key)).toEqual(["welcome"]);
      expect(missing.statusCode).toBe(404);
    });

    it("should deactivate a template and stop dispatching it", async () => {
      const res = await app.inject({ method: "DELETE", url: "/api/templates/welcome", headers: AUTH });
      const send = await app.inject({
        method: "POST",
        url: "/api/notifications",
        headers: AUTH,
        payload: { templateKey: "welcome", to: "a@example.com" },
      });
      const active = await app.inject({ method: "GET", url: "/api/templates", headers: AUTH });
      const all = await app.inject({ method: "GET", url: "/api/templates?includeInactive=true", headers: AUTH });

      expect(res.json().isActive).toBe(false);
      expect(send.statusCode).toBe(404);
      expect(active.json().templates).toEqual([]);
      expect(all.json().templates).toHaveLength(1);
    });

    it("should preview without writing a log", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/api/templates/welcome/preview",
        headers: AUTH,
        payload: { context: { name: "Ann" } },
      });

      expect(res.json()).toEqual({
        subject: "Hi Ann",
        html: "<p>Welcome to Missive, Ann</p>",
        text: "Welcome to Missive, Ann",
      });
      expect(h.deliveryLogs.size).toBe(0);
    });
  });

  describe("GET /health", () => {
    it("should report degraded when a check fails", async () => {
      await start(createHarness(), { database: async () => true, nats: async () => false });

      const res = await app.inject({ method: "GET", url: "/health" });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toMatchObject({ status: "degraded", checks: { database: true, nats: false } });
    });

    it("should be ok without checks", async () => {
      const res = await app.inject({ method: "GET", url: "/health" });

      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe("ok");
    });
  });
});

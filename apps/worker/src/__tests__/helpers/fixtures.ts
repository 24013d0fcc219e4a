/**
 * Shared fixtures: a fully wired pipeline over in-memory stores and the
 * mock transport.
 */

import pino from "pino";
import type { DeliveryLog } from "@missive/db";
import { DeliveryExecutor } from "../../dispatch/executor.js";
import { ImmediateDispatcher } from "../../dispatch/immediate-dispatcher.js";
import { DeliveryJobHandler } from "../../dispatch/job-handler.js";
import { InMemoryDeliveryQueue } from "../../dispatch/memory-queue.js";
import { NotificationService } from "../../dispatch/notification-service.js";
import { DispatchPreparer, type DispatchDefaults } from "../../dispatch/preparer.js";
import { QueuedDispatcher } from "../../dispatch/queued-dispatcher.js";
import { Renderer } from "../../domain/rendering/renderer.js";
import type { Logger } from "../../logger.js";
import { MockEmailProvider } from "../../providers/mock-provider.js";
import type { EmailProvider, SendEmailRequest, SendEmailResult } from "../../providers/types.js";
import { InMemoryDeliveryLogStore, InMemoryTemplateStore } from "../../stores/memory.js";
import type { TemplateInput } from "../../stores/types.js";
import { WebhookIngester } from "../../webhooks/ingester.js";

export const silentLogger: Logger = pino({ level: "silent" });

export const TEST_DEFAULTS: DispatchDefaults = {
  fromAddress: "noreply@example.com",
  fromName: "Missive",
  site_name: "Missive",
  site_url: "https://missive.test",
};

export function welcomeTemplate(overrides: Partial<TemplateInput> = {}): TemplateInput {
  return {
    key: "welcome",
    name: "Welcome",
    category: "account",
    subjectTemplate: "Hi {{name}}",
    htmlTemplate: "<p>Welcome to {{site_name}}, {{name}}</p>",
    textTemplate: "Welcome to {{site_name}}, {{name}}",
    ...overrides,
  };
}

export interface HarnessOptions {
  provider?: EmailProvider;
  timeoutMs?: number;
  now?: () => Date;
}

export function createHarness(options: HarnessOptions = {}) {
  const now = options.now ?? (() => new Date());
  const templates = new InMemoryTemplateStore(now);
  const deliveryLogs = new InMemoryDeliveryLogStore(now);
  const mock = new MockEmailProvider({ mode: "success", latencyMs: 0 });
  const provider = options.provider ?? mock;
  const renderer = new Renderer();
  const queue = new InMemoryDeliveryQueue();

  const preparer = new DispatchPreparer({
    templates,
    renderer,
    deliveryLogs,
    defaults: TEST_DEFAULTS,
    logger: silentLogger,
  });
  const executor = new DeliveryExecutor({
    provider,
    deliveryLogs,
    timeoutMs: options.timeoutMs ?? 1000,
    logger: silentLogger,
    now,
  });
  const immediate = new ImmediateDispatcher(preparer, executor);
  const queued = new QueuedDispatcher(preparer, queue, deliveryLogs, silentLogger);
  const jobs = new DeliveryJobHandler(deliveryLogs, executor, silentLogger);
  const notifications = new NotificationService({
    immediate,
    queued,
    preparer,
    deliveryLogs,
    logger: silentLogger,
  });
  const ingester = new WebhookIngester(deliveryLogs, silentLogger, { now });

  return {
    templates,
    deliveryLogs,
    mock,
    provider,
    renderer,
    queue,
    preparer,
    executor,
    immediate,
    queued,
    jobs,
    notifications,
    ingester,
  };
}

export type Harness = ReturnType<typeof createHarness>;

/**
 * A log already handed to the transport under `correlationId`.
 */
export async function sentLog(
  harness: Harness,
  correlationId: string,
  at = new Date("2026-03-01T10:00:00.000Z")
): Promise<DeliveryLog> {
  const pending = await harness.deliveryLogs.create({
    templateId: null,
    templateKey: "welcome",
    toAddress: "a@example.com",
    fromAddress: "noreply@example.com",
    cc: [],
    bcc: [],
    subject: "Hi Ann",
    htmlBody: "",
    textBody: "Hi Ann",
    status: "pending",
    contextData: {},
    initiator: null,
  });
  const sent = await harness.deliveryLogs.conditionalUpdate(pending.id, "pending", {
    status: "sent",
    sentAt: at,
    correlationId,
  });
  if (!sent) throw new Error("fixture log could not be marked sent");
  return sent;
}

/**
 * Transport whose behavior each test scripts.
 */
export class ScriptedProvider implements EmailProvider {
  readonly name = "scripted";
  readonly calls: SendEmailRequest[] = [];

  constructor(private behavior: (request: SendEmailRequest) => Promise<SendEmailResult>) {}

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    this.calls.push(request);
    return this.behavior(request);
  }
}

import { config } from "@missive/config";
import { buildApp } from "./app.js";
import { closeDatabase, connectDatabase, pingDatabase } from "./db.js";
import { DeliveryExecutor } from "./dispatch/executor.js";
import { ImmediateDispatcher } from "./dispatch/immediate-dispatcher.js";
import { DeliveryJobHandler } from "./dispatch/job-handler.js";
import { NotificationService } from "./dispatch/notification-service.js";
import { DispatchPreparer } from "./dispatch/preparer.js";
import { QueuedDispatcher } from "./dispatch/queued-dispatcher.js";
import { Renderer } from "./domain/rendering/renderer.js";
import { withTimeout } from "./domain/utils/timeout.js";
import { describeCause } from "./errors.js";
import { log } from "./logger.js";
import { NatsClient } from "./nats/client.js";
import { NatsDeliveryQueue } from "./nats/delivery-queue.js";
import { NatsDeliveryWorker } from "./nats/delivery-worker.js";
import { createEmailProvider } from "./providers/index.js";
import { InMemoryTemplateCache, RedisTemplateCache, type TemplateCache } from "./services/cache-service.js";
import { StalePendingRecoveryService } from "./services/stale-pending-recovery.js";
import { CachedTemplateStore } from "./stores/cached-template-store.js";
import { DrizzleDeliveryLogStore } from "./stores/drizzle-delivery-log-store.js";
import { DrizzleTemplateStore } from "./stores/drizzle-template-store.js";
import { WebhookIngester } from "./webhooks/ingester.js";

// =============================================================================
// Composition root
// =============================================================================

const db = connectDatabase();

const cache: TemplateCache = config.REDIS_URL
  ? new RedisTemplateCache(config.REDIS_URL, log.cache)
  : new InMemoryTemplateCache();

const templates = new CachedTemplateStore(
  new DrizzleTemplateStore(db),
  cache,
  config.REDIS_URL
    ? config.TEMPLATE_CACHE_TTL_SECONDS
    : Math.min(config.TEMPLATE_CACHE_TTL_SECONDS, config.TEMPLATE_CACHE_LOCAL_TTL_SECONDS),
  log.template
);
const deliveryLogs = new DrizzleDeliveryLogStore(db);

const provider = createEmailProvider(config, log.provider);

const preparer = new DispatchPreparer({
  templates,
  renderer: new Renderer(),
  deliveryLogs,
  defaults: {
    fromAddress: config.DEFAULT_FROM_EMAIL,
    fromName: config.DEFAULT_FROM_NAME,
    site_name: config.SITE_NAME,
    site_url: config.SITE_URL,
  },
  logger: log.dispatch,
});

const executor = new DeliveryExecutor({
  provider,
  deliveryLogs,
  timeoutMs: config.TRANSPORT_TIMEOUT_MS,
  logger: log.delivery,
});

const ingester = new WebhookIngester(deliveryLogs, log.webhook);

const staleRecovery = new StalePendingRecoveryService(deliveryLogs, log.system, {
  enabled: config.STALE_PENDING_ENABLED,
  scanIntervalMs: config.STALE_PENDING_INTERVAL_MS,
  staleThresholdMs: config.STALE_PENDING_THRESHOLD_MS,
  maxPerScan: config.STALE_PENDING_MAX_PER_SCAN,
});

let natsClient: NatsClient | null = null;
let deliveryWorker: NatsDeliveryWorker | null = null;

// Startup
try {
  let queued: QueuedDispatcher | undefined;

  if (config.NATS_ENABLED) {
    const client = new NatsClient();
    await client.connect();
    natsClient = client;

    const js = client.getJetStream();
    queued = new QueuedDispatcher(preparer, new NatsDeliveryQueue(js, log.queue), deliveryLogs, log.dispatch);

    const worker = new NatsDeliveryWorker(
      new DeliveryJobHandler(deliveryLogs, executor, log.queue),
      { maxAttempts: config.DELIVERY_MAX_ATTEMPTS, concurrency: config.DELIVERY_CONCURRENCY },
      log.queue
    );
    deliveryWorker = worker;

    worker.start(js).catch((error) => {
      log.system.error({ error: describeCause(error) }, "delivery worker crashed");
      process.exit(1);
    });
  } else {
    log.system.warn({}, "NATS disabled, queued dispatch runs inline");
  }

  const notifications = new NotificationService({
    immediate: new ImmediateDispatcher(preparer, executor),
    queued,
    preparer,
    deliveryLogs,
    logger: log.dispatch,
  });

  const healthChecks: Record<string, () => Promise<boolean>> = {
    database: () => pingDatabase(db),
    templateCache: () => cache.healthCheck(),
  };
  const nats = natsClient;
  if (nats) healthChecks.nats = () => nats.healthCheck();

  const app = await buildApp({
    notifications,
    templates,
    ingester,
    apiToken: config.API_TOKEN,
    webhookSecret: config.WEBHOOK_SECRET,
    resendWebhookSecret: config.RESEND_WEBHOOK_SECRET,
    bodyLimit: config.MAX_REQUEST_SIZE_BYTES,
    production: config.NODE_ENV === "production",
    healthChecks,
  });

  staleRecovery.start();

  await app.listen({ port: config.PORT, host: "0.0.0.0" });

  log.system.info(
    {
      port: config.PORT,
      env: config.NODE_ENV,
      provider: provider.name,
      queue: config.NATS_ENABLED ? config.NATS_CLUSTER : "inline",
      templateCache: config.REDIS_URL ? "redis" : "memory",
    },
    "notification service started"
  );

  // Graceful shutdown with timeout protection
  const SHUTDOWN_TIMEOUT_MS = 30000;

  async function step(promise: Promise<unknown>, timeoutMs: number, name: string): Promise<void> {
    try {
      await withTimeout(promise, timeoutMs, name);
    } catch (error) {
      log.system.warn({ error: describeCause(error), component: name }, "shutdown step failed");
    }
  }

  async function shutdown(): Promise<void> {
    log.system.info({}, "shutting down (30s timeout)");
    const shutdownStart = Date.now();

    // Stop accepting new work
    await step(app.close(), 2000, "Fastify");
    staleRecovery.stop();

    // Drain in-flight deliveries
    if (deliveryWorker) await step(deliveryWorker.stop(), 10000, "DeliveryWorker");

    // Close connections
    if (natsClient) await step(natsClient.close(), 2000, "NATS");
    await step(cache.close(), 2000, "TemplateCache");
    await step(closeDatabase(db), 5000, "Database");

    log.system.info({ durationMs: Date.now() - shutdownStart }, "shutdown complete");
    process.exit(0);
  }

  let shutdownInProgress = false;
  const initiateShutdown = (): void => {
    if (shutdownInProgress) {
      log.system.warn({}, "shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;

    const forceExitTimer = setTimeout(() => {
      log.system.error({}, "shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    shutdown().catch((error) => {
      log.system.error({ error: describeCause(error) }, "shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", initiateShutdown);
  process.on("SIGINT", initiateShutdown);
} catch (err) {
  log.system.error({ error: describeCause(err) }, "startup failed");
  process.exit(1);
}

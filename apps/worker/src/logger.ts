import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "@missive/config";

const isDev = config.NODE_ENV !== "production";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage propagates traceId through async operations without
// passing it around.
//
// Usage:
//   await withTraceAsync(async () => {
//     log.dispatch.info({ templateKey }, "dispatching"); // traceId added automatically
//     await executor.deliver(entry);                      // nested logs share the traceId
//   });
//
// Queued jobs carry the traceId in the X-Trace-Id NATS header, and the
// delivery worker resumes the trace with withTraceAsync(fn, headerValue).
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a short, unique trace ID (12 chars, base64url)
 */
export function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Run a function with a trace context. All logs within will include the traceId.
 * If no traceId is provided, a new one is generated.
 */
export function withTrace<T>(fn: () => T, traceId?: string): T {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.dispatch.info({ deliveryLogId, templateKey }, "sent")
//
// FAILURE (detailed, error level):
//   log.delivery.error({ deliveryLogId, to, error, provider }, "transport failed")
//
// DEBUG (verbose, only in dev):
//   log.webhook.debug({ correlationId, event }, "timestamp recorded")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

// Pretty printing only for interactive development
export const logger =
  config.NODE_ENV === "development"
    ? pino({
        ...baseConfig,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            messageFormat: "{component} | {msg}",
            singleLine: true,
          },
        },
      })
    : pino(baseConfig);

export type Logger = pino.Logger;

// =============================================================================
// Component Loggers
// =============================================================================
// Each component gets its own child logger for easy filtering. Core
// components receive one of these through their constructor.

export const log = {
  // Template store and cache
  template: logger.child({ component: "template" }),

  // Dispatch entry points (immediate, queued, bulk)
  dispatch: logger.child({ component: "dispatch" }),

  // Transport calls and SENT/FAILED transitions
  delivery: logger.child({ component: "delivery" }),

  // Queue publishing and the delivery worker
  queue: logger.child({ component: "queue" }),

  // Webhook events (delivered, opened, bounced, ...)
  webhook: logger.child({ component: "webhook" }),

  // Admin API requests
  api: logger.child({ component: "api" }),

  // Database operations
  db: logger.child({ component: "db" }),

  // Provider operations (Resend, SES, mock)
  provider: logger.child({ component: "provider" }),

  // System-level events
  system: logger.child({ component: "system" }),

  // Cache operations (Redis)
  cache: logger.child({ component: "cache" }),

  // NATS operations
  nats: logger.child({ component: "nats" }),
};

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  logger: Logger,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  logger.error({
    ...context,
    error: err.message,
    errorName: err.name,
    // Stack traces only outside production
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}

/**
 * Timer returning elapsed milliseconds, for metrics and result objects
 */
export function createMsTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000;
}

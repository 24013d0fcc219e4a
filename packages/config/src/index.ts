import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/** Empty strings from .env files count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === "" ? undefined : val));

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  WORKER_ID: z.string().default("worker-1"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // ===========================================================================
  // Database (PostgreSQL)
  // ===========================================================================
  DATABASE_URL: z.string().url(),

  // ===========================================================================
  // NATS JetStream (queued dispatch)
  // ===========================================================================
  /** Off: queued dispatch falls back to immediate and no delivery worker runs */
  NATS_ENABLED: stringBoolean.default(true),
  NATS_CLUSTER: z.string().default("nats://localhost:4222"),
  NATS_REPLICAS: z.coerce.number().min(1).max(5).default(1),
  NATS_TLS_ENABLED: stringBoolean.default(false),
  NATS_TLS_CA_FILE: optionalString,
  NATS_TLS_CERT_FILE: optionalString,
  NATS_TLS_KEY_FILE: optionalString,

  // ===========================================================================
  // Template cache (Redis-compatible; in-process cache when unset)
  // ===========================================================================
  REDIS_URL: optionalString,
  TEMPLATE_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(3600),
  /** TTL ceiling for the in-process cache, which other replicas never invalidate */
  TEMPLATE_CACHE_LOCAL_TTL_SECONDS: z.coerce.number().int().min(0).default(30),

  // ===========================================================================
  // Email transport
  // ===========================================================================
  EMAIL_PROVIDER: z.enum(["resend", "ses", "mock"]).default("mock"),
  RESEND_API_KEY: z.string().default(""),
  // AWS SES
  AWS_REGION: z.string().default("us-east-1"),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  SES_ENDPOINT: z.string().url().optional(),
  // Mock provider
  MOCK_MODE: z.enum(["success", "fail", "random"]).default("success"),
  MOCK_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  MOCK_LATENCY_MS: z.coerce.number().min(0).default(50),

  // ===========================================================================
  // Dispatch
  // ===========================================================================
  DEFAULT_FROM_EMAIL: z.string().email().default("noreply@example.com"),
  DEFAULT_FROM_NAME: optionalString,
  SITE_NAME: z.string().default("Missive"),
  SITE_URL: z.string().url().default("http://localhost:6001"),
  /** Upper bound on a single transport call, both dispatch modes */
  TRANSPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  /** JetStream max_deliver for queued deliveries */
  DELIVERY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(4),
  DELIVERY_CONCURRENCY: z.coerce.number().int().positive().default(50),

  // ===========================================================================
  // Background Services
  // ===========================================================================
  STALE_PENDING_ENABLED: stringBoolean.default(true),
  STALE_PENDING_THRESHOLD_MS: z.coerce.number().default(30 * 60 * 1000),
  STALE_PENDING_INTERVAL_MS: z.coerce.number().default(5 * 60 * 1000),
  STALE_PENDING_MAX_PER_SCAN: z.coerce.number().default(100),

  // ===========================================================================
  // Server
  // ===========================================================================
  PORT: z.coerce.number().default(6001),
  MAX_REQUEST_SIZE_BYTES: z.coerce.number().default(1024 * 1024),
  /** Bearer token for the admin API */
  API_TOKEN: z.string().min(1),

  // ===========================================================================
  // Webhooks (Inbound from providers)
  // ===========================================================================
  /** HMAC-SHA256 key for x-webhook-signature; verification is off when unset */
  WEBHOOK_SECRET: optionalString,
  /** Svix signing secret (whsec_...) for Resend events */
  RESEND_WEBHOOK_SECRET: optionalString,
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}

/** Singleton config instance */
export const config = loadConfig();

import promClient from 'prom-client';

const METRIC_PREFIX = 'missive_';

// Initialize Prometheus default metrics (CPU, memory, etc.)
// Guard against multiple registrations (e.g., in test environments)
if (!promClient.register.getSingleMetric(`${METRIC_PREFIX}process_cpu_user_seconds_total`)) {
  promClient.collectDefaultMetrics({
    prefix: METRIC_PREFIX,
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

const register = promClient.register;

// ============================================
// Dispatch Metrics
// ============================================

/**
 * Counter: Dispatch calls by mode and outcome
 * Labels: mode (immediate/queued/bulk), outcome (sent/accepted/failed/not_found/render_error/queue_error)
 */
export const notificationsDispatchedTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}notifications_dispatched_total`,
  help: 'Total number of dispatch calls by mode and outcome',
  labelNames: ['mode', 'outcome'],
});

/**
 * Histogram: Time spent in a single transport call
 * Labels: provider (resend/ses/mock), status (success/failure/timeout)
 */
export const transportSendDuration = new promClient.Histogram({
  name: `${METRIC_PREFIX}transport_send_duration_seconds`,
  help: 'Duration of transport send operations',
  labelNames: ['provider', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10], // 10ms to 10s
});

/**
 * Counter: Delivery log transitions written by the executor
 * Labels: provider, status (sent/failed)
 */
export const deliveriesTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}deliveries_total`,
  help: 'Total number of deliveries by final transport status',
  labelNames: ['provider', 'status'],
});

/**
 * Counter: Queued delivery jobs retried after an unexpected error
 */
export const deliveryRetriesTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}delivery_retries_total`,
  help: 'Total number of queued delivery jobs scheduled for redelivery',
});

// ============================================
// Template Metrics
// ============================================

/**
 * Counter: Template cache lookups
 * Labels: result (hit/miss)
 */
export const templateCacheRequestsTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}template_cache_requests_total`,
  help: 'Total number of template cache lookups',
  labelNames: ['result'],
});

// ============================================
// Webhook Metrics
// ============================================

/**
 * Counter: Webhook events by normalized event and ingest outcome
 */
export const webhookEventsTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}webhook_events_total`,
  help: 'Total number of webhook events by event type and outcome',
  labelNames: ['event', 'outcome'],
});

/**
 * Counter: Webhook events whose correlation id matched no delivery log
 */
export const webhookCorrelationNotFoundTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}webhook_correlation_not_found_total`,
  help: 'Total number of webhook events for unknown correlation ids',
});

/**
 * Counter: Rejected webhook requests (bad JSON or signature)
 * Labels: reason (malformed/signature)
 */
export const webhookRejectedTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}webhook_rejected_total`,
  help: 'Total number of webhook requests rejected before ingest',
  labelNames: ['reason'],
});

// ============================================
// Recovery Metrics
// ============================================

/**
 * Gauge: PENDING deliveries older than the stale threshold at last scan
 */
export const staleDeliveriesFound = new promClient.Gauge({
  name: `${METRIC_PREFIX}stale_deliveries_found`,
  help: 'Number of stale pending deliveries found by the last scan',
});

/**
 * Counter: Stale PENDING deliveries moved to FAILED
 */
export const staleDeliveriesFailedTotal = new promClient.Counter({
  name: `${METRIC_PREFIX}stale_deliveries_failed_total`,
  help: 'Total number of stale pending deliveries marked failed',
});

// ============================================
// Helpers
// ============================================

/**
 * Start a histogram timer; call the returned function with final labels
 */
export function startTimer(
  histogram: promClient.Histogram<string>,
  labels: Record<string, string> = {}
): (finalLabels?: Record<string, string>) => number {
  return histogram.startTimer(labels);
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

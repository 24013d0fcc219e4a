import { describeCause } from "../errors.js";
import { createMsTimer, type Logger } from "../logger.js";
import { staleDeliveriesFailedTotal, staleDeliveriesFound } from "../metrics.js";
import type { DeliveryLogStore } from "../stores/types.js";

// =============================================================================
// Stale PENDING Recovery Service
// =============================================================================
// A queued delivery whose job was lost (worker crash after ack, broker data
// loss, enqueue that never reached the stream) stays PENDING with nothing
// left to move it. This service fails such logs after a threshold so they
// show up as FAILED with a reason instead of sitting invisible.
//
// Writes go through the same status-guarded update as everything else, so
// a log that a worker delivers mid-scan is left alone.
// =============================================================================

export interface StalePendingRecoveryConfig {
  /** How often to scan (ms) */
  scanIntervalMs: number;

  /** Age after which a PENDING log counts as stale (ms) */
  staleThresholdMs: number;

  /** Maximum logs to fail per scan */
  maxPerScan: number;

  enabled: boolean;
}

const DEFAULT_CONFIG: StalePendingRecoveryConfig = {
  scanIntervalMs: 5 * 60 * 1000,
  staleThresholdMs: 30 * 60 * 1000,
  maxPerScan: 100,
  enabled: true,
};

export interface StaleScanResult {
  scannedAt: Date;
  staleFound: number;
  markedFailed: number;
  durationMs: number;
  failedIds: string[];
}

export class StalePendingRecoveryService {
  private config: StalePendingRecoveryConfig;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private now: () => Date;

  constructor(
    private deliveryLogs: DeliveryLogStore,
    private logger: Logger,
    config: Partial<StalePendingRecoveryConfig> = {},
    now?: () => Date
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = now ?? (() => new Date());
  }

  start(): void {
    if (!this.config.enabled) {
      this.logger.info({}, "stale pending recovery disabled");
      return;
    }

    if (this.intervalId) {
      this.logger.warn({}, "stale pending recovery already running");
      return;
    }

    this.runScan().catch((error) => {
      this.logger.error({ error: describeCause(error) }, "initial stale scan failed");
    });

    this.intervalId = setInterval(() => {
      this.runScan().catch((error) => {
        this.logger.error({ error: describeCause(error) }, "stale scan failed");
      });
    }, this.config.scanIntervalMs);

    this.logger.info(
      { intervalMs: this.config.scanIntervalMs, thresholdMs: this.config.staleThresholdMs },
      "stale pending recovery started"
    );
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.logger.info({}, "stale pending recovery stopped");
    }
  }

  async runScan(): Promise<StaleScanResult> {
    const result: StaleScanResult = {
      scannedAt: this.now(),
      staleFound: 0,
      markedFailed: 0,
      durationMs: 0,
      failedIds: [],
    };

    // Prevent overlapping scans
    if (this.isRunning) {
      this.logger.debug({}, "stale scan already in progress, skipping");
      return result;
    }

    this.isRunning = true;
    const timer = createMsTimer();

    try {
      const olderThan = new Date(result.scannedAt.getTime() - this.config.staleThresholdMs);
      const stale = await this.deliveryLogs.findStalePending(olderThan, this.config.maxPerScan);

      result.staleFound = stale.length;
      staleDeliveriesFound.set(stale.length);

      const errorMessage = `Delivery not attempted within ${this.config.staleThresholdMs}ms`;

      for (const entry of stale) {
        const updated = await this.deliveryLogs.conditionalUpdate(entry.id, "pending", {
          status: "failed",
          errorMessage,
        });

        if (updated) {
          result.markedFailed++;
          result.failedIds.push(entry.id);
          staleDeliveriesFailedTotal.inc();
          this.logger.warn(
            { deliveryLogId: entry.id, templateKey: entry.templateKey, createdAt: entry.createdAt.toISOString() },
            "stale pending delivery marked failed"
          );
        }
      }

      result.durationMs = timer();

      if (result.staleFound > 0) {
        this.logger.info(
          { found: result.staleFound, failed: result.markedFailed, durationMs: result.durationMs },
          "stale scan completed"
        );
      }

      return result;
    } finally {
      this.isRunning = false;
    }
  }
}

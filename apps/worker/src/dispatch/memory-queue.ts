import type { DeliveryJob, DeliveryQueue } from "./types.js";

/**
 * Process-local delivery queue for tests and single-process runs.
 * Jobs sit in memory until drained.
 */
export class InMemoryDeliveryQueue implements DeliveryQueue {
  private jobs: DeliveryJob[] = [];
  private failure: Error | null = null;

  async enqueue(job: DeliveryJob): Promise<void> {
    if (this.failure) throw this.failure;
    this.jobs.push({ ...job });
  }

  /** Make every following enqueue reject, or pass null to recover */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  get pending(): readonly DeliveryJob[] {
    return this.jobs;
  }

  /**
   * Hand every queued job to `handler`, in enqueue order. Jobs enqueued
   * while draining are processed in the same call.
   */
  async drain(handler: (job: DeliveryJob) => Promise<void>): Promise<number> {
    let processed = 0;
    let job = this.jobs.shift();
    while (job) {
      await handler(job);
      processed++;
      job = this.jobs.shift();
    }
    return processed;
  }
}

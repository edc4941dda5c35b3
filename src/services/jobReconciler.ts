import { logger } from "../logger.js";
import type { JobStore } from "../repository/jobs.js";
import type { JobRecord } from "../types.js";
import type { JobCompletion } from "./jobCompletion.js";
import type { PredictionGateway } from "./predictionGateway.js";

export interface ReconcileOptions {
  /** Jobs still processing after this long are checked against the provider. */
  staleAfterMs: number;
  batchSize?: number;
  batchDelayMs?: number;
  limit?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface ReconcileSummary {
  checked: number;
  resolved: number;
  pending: number;
  failed: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Picks up jobs whose webhook never arrived (dropped delivery, or a callback that raced the job
 * insert) and resolves them from the provider's current status.
 */
export class JobReconciler {
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly limit: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly jobs: JobStore,
    private readonly gateway: PredictionGateway,
    private readonly completion: JobCompletion,
    private readonly options: ReconcileOptions
  ) {
    this.batchSize = options.batchSize ?? 10;
    this.batchDelayMs = options.batchDelayMs ?? 200;
    this.limit = options.limit ?? 100;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async reconcileStaleJobs(): Promise<ReconcileSummary> {
    const cutoff = new Date(this.now().getTime() - this.options.staleAfterMs);
    const staleJobs = await this.jobs.listStale(cutoff, this.limit);
    const summary: ReconcileSummary = { checked: staleJobs.length, resolved: 0, pending: 0, failed: 0 };

    if (staleJobs.length === 0) {
      return summary;
    }

    logger.info({ count: staleJobs.length }, "Reconciling stale jobs");

    for (let i = 0; i < staleJobs.length; i += this.batchSize) {
      const batch = staleJobs.slice(i, i + this.batchSize);
      const results = await Promise.allSettled(batch.map((job) => this.reconcileJob(job)));

      results.forEach((result, index) => {
        if (result.status === "rejected") {
          summary.failed++;
          logger.warn({ err: result.reason, jobId: batch[index].id }, "Failed to reconcile job");
        } else if (result.value) {
          summary.resolved++;
        } else {
          summary.pending++;
        }
      });

      // Small delay between batches to stay under the provider's rate limit
      if (i + this.batchSize < staleJobs.length) {
        await this.sleep(this.batchDelayMs);
      }
    }

    logger.info(summary, "Job reconciliation completed");
    return summary;
  }

  /** True once the prediction has reached a terminal status. */
  private async reconcileJob(job: JobRecord): Promise<boolean> {
    const prediction = await this.gateway.fetch(job.predictionId);
    const result = await this.completion.complete(job, prediction);
    return result !== null;
  }
}

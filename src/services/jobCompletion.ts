import type { JobStore } from "../repository/jobs.js";
import { logger } from "../logger.js";
import type { JobRecord, JobTerminalOutcome, Prediction } from "../types.js";
import { NotificationDispatcher, tryOnNotification } from "./notifications.js";
import type { PredictionGateway } from "./predictionGateway.js";

export interface CompletionResult {
  outcome: JobTerminalOutcome;
  /** False when another delivery already moved the job out of `processing`. */
  transitioned: boolean;
}

/**
 * Applies a terminal prediction to its job: resolve, persist, then notify. Shared by the webhook
 * and the stale job reconciler.
 */
export class JobCompletion {
  constructor(
    private readonly jobs: JobStore,
    private readonly gateway: PredictionGateway,
    private readonly notifications: NotificationDispatcher
  ) {}

  /** Returns null while the prediction is still running. */
  async complete(job: JobRecord, prediction: Prediction): Promise<CompletionResult | null> {
    const resolved = this.gateway.resolveOutcome(prediction);
    if (resolved.kind === "pending") return null;

    const outcome: JobTerminalOutcome =
      resolved.kind === "succeeded"
        ? { status: "completed", resultUrl: resolved.outputUrl }
        : { status: "failed", errorMessage: resolved.message };

    const transitioned = await this.jobs.markTerminal(job.id, outcome);
    if (!transitioned) {
      logger.info({ jobId: job.id, predictionId: prediction.id }, "Job already terminal, skipping notification");
      return { outcome, transitioned };
    }

    logger.info(
      {
        jobId: job.id,
        predictionId: prediction.id,
        status: outcome.status,
        resultUrl: outcome.status === "completed" ? outcome.resultUrl : null,
      },
      "Job resolved"
    );

    const notification = tryOnNotification(job, outcome, resolved.kind === "failed" ? resolved.reason : undefined);
    if (notification) {
      this.notifications.enqueue(notification);
    } else {
      logger.debug({ jobId: job.id }, "Job has no notification target");
    }

    return { outcome, transitioned };
  }
}

import { ExplicitFailureError, LookupError, NoOutputError, TimeoutExhaustedError } from "../errors.js";
import { logger } from "../logger.js";
import type { Prediction } from "../types.js";
import type { PredictionGateway } from "./predictionGateway.js";

export interface SyncJobRunnerOptions {
  intervalMs?: number;
  maxAttempts?: number;
  /** Polling gives up after this many lookup failures in a row. */
  maxConsecutiveLookupFailures?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SyncOutcome {
  predictionId: string;
  outputUrl: string;
  attempts: number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Holds the caller while a prediction runs: submit, then poll on a fixed interval up to a fixed
 * number of status checks.
 *
 * Rejects with `ExplicitFailureError` when the provider reports failure, `NoOutputError` when it
 * succeeds without an artifact, and `TimeoutExhaustedError` when the attempts run out.
 */
export class SyncJobRunner {
  private readonly intervalMs: number;
  private readonly maxAttempts: number;
  private readonly maxConsecutiveLookupFailures: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly gateway: PredictionGateway,
    options: SyncJobRunnerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 4_000;
    this.maxAttempts = options.maxAttempts ?? 20;
    this.maxConsecutiveLookupFailures = options.maxConsecutiveLookupFailures ?? 3;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(modelVersion: string, input: Record<string, unknown>): Promise<SyncOutcome> {
    const prediction = await this.gateway.submit(modelVersion, input);
    logger.info({ predictionId: prediction.id, modelVersion }, "Prediction submitted, polling for result");
    return this.waitFor(prediction.id);
  }

  async waitFor(predictionId: string): Promise<SyncOutcome> {
    let lookupFailures = 0;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      let prediction: Prediction | null = null;
      try {
        prediction = await this.gateway.fetch(predictionId);
        lookupFailures = 0;
      } catch (err: unknown) {
        if (!(err instanceof LookupError)) throw err;
        lookupFailures++;
        logger.warn({ predictionId, attempt, lookupFailures }, "Prediction status lookup failed");
        if (lookupFailures >= this.maxConsecutiveLookupFailures) throw err;
      }

      if (prediction) {
        const outcome = this.gateway.resolveOutcome(prediction);
        if (outcome.kind === "succeeded") {
          return { predictionId, outputUrl: outcome.outputUrl, attempts: attempt };
        }
        if (outcome.kind === "failed") {
          if (outcome.reason === "no_output") throw new NoOutputError(predictionId);
          throw new ExplicitFailureError(
            predictionId,
            outcome.reason === "canceled" ? "canceled" : "failed",
            outcome.message
          );
        }
      }

      if (attempt < this.maxAttempts) {
        await this.sleep(this.intervalMs);
      }
    }

    throw new TimeoutExhaustedError(predictionId, this.maxAttempts);
  }
}

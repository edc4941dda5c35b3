import { z } from "zod";
import { logger } from "../logger.js";
import type { JobStore } from "../repository/jobs.js";
import { TERMINAL_PREDICTION_STATUSES, type JobStatus } from "../types.js";
import type { JobCompletion } from "./jobCompletion.js";
import { parsePrediction } from "./predictionGateway.js";

const webhookEnvelopeSchema = z
  .object({
    id: z.string().min(1),
    status: z.string().min(1),
  })
  .passthrough();

export type WebhookAckBody =
  | { error: string }
  | { success: true; message: string }
  | { success: true; job_id: string; status: JobStatus; duplicate: boolean };

export interface WebhookAck {
  httpStatus: 200 | 400;
  body: WebhookAckBody;
}

/**
 * Applies provider completion callbacks to stored jobs. Everything except a malformed payload is
 * acknowledged with 200 so the provider does not redeliver; store failures reject and the route
 * answers 500, which the provider retries.
 */
export class WebhookProcessor {
  constructor(
    private readonly jobs: JobStore,
    private readonly completion: JobCompletion
  ) {}

  async process(payload: unknown): Promise<WebhookAck> {
    const envelope = webhookEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      logger.warn("Malformed webhook payload received");
      return { httpStatus: 400, body: { error: "Bad Request: missing id or status." } };
    }

    const { id: predictionId, status } = envelope.data;
    if (!TERMINAL_PREDICTION_STATUSES.has(status)) {
      logger.debug({ predictionId, status }, "Non-terminal webhook status ignored");
      return { httpStatus: 200, body: { success: true, message: "Acknowledged. Non-terminal status ignored." } };
    }

    const prediction = parsePrediction(payload);
    if (!prediction) {
      logger.warn({ predictionId }, "Webhook payload is not a prediction envelope");
      return { httpStatus: 400, body: { error: "Bad Request: invalid prediction payload." } };
    }

    const job = await this.jobs.findByPredictionId(predictionId);
    if (!job) {
      logger.warn({ predictionId }, "No job found for prediction");
      return { httpStatus: 200, body: { success: true, message: "No matching job found." } };
    }

    const result = await this.completion.complete(job, prediction);
    if (!result) {
      return { httpStatus: 200, body: { success: true, message: "Acknowledged. Non-terminal status ignored." } };
    }

    return {
      httpStatus: 200,
      body: { success: true, job_id: job.id, status: result.outcome.status, duplicate: !result.transitioned },
    };
  }
}

import { ConfigError } from "../errors.js";
import { logger } from "../logger.js";
import type { JobStore } from "../repository/jobs.js";
import type { PredictionGateway } from "./predictionGateway.js";

export const WEBHOOK_PATH = "/api/webhooks/replicate";

export interface TryOnRequest {
  userId: string;
  userImageUrl: string;
  garmentImageUrl: string;
  garmentDescription: string;
  notificationToken: string;
}

export interface TryOnResponse {
  job_id: string;
  message: string;
}

export interface TryOnServiceOptions {
  modelVersion: string;
  callbackBaseUrl: string;
}

/**
 * Submits a garment try-on with a completion webhook and records the job. Returns before the
 * prediction runs; the webhook finishes the job and notifies the device.
 */
export class TryOnService {
  constructor(
    private readonly jobs: JobStore,
    private readonly gateway: PredictionGateway,
    private readonly options: TryOnServiceOptions
  ) {}

  async submit(request: TryOnRequest): Promise<TryOnResponse> {
    if (!this.options.callbackBaseUrl) {
      throw new ConfigError("CALLBACK_BASE_URL environment variable is not configured.");
    }
    const callbackUrl = `${this.options.callbackBaseUrl.replace(/\/+$/, "")}${WEBHOOK_PATH}`;

    const prediction = await this.gateway.submit(
      this.options.modelVersion,
      {
        human_img: request.userImageUrl,
        garm_img: request.garmentImageUrl,
        garment_des: request.garmentDescription,
        is_checked: true,
        is_checked_crop: false,
        denoise_steps: 30,
        seed: 42,
      },
      callbackUrl
    );

    const jobId = await this.jobs.create({
      userId: request.userId,
      kind: "virtual_try_on",
      predictionId: prediction.id,
      notificationToken: request.notificationToken,
      input: {
        userImageUrl: request.userImageUrl,
        garmentImageUrl: request.garmentImageUrl,
        garmentDescription: request.garmentDescription,
      },
    });

    logger.info({ jobId, userId: request.userId, predictionId: prediction.id }, "Try-on job created");

    return {
      job_id: jobId,
      message: "Your virtual try-on is processing. You will receive a push notification when it's ready.",
    };
  }
}

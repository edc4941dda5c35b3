import { z } from "zod";
import { ConfigError, LookupError, NoOutputError, SubmissionError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { Prediction, PredictionOutcome } from "../types.js";

export const predictionStatusSchema = z.enum(["starting", "processing", "succeeded", "failed", "canceled"]);

const predictionSchema = z.object({
  id: z.string().min(1),
  status: predictionStatusSchema,
  output: z.unknown().optional(),
  error: z.unknown().optional(),
  urls: z
    .object({
      get: z.string().nullish(),
      cancel: z.string().nullish(),
    })
    .nullish(),
});

/**
 * Normalise a provider envelope. Returns null when the shape is not a prediction.
 * List items that are not strings become null in place; any other unusable output becomes null.
 */
export function parsePrediction(value: unknown): Prediction | null {
  const parsed = predictionSchema.safeParse(value);
  if (!parsed.success) return null;

  const { id, status, output, error, urls } = parsed.data;
  let normalizedOutput: Prediction["output"] = null;
  if (typeof output === "string") {
    normalizedOutput = output;
  } else if (Array.isArray(output)) {
    normalizedOutput = output.map((item) => (typeof item === "string" ? item : null));
  }

  let normalizedError: string | null = null;
  if (typeof error === "string") {
    normalizedError = error;
  } else if (error !== undefined && error !== null) {
    normalizedError = JSON.stringify(error);
  }

  return {
    id,
    status,
    output: normalizedOutput,
    error: normalizedError,
    urls: { get: urls?.get ?? "", cancel: urls?.cancel ?? "" },
  };
}

export interface PredictionGatewayOptions {
  apiToken: string;
  apiUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Thin client over the Replicate predictions API, plus the output interpretation shared by the
 * polling and webhook paths.
 */
export class PredictionGateway {
  private readonly apiToken: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PredictionGatewayOptions) {
    if (!options.apiToken) {
      throw new ConfigError("REPLICATE_API_TOKEN is not set. Add it to .env and restart the server.");
    }
    this.apiToken = options.apiToken;
    this.apiUrl = (options.apiUrl ?? "https://api.replicate.com/v1").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Create a prediction. With a callback URL the provider posts the final envelope there once
   * the prediction completes.
   */
  async submit(modelVersion: string, input: Record<string, unknown>, callbackUrl?: string): Promise<Prediction> {
    const body = {
      version: modelVersion,
      input,
      ...(callbackUrl ? { webhook: callbackUrl, webhook_events_filter: ["completed"] } : {}),
    };

    let payload: unknown;
    try {
      payload = await this.request("/predictions", {
        method: "POST",
        body: JSON.stringify(body),
      });
    } catch (err: unknown) {
      logger.error({ err, modelVersion }, "Prediction submission failed");
      throw new SubmissionError(`Failed to submit prediction: ${errorMessage(err)}`);
    }

    const prediction = parsePrediction(payload);
    if (!prediction) {
      throw new SubmissionError("Failed to submit prediction: provider returned an unexpected response");
    }
    logger.debug({ predictionId: prediction.id, status: prediction.status }, "Prediction submitted");
    return prediction;
  }

  async fetch(predictionId: string): Promise<Prediction> {
    let payload: unknown;
    try {
      payload = await this.request(`/predictions/${encodeURIComponent(predictionId)}`, { method: "GET" });
    } catch (err: unknown) {
      throw new LookupError(predictionId, `Failed to fetch prediction ${predictionId}: ${errorMessage(err)}`);
    }

    const prediction = parsePrediction(payload);
    if (!prediction) {
      throw new LookupError(predictionId, `Failed to fetch prediction ${predictionId}: unexpected response`);
    }
    return prediction;
  }

  /** First element of a list output, or the scalar output itself. */
  extractResult(prediction: Prediction): string {
    const { output } = prediction;
    if (typeof output === "string" && output.length > 0) return output;
    if (Array.isArray(output)) {
      const [first] = output;
      if (typeof first === "string" && first.length > 0) return first;
    }
    throw new NoOutputError(prediction.id);
  }

  resolveOutcome(prediction: Prediction): PredictionOutcome {
    switch (prediction.status) {
      case "starting":
      case "processing":
        return { kind: "pending" };
      case "succeeded":
        try {
          return { kind: "succeeded", outputUrl: this.extractResult(prediction) };
        } catch (err: unknown) {
          if (!(err instanceof NoOutputError)) throw err;
          return { kind: "failed", reason: "no_output", message: "Model succeeded but returned no output image." };
        }
      case "failed":
        return {
          kind: "failed",
          reason: "provider_failed",
          message: prediction.error ?? "Prediction failed with an unknown error.",
        };
      case "canceled":
        return {
          kind: "failed",
          reason: "canceled",
          message: prediction.error ?? "Prediction was canceled.",
        };
    }
  }

  private async request(path: string, init: { method: "GET" | "POST"; body?: string }): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.apiUrl}${path}`, {
        method: init.method,
        headers: {
          Authorization: `Bearer ${this.apiToken}`,
          "Content-Type": "application/json",
        },
        body: init.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`API returned ${response.status}${await readErrorDetail(response)}`);
      }
      return await response.json();
    } catch (err: unknown) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new Error(`request timed out after ${this.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  if (!text) return "";
  return `: ${parseDetail(text) ?? text.slice(0, 200)}`;
}

// Replicate error bodies look like { "title": ..., "detail": ... }
function parseDetail(text: string): string | null {
  try {
    const data: unknown = JSON.parse(text);
    if (typeof data === "object" && data !== null && "detail" in data && typeof data.detail === "string") {
      return data.detail;
    }
    return null;
  } catch {
    return null;
  }
}

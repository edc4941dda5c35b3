export type PredictionStatus = "starting" | "processing" | "succeeded" | "failed" | "canceled";

export const TERMINAL_PREDICTION_STATUSES: ReadonlySet<string> = new Set<PredictionStatus>(["succeeded", "failed", "canceled"]);

export interface Prediction {
  id: string;
  status: PredictionStatus;
  /** List outputs keep their positions; items that were not strings are null. */
  output: string | Array<string | null> | null;
  error: string | null;
  urls: { get: string; cancel: string };
}

/**
 * What a prediction means for the caller once both paths have looked at it.
 * `pending` while the provider is still working.
 */
export type PredictionOutcome =
  | { kind: "pending" }
  | { kind: "succeeded"; outputUrl: string }
  | { kind: "failed"; reason: PredictionFailureReason; message: string };

export type PredictionFailureReason = "provider_failed" | "canceled" | "no_output";

export type JobStatus = "processing" | "completed" | "failed";

export type JobKind = "virtual_try_on";

/**
 * Terminal transition for a job. Keeping result and error on separate variants means
 * a completed job always has a result URL and a failed one always has a message.
 */
export type JobTerminalOutcome =
  | { status: "completed"; resultUrl: string }
  | { status: "failed"; errorMessage: string };

export interface TryOnJobInput {
  userImageUrl: string;
  garmentImageUrl: string;
  garmentDescription: string;
}

export interface NewJob {
  userId: string;
  kind: JobKind;
  predictionId: string;
  notificationToken: string | null;
  input: TryOnJobInput;
}

export interface JobRecord {
  id: string;
  userId: string;
  kind: JobKind;
  predictionId: string;
  notificationToken: string | null;
  input: TryOnJobInput;
  status: JobStatus;
  resultUrl: string | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface ListingRecord {
  id: string;
  lenderId: string;
  imageUrl: string | null;
  displayImageUrl: string | null;
  isFaceSwapped: boolean;
}

export type ErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "FAILED_PRECONDITION"
  | "DATABASE_ERROR"
  | "START_FAILED"
  | "LOOKUP_FAILED"
  | "MODEL_FAILED"
  | "DEADLINE_EXCEEDED";

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: number;

  constructor(message: string, code: ErrorCode, httpStatus: number) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", 500);
    this.name = "ConfigError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 400);
    this.name = "ValidationError";
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Authentication required") {
    super(message, "UNAUTHORIZED", 401);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, "FORBIDDEN", 403);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class PreconditionError extends AppError {
  constructor(message: string) {
    super(message, "FAILED_PRECONDITION", 412);
    this.name = "PreconditionError";
  }
}

export class DatabaseError extends AppError {
  constructor(message: string) {
    super(`Database error: ${message}`, "DATABASE_ERROR", 500);
    this.name = "DatabaseError";
  }
}

/** The provider rejected the prediction or could not be reached at submit time. */
export class SubmissionError extends AppError {
  constructor(message: string) {
    super(message, "START_FAILED", 502);
    this.name = "SubmissionError";
  }
}

/** Reading a prediction's status failed; usually transient. */
export class LookupError extends AppError {
  readonly predictionId: string;

  constructor(predictionId: string, message: string) {
    super(message, "LOOKUP_FAILED", 502);
    this.name = "LookupError";
    this.predictionId = predictionId;
  }
}

/** The provider reported `failed` or `canceled`. Retrying without new input rarely helps. */
export class ExplicitFailureError extends AppError {
  readonly predictionId: string;
  readonly providerStatus: "failed" | "canceled";

  constructor(predictionId: string, providerStatus: "failed" | "canceled", message: string) {
    super(message, "MODEL_FAILED", 502);
    this.name = "ExplicitFailureError";
    this.predictionId = predictionId;
    this.providerStatus = providerStatus;
  }
}

/** The poll budget ran out before the prediction reached a terminal status. */
export class TimeoutExhaustedError extends AppError {
  readonly predictionId: string;
  readonly attempts: number;

  constructor(predictionId: string, attempts: number) {
    super(`Prediction ${predictionId} did not complete within ${attempts} status checks.`, "DEADLINE_EXCEEDED", 504);
    this.name = "TimeoutExhaustedError";
    this.predictionId = predictionId;
    this.attempts = attempts;
  }
}

/** The provider claimed success but returned nothing usable. */
export class NoOutputError extends AppError {
  readonly predictionId: string;

  constructor(predictionId: string) {
    super(`Prediction ${predictionId} succeeded but returned no output URL.`, "MODEL_FAILED", 502);
    this.name = "NoOutputError";
    this.predictionId = predictionId;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  // PostgREST errors arrive as plain objects
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

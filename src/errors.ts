// Presentation Analyzer - Error Taxonomy
//
// Input errors and front-end failures are fatal to a job. Per-metric failures
// never surface as these types; the metric framework records them as
// abstained results.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Missing or invalid submission fields, unreadable audio. */
export class InputValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 400, "invalid_input", context);
  }
}

/** The acoustic front end could not produce features. */
export class FrontEndError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 502, "front_end_error", context);
  }
}

export class JobNotFoundError extends AppError {
  constructor(jobId: string) {
    super(`Job with id '${jobId}' not found`, 404, "job_not_found", { jobId });
  }
}

export class JobNotReadyError extends AppError {
  constructor(jobId: string, status: string) {
    super(`Job '${jobId}' is ${status}; the report is only available once done`, 409, "job_not_ready", {
      jobId,
      status,
    });
  }
}

export class InvalidTransitionError extends AppError {
  constructor(jobId: string, from: string, to: string) {
    super(
      `Invalid state transition: cannot move job '${jobId}' from "${from}" to "${to}".`,
      409,
      "invalid_transition",
      { jobId, from, to },
    );
  }
}

export class JobTimeoutError extends AppError {
  constructor(jobId: string, timeoutMs: number) {
    super(`Analysis of job '${jobId}' exceeded ${timeoutMs} ms`, 504, "timeout", { jobId, timeoutMs });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

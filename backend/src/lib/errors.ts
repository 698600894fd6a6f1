/**
 * Error taxonomy for the sync pipeline.
 *
 * Thrown errors cover the failures that interrupt work (fetch, classify, persist).
 * Decisions that are not failures, like a low-confidence classification or an
 * ambiguous match, are reported as skip reasons or match outcomes instead.
 */

export const ErrorCodes = {
  TRANSIENT_FETCH: "TRANSIENT_FETCH",
  TRANSIENT_CLASSIFY: "TRANSIENT_CLASSIFY",
  INVALID_CLASSIFIER_RESPONSE: "INVALID_CLASSIFIER_RESPONSE",
  PERSISTENCE: "PERSISTENCE",
  SINK: "SINK",
  RUN_IN_PROGRESS: "RUN_IN_PROGRESS",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class TrackerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransientFetchError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.TRANSIENT_FETCH, message, options);
  }
}

export class TransientClassifyError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.TRANSIENT_CLASSIFY, message, options);
  }
}

export class InvalidClassifierResponseError extends TrackerError {
  constructor(
    message: string,
    readonly rawResponse?: string,
  ) {
    super(ErrorCodes.INVALID_CLASSIFIER_RESPONSE, message);
  }
}

export class PersistenceError extends TrackerError {
  constructor(
    message: string,
    readonly messageId: string,
    options?: { cause?: unknown },
  ) {
    super(ErrorCodes.PERSISTENCE, message, options);
  }
}

export class SinkError extends TrackerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SINK, message, options);
  }
}

export class RunInProgressError extends TrackerError {
  constructor() {
    super(ErrorCodes.RUN_IN_PROGRESS, "A sync run is already in progress");
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export type SubmissionErrorCode =
  | "validation_failed"
  | "serialization_failed"
  | "transport_failed"
  | "wait_interrupted";

export class SubmissionError extends Error {
  readonly code: SubmissionErrorCode;

  constructor(code: SubmissionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends SubmissionError {
  readonly details?: unknown;

  constructor(message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super("validation_failed", message, { cause: options.cause });
    this.details = options.details;
  }
}

export class SerializationError extends SubmissionError {
  constructor(message: string, cause: unknown) {
    super("serialization_failed", message, { cause });
  }
}

export class TransportError extends SubmissionError {
  constructor(message: string, cause: unknown) {
    super("transport_failed", message, { cause });
  }
}

/** Thrown by `ThrottledGate.acquire` when the caller's signal aborts the wait. */
export class InterruptedWaitError extends SubmissionError {
  constructor(reason?: unknown) {
    super("wait_interrupted", "Throttle wait was interrupted", { cause: reason });
  }
}

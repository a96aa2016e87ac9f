/**
 * Errors that carry the HTTP status and the message the client is allowed
 * to see. Anything else reaching a response is reported as a 500.
 */
export class AppError extends Error {
  readonly status: number;
  readonly details?: string;

  constructor(status: number, message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }

  toJSON(): { error: string; details?: string } {
    return this.details === undefined
      ? { error: this.message }
      : { error: this.message, details: this.details };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: string) {
    super(400, message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super(401, message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden") {
    super(403, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(413, message);
  }
}

export class UnprocessableError extends AppError {
  constructor(message: string) {
    super(422, message);
  }
}

/** A library failed while transforming a document. The cause stays server-side. */
export class ProcessingError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(500, message);
    this.cause = cause;
  }
}

interface HttpLikeError extends Error {
  status: number;
  expose?: boolean;
}

// body-parser and friends throw http-errors instances
export function isHttpLikeError(error: unknown): error is HttpLikeError {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number"
  );
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

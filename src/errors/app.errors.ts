/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown when required environment variables are missing
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Transient transport error - network failure, timeout or a backend status
 * that is safe to retry through the same idempotent key path
 */
export class TransientTransportError extends AppError {
  constructor(
    message: string,
    public readonly rpc?: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "TRANSIENT_TRANSPORT", cause);
  }
}

/**
 * Conflict error - the identity is owned or claimed by another context.
 * Fatal for the call, never retried.
 */
export class ConflictError extends AppError {
  constructor(
    message: string,
    public readonly rpc?: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "CONFLICT", cause);
  }
}

/**
 * Validation error - caller supplied a malformed identity or omitted a
 * required field. A programming error: fail fast, never retried.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: Error,
  ) {
    super(message, "VALIDATION_ERROR", cause);
  }
}

/**
 * Check whether an error may be retried with backoff
 */
export function isTransientError(error: unknown): error is TransientTransportError {
  return error instanceof TransientTransportError;
}

/**
 * Safely convert an unknown thrown value to a message. Never throws.
 */
export function toErrorMessage(error: unknown): string {
  if (!error) return "";
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Normalise an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(toErrorMessage(error));
}

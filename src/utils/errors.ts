/**
 * Custom Application Errors
 * Domain-specific error classes mapped to HTTP status codes by the error handler.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
 * `details` are merged into the JSON error body.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or incorrect API key (401).
 */
export class AuthenticationError extends AppError {
  constructor(message = "Invalid or missing API key") {
    super(message, 401);
  }
}

/**
 * Missing or malformed request input (400).
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/**
 * Video duration exceeds the configured ceiling (400).
 * A policy limit, not a malfunction.
 */
export class VideoTooLongError extends AppError {
  constructor(
    public readonly duration: number,
    public readonly maxDuration: number
  ) {
    super(`Video too long (${duration}s). Maximum allowed: ${maxDuration}s`, 400, true, {
      duration,
      max_duration: maxDuration,
    });
  }
}

/**
 * The extractor failed (network, unsupported site, internal error, timeout).
 * Carries the underlying error text as-is.
 */
export class ExtractionError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, 400);
    if (originalError?.stack) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, details?: Record<string, unknown>) {
    super(`${resource} not found`, 404, true, details);
  }
}

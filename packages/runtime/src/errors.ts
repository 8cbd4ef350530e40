// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * A notification lacks a field its type requires (no item stack, no recipe,
 * no buffer, an invalid handle). Sessions drop such notifications without
 * emitting anything.
 */
export class MalformedNotificationError extends ValidationError {
  readonly notificationType: string;
  readonly issues: string[];

  constructor(notificationType: string, issues: string[]) {
    super(`Malformed "${notificationType}" notification: ${issues.join('; ')}`, {
      details: { notificationType, issues },
    });
    this.name = 'MalformedNotificationError';
    this.notificationType = notificationType;
    this.issues = issues;
  }
}

/**
 * A consumer tried to subscribe with an identifier that is not the current
 * session's feed identifier (usually one from before a session reset).
 */
export class FeedIdentifierError extends RuntimeError {
  readonly feedId: string;

  constructor(feedId: string) {
    super('FEED_IDENTIFIER_MISMATCH', `Unknown or stale feed identifier: ${feedId}`);
    this.name = 'FeedIdentifierError';
    this.feedId = feedId;
  }
}

/**
 * Configuration values failed validation.
 */
export class ConfigurationError extends ValidationError {
  constructor(message: string, field?: string) {
    super(message, { field });
    this.name = 'ConfigurationError';
  }
}

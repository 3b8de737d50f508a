/**
 * Structured Error Classes for the Career Companion service
 *
 * Every failure the service distinguishes has its own class so callers can
 * branch on `instanceof` or on the stable `code`.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Validation errors
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  MISSING_FIELD: 'MISSING_FIELD',

  // Registry errors
  NOT_FOUND: 'NOT_FOUND',
  BACKEND_UNAVAILABLE: 'BACKEND_UNAVAILABLE',

  // File system errors
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  IO_ERROR: 'IO_ERROR',

  // Resolution errors
  PROMPT_UNAVAILABLE: 'PROMPT_UNAVAILABLE',

  // Collaborator errors
  MODEL_ERROR: 'MODEL_ERROR',
  SECRET_NOT_FOUND: 'SECRET_NOT_FOUND',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all career companion errors
 */
export class CareerCompanionError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'CareerCompanionError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }
}

/**
 * Request payload failed schema validation
 */
export class ValidationError extends CareerCompanionError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: Error) {
    super(message, ErrorCodes.VALIDATION_FAILED, { issues }, cause);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * No version is bound to the alias, or the name is unknown to the registry
 */
export class NotFoundError extends CareerCompanionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.NOT_FOUND, details, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Registry or tracking backend could not be reached
 */
export class BackendUnavailableError extends CareerCompanionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.BACKEND_UNAVAILABLE, details, cause);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * Prompt file does not exist
 */
export class FileNotFoundError extends CareerCompanionError {
  constructor(path: string, cause?: Error) {
    super(`Prompt file not found: ${path}`, ErrorCodes.FILE_NOT_FOUND, { path }, cause);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Prompt file exists but could not be read
 */
export class IOError extends CareerCompanionError {
  constructor(path: string, reason: string, cause?: Error) {
    super(`Failed to read prompt file ${path}: ${reason}`, ErrorCodes.IO_ERROR, { path }, cause);
    this.name = 'IOError';
  }
}

/**
 * Template references a placeholder the caller did not supply
 */
export class MissingFieldError extends CareerCompanionError {
  public readonly field: string;

  constructor(field: string, templateName?: string) {
    super(`Missing value for template field '${field}'`, ErrorCodes.MISSING_FIELD, {
      field,
      templateName,
    });
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

/**
 * Generation call failed
 */
export class ModelError extends CareerCompanionError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.MODEL_ERROR, details, cause);
    this.name = 'ModelError';
  }
}

/**
 * Neither the registry nor the local file could supply the prompt
 */
export class PromptUnavailableError extends CareerCompanionError {
  constructor(promptName: string, cause?: Error) {
    super(`Prompt '${promptName}' is unavailable`, ErrorCodes.PROMPT_UNAVAILABLE, { promptName }, cause);
    this.name = 'PromptUnavailableError';
  }
}

/**
 * Secret lookup failed
 */
export class SecretNotFoundError extends CareerCompanionError {
  constructor(secretName: string, cause?: Error) {
    super(`Secret '${secretName}' could not be retrieved`, ErrorCodes.SECRET_NOT_FOUND, { secretName }, cause);
    this.name = 'SecretNotFoundError';
  }
}

/**
 * Type guard to check if an error is a CareerCompanionError
 */
export function isCareerCompanionError(error: unknown): error is CareerCompanionError {
  return error instanceof CareerCompanionError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

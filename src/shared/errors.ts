// ============================================================================
// Base Error Classes
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request') {
    super(message, 400, 'BAD_REQUEST');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

// ============================================================================
// Check-in Domain Errors
// ============================================================================

/**
 * The history query failed or the subject could not be resolved.
 * Local to one evaluation: callers log it and fall back to a neutral result.
 */
export class HistoryUnavailableError extends AppError {
  public readonly subjectId: string;
  public readonly originalError?: Error;

  constructor(subjectId: string, originalError?: Error) {
    super(
      `Check-in history unavailable for subject ${subjectId}`,
      503,
      'HISTORY_UNAVAILABLE'
    );
    this.subjectId = subjectId;
    this.originalError = originalError;
  }
}

export class SubjectNotFoundError extends AppError {
  public readonly subjectId: string;

  constructor(subjectId: string) {
    super(`Subject not found: ${subjectId}`, 404, 'SUBJECT_NOT_FOUND');
    this.subjectId = subjectId;
  }
}

// ============================================================================
// External Service Errors
// ============================================================================

export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 502, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
    this.originalError = originalError;
  }
}

export class ChatwootError extends ExternalServiceError {
  constructor(message: string, originalError?: Error) {
    super('Chatwoot', message, originalError);
  }
}

// ============================================================================
// Database Errors
// ============================================================================

export class DatabaseError extends AppError {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(`Database error: ${message}`, 500, 'DATABASE_ERROR', false);
    this.originalError = originalError;
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends AppError {
  public readonly errors: Record<string, string[]>;

  constructor(errors: Record<string, string[]>) {
    const message = Object.entries(errors)
      .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
      .join('; ');

    super(message, 400, 'VALIDATION_ERROR');
    this.errors = errors;
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

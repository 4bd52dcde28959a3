/**
 * Application error types.
 * Every error the domain, services and adapters raise on purpose extends AppError,
 * so the HTTP layer can map it to a status code without inspecting messages.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'REFERENTIAL_INTEGRITY_ERROR'
  | 'NOT_FOUND'
  | 'RENDER_ERROR'
  | 'AUTHENTICATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'PERSISTENCE_ERROR';

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: string[];

  constructor(message: string, statusCode: number, code: ErrorCode, details?: string[], options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

/**
 * Malformed or invariant-violating input.
 *
 * @example
 * throw new ValidationError('Due date cannot be before invoice date');
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class ReferentialIntegrityError extends AppError {
  constructor(message: string) {
    super(message, 409, 'REFERENTIAL_INTEGRITY_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string) {
    super(`${entity} not found`, 404, 'NOT_FOUND');
  }
}

/**
 * PDF pipeline failure. Surfaced as-is: there is no degraded document.
 */
export class RenderError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'RENDER_ERROR', undefined, { cause });
  }
}

export class AuthenticationError extends AppError {
  constructor(message = 'Invalid authentication credentials') {
    super(message, 401, 'AUTHENTICATION_ERROR');
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: string[]) {
    super(message, 500, 'CONFIGURATION_ERROR', details);
  }
}

export class PersistenceError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(`Failed to ${operation}: ${errorMessage(cause)}`, 500, 'PERSISTENCE_ERROR', undefined, { cause });
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

import type {Context} from 'hono';
import {
  type ApiErrorResponse,
  type ConflictError,
  type DatabaseError,
  type FieldError,
  type NotFoundError,
  type ValidationError,
  ErrorCodes,
} from '../types/errors';

export function createValidationError(
  c: Context,
  validationErrors: FieldError[],
): Response {
  const errorResponse: ValidationError = {
    error: 'Validation failed',
    code: ErrorCodes.VALIDATION_ERROR,
    details: validationErrors,
  };
  return c.json(errorResponse, 422);
}

export function createDatabaseError(
  c: Context,
  operation: string,
  originalError?: unknown,
): Response {
  console.error(`Database error in ${operation}:`, originalError);

  const errorResponse: DatabaseError = {
    error: 'Database operation failed',
    code: ErrorCodes.DATABASE_ERROR,
    details: {operation},
  };
  return c.json(errorResponse, 500);
}

export function createNotFoundError(
  c: Context,
  message: string,
  details?: NotFoundError['details'],
): Response {
  const errorResponse: NotFoundError = {
    error: message,
    code: ErrorCodes.NOT_FOUND,
    details,
  };
  return c.json(errorResponse, 404);
}

export function createConflictError(
  c: Context,
  message: string,
  details?: ConflictError['details'],
): Response {
  const errorResponse: ConflictError = {
    error: message,
    code: ErrorCodes.CONFLICT,
    details,
  };
  return c.json(errorResponse, 409);
}

export function createInternalServerError(
  c: Context,
  originalError?: unknown,
  context?: string,
): Response {
  console.error(
    `Internal server error${context ? ` in ${context}` : ''}:`,
    originalError,
  );

  const errorResponse: ApiErrorResponse = {
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
  };
  return c.json(errorResponse, 500);
}

type IssueLike = {path: Array<string | number>; message: string};

export function formatZodErrors(zodError: {issues: IssueLike[]}): FieldError[] {
  return zodError.issues.map(issue => ({
    field: issue.path.join('.') || 'root',
    message: issue.message,
  }));
}

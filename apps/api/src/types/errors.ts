export type ApiError = {
  error: string;
  code: string;
  details?: Record<string, unknown>;
};

export type FieldError = {
  field: string;
  message: string;
};

export type ValidationError = {
  error: string;
  code: 'VALIDATION_ERROR';
  details: FieldError[];
};

export type DatabaseError = {
  error: string;
  code: 'DATABASE_ERROR';
  details?: {
    operation: string;
  };
};

export type NotFoundError = {
  error: string;
  code: 'NOT_FOUND';
  details?: {
    resource: string;
    identifier: string;
  };
};

export type ConflictError = {
  error: string;
  code: 'CONFLICT';
  details?: {
    resource: string;
    constraint: string;
  };
};

export type ApiErrorResponse =
  | ApiError
  | ValidationError
  | DatabaseError
  | NotFoundError
  | ConflictError;

export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

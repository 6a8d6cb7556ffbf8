import type {Context, ErrorHandler} from 'hono';
import {ResourceConflictError, ResourceNotFoundError} from '../services';
import {
  createConflictError,
  createDatabaseError,
  createInternalServerError,
  createNotFoundError,
} from '../utils/error-handlers';

export const globalErrorHandler: ErrorHandler = (error, c) => {
  if (error instanceof ResourceNotFoundError) {
    return createNotFoundError(c, error.message, error.details);
  }

  if (error instanceof ResourceConflictError) {
    return createConflictError(c, error.message, error.details);
  }

  if (error.name === 'SQLiteError' || error.name === 'LibsqlError') {
    return createDatabaseError(c, `${c.req.method} ${c.req.path}`, error);
  }

  return createInternalServerError(c, error);
};

export const notFoundHandler = (c: Context) =>
  c.json(
    {
      error: 'Endpoint not found',
      code: 'NOT_FOUND',
      details: {
        path: c.req.path,
        method: c.req.method,
      },
    },
    404,
  );

import {Hono} from 'hono';
import {describe, expect, it} from 'vitest';
import {
  globalErrorHandler,
  notFoundHandler,
} from '../middleware/error-handler';
import {movieNotFound} from '../services';

const appThrowing = (error: Error) => {
  const app = new Hono();
  app.get('/boom', () => {
    throw error;
  });
  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);
  return app;
};

describe('globalErrorHandler', () => {
  it('should map a missing resource to 404', async () => {
    const response = await appThrowing(movieNotFound(9)).request('/boom');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: 'Movie with the given ID was not found.',
      code: 'NOT_FOUND',
      details: {resource: 'movie', identifier: '9'},
    });
  });

  it('should report driver failures as database errors', async () => {
    const error = new Error('SQLITE_IOERR: disk I/O error');
    error.name = 'LibsqlError';

    const response = await appThrowing(error).request('/boom');

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'Database operation failed',
      code: 'DATABASE_ERROR',
      details: {operation: 'GET /boom'},
    });
  });

  it('should treat any other error as internal', async () => {
    const error = Object.assign(new Error('unexpected'), {
      issues: [{path: ['name'], message: 'Required'}],
    });

    const response = await appThrowing(error).request('/boom');

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
    });
  });
});

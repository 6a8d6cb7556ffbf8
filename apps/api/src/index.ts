import type {Database} from '@theater/database';
import {Hono} from 'hono';
import {cors} from 'hono/cors';
import {logger} from 'hono/logger';
import type {AppConfig} from './config';
import {globalErrorHandler, notFoundHandler} from './middleware/error-handler';
import {securityHeaders} from './middleware/security';
import {documentationRoutes} from './routes/documentation';
import {moviesRoutes} from './routes/movies';
import type {AppEnvironment} from './types/environment';

export type AppDependencies = {
  database: Database;
  config: AppConfig;
};

export function createApp({database, config}: AppDependencies) {
  // Trailing slashes are optional: `/movies` and `/movies/` are one route.
  const app = new Hono<AppEnvironment>({strict: false});

  // No request log under test
  if (config.nodeEnv !== 'test') {
    app.use('*', logger());
  }

  app.use(
    '*',
    cors({
      origin(origin) {
        // Allow all localhost origins in development
        if (origin.startsWith('http://localhost:')) {
          return origin;
        }

        return config.corsOrigins.includes(origin) ? origin : null;
      },
      credentials: true,
    }),
  );

  // Apply security headers to all routes except documentation
  app.use('*', async (c, next) => {
    return c.req.path.startsWith('/docs')
      ? next()
      : securityHeaders(c, next);
  });

  app.use('*', async (c, next) => {
    c.set('database', database);
    c.set('config', config);
    await next();
  });

  app.route('/docs', documentationRoutes);
  app.route(`${config.apiBasePath}/movies`, moviesRoutes);

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  return app;
}

import type {Environment} from '@theater/database';
import {z} from 'zod';

const optionalString = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().optional(),
);

const configSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
    DATABASE_URL: z.string().min(1).default('file:theater.db'),
    DATABASE_AUTH_TOKEN: optionalString,
    API_BASE_PATH: z
      .string()
      .regex(
        /^(?:\/[\w.-]+)*$/,
        'API_BASE_PATH must start with "/" and must not end with "/"',
      )
      .default('/theater'),
    CORS_ORIGINS: optionalString,
  })
  .transform(environment => ({
    nodeEnv: environment.NODE_ENV,
    port: environment.PORT,
    database: {
      DATABASE_URL: environment.DATABASE_URL,
      DATABASE_AUTH_TOKEN: environment.DATABASE_AUTH_TOKEN,
    } satisfies Environment,
    apiBasePath: environment.API_BASE_PATH,
    corsOrigins: (environment.CORS_ORIGINS ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
  }));

export type AppConfig = z.output<typeof configSchema>;

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = configSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return result.data;
}

import type {Context, Next} from 'hono';

export const securityHeaders = async (c: Context, next: Next) => {
  await next();

  c.header('X-Content-Type-Options', 'nosniff');
  c.header('X-Frame-Options', 'DENY');
  c.header('Referrer-Policy', 'strict-origin-when-cross-origin');
  c.header(
    'Content-Security-Policy',
    "default-src 'none'; frame-ancestors 'none'",
  );
  c.header(
    'Strict-Transport-Security',
    'max-age=31536000; includeSubDomains',
  );
};

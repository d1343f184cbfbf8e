import type { MiddlewareHandler } from 'hono';

export const DEV_API_KEY = 'hub-dev-key';

/**
 * Configured hub key. Outside production a fixed development key is used when none is set.
 */
export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env.API_KEY || env.HUB_API_KEY || (env.NODE_ENV === 'production' ? undefined : DEV_API_KEY);
}

/**
 * Credentials from an `Authorization: Bearer <key>` header
 */
function bearerCredentials(header: string): string | undefined {
  const [scheme, ...rest] = header.trim().split(/\s+/);
  if (scheme.toLowerCase() !== 'bearer' || rest.length !== 1) {
    return undefined;
  }
  return rest[0];
}

/**
 * API key check for /api routes. The key is read on every request.
 */
export function apiKeyAuth(env: NodeJS.ProcessEnv = process.env): MiddlewareHandler {
  return async (c, next) => {
    const apiKey = resolveApiKey(env);
    if (!apiKey) {
      return c.json({ error: 'API key not configured' }, 500);
    }

    const header = c.req.header('authorization');
    if (!header) {
      return c.json({ error: 'Missing Authorization header' }, 401);
    }

    const key = bearerCredentials(header);
    if (key === undefined) {
      return c.json({ error: 'Authorization header must be "Bearer <key>"' }, 401);
    }
    if (key !== apiKey) {
      return c.json({ error: 'Invalid API key' }, 401);
    }

    await next();
  };
}

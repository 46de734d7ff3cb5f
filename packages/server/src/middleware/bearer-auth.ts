import type { MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';
import type { AccessGate } from '../services/access-gate.js';
import { HEADER_AUTHORIZATION } from '../config/constants.js';

/**
 * Middleware enforcing the access gate on every request
 *
 * Sets `identity` in context variables on success; rejections propagate to
 * the error handler as 401.
 */
export function accessGate(gate: AccessGate): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const result = await gate.authenticate(c.req.header(HEADER_AUTHORIZATION), c.req.path);

    if (result.outcome === 'rejected') {
      throw result.error;
    }

    if (result.outcome === 'authenticated') {
      c.set('identity', result.identity);
    }

    await next();
  };
}

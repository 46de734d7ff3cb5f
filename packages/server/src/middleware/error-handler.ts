import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { Logger } from 'pino';
import type { AuthEnv } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import {
  SERVICE_NAME,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_WWW_AUTHENTICATE,
} from '../config/constants.js';

/**
 * Global error handler
 *
 * Logs the internal code and description; responds with the public body only.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AuthEnv> {
  return (err, c) => {
    const requestId = c.get('requestId');

    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    if (err instanceof AuthError) {
      const fields = {
        requestId,
        code: err.code,
        status: err.statusCode,
        description: err.description,
      };
      if (err.statusCode >= 500) {
        logger.error({ ...fields, err: err.cause ?? err }, 'request failed');
      } else {
        logger.info(fields, 'request rejected');
      }

      if (err.statusCode === 401) {
        c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${SERVICE_NAME}", error="invalid_token"`);
      }

      return c.json(err.toJSON(), err.statusCode);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    // Handle unexpected errors
    logger.error({ requestId, err }, 'unhandled error');
    return c.json(AuthError.internalError().toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(nodeEnv: string): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
    c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    // Strict Transport Security (enable in production with HTTPS)
    if (nodeEnv === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(logger: Logger): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Don't log query strings: they carry codes and state
    logger.info(
      {
        requestId: c.get('requestId'),
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration: Date.now() - start,
      },
      'request completed'
    );
  };
}

import { Hono } from 'hono';
import { getSignedCookie, deleteCookie } from 'hono/cookie';
import type { TokenResponse } from '@org-auth/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { LoginService } from '../../services/login-service.js';
import type { AuthConfig } from '../../config/index.js';
import type { HttpMetrics } from '../../metrics/http-metrics.js';
import {
  STATE_COOKIE_PATH,
  TOKEN_TYPE_BEARER,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

export interface CallbackRoutesOptions {
  loginService: LoginService;
  config: Pick<AuthConfig, 'stateCookieName' | 'stateCookieSecret' | 'secureCookies'>;
  metrics?: HttpMetrics;
}

/**
 * Create identity provider callback routes
 */
export function createCallbackRoutes(options: CallbackRoutesOptions): Hono<AuthEnv> {
  const { loginService, config, metrics } = options;
  const app = new Hono<AuthEnv>();

  /**
   * GET /auth/callback
   * Verify state, redeem the code and return a session token
   */
  app.get('/callback', async (c) => {
    // false when the cookie signature does not verify
    const signed = await getSignedCookie(c, config.stateCookieSecret, config.stateCookieName);
    const attemptId = typeof signed === 'string' ? signed : undefined;

    deleteCookie(c, config.stateCookieName, {
      path: STATE_COOKIE_PATH,
      httpOnly: true,
      secure: config.secureCookies,
    });

    try {
      // Single use whatever the outcome
      const storedAttempt = await loginService.consumeAttempt(attemptId);

      const result = await loginService.handleCallback({
        presentedState: c.req.query('state'),
        code: c.req.query('code'),
        storedAttempt,
        idpError: c.req.query('error'),
      });

      metrics?.loginsTotal.inc({ outcome: result.isNewUser ? 'provisioned' : 'returning' });

      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const body: TokenResponse = {
        access_token: result.token,
        token_type: TOKEN_TYPE_BEARER,
        expires_in: result.expiresIn,
      };
      return c.json(body, 200);
    } catch (error) {
      metrics?.loginsTotal.inc({ outcome: 'failed' });
      throw error;
    }
  });

  return app;
}

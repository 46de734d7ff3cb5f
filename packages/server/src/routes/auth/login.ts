import { Hono } from 'hono';
import { setSignedCookie } from 'hono/cookie';
import type { AuthEnv } from '../../types/hono.js';
import type { LoginService } from '../../services/login-service.js';
import type { AuthConfig } from '../../config/index.js';
import {
  STATE_COOKIE_PATH,
  HEADER_CACHE_CONTROL,
  TOKEN_CACHE_CONTROL,
} from '../../config/constants.js';

export interface LoginRoutesOptions {
  loginService: LoginService;
  config: Pick<AuthConfig, 'stateCookieName' | 'stateCookieSecret' | 'secureCookies'>;
}

/**
 * Create login initiation routes
 */
export function createLoginRoutes(options: LoginRoutesOptions): Hono<AuthEnv> {
  const { loginService, config } = options;
  const app = new Hono<AuthEnv>();

  /**
   * GET|POST /auth/login
   * Store a fresh attempt and redirect to the identity provider
   */
  app.on(['GET', 'POST'], '/login', async (c) => {
    const { redirectUrl, attemptId, expiresIn } = await loginService.initiateLogin();

    await setSignedCookie(c, config.stateCookieName, attemptId, config.stateCookieSecret, {
      path: STATE_COOKIE_PATH,
      httpOnly: true,
      secure: config.secureCookies,
      sameSite: 'Lax',
      maxAge: expiresIn,
    });
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);

    return c.redirect(redirectUrl, 302);
  });

  return app;
}

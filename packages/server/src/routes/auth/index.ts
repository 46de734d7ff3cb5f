import { Hono } from 'hono';
import type { AuthEnv } from '../../types/hono.js';
import { createLoginRoutes, type LoginRoutesOptions } from './login.js';
import { createCallbackRoutes, type CallbackRoutesOptions } from './callback.js';

export type AuthRoutesOptions = LoginRoutesOptions & CallbackRoutesOptions;

/**
 * Create login handshake routes
 *
 * Routes:
 * - GET|POST /auth/login - Start a login attempt
 * - GET /auth/callback - Complete it
 */
export function createAuthRoutes(options: AuthRoutesOptions): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.route('/', createLoginRoutes(options));
  app.route('/', createCallbackRoutes(options));

  return app;
}

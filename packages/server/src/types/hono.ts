import type { Context } from 'hono';
import type { RequestIdVariables } from 'hono/request-id';
import type { IdentityContext } from '@org-auth/shared';

/**
 * Hono context variables set by the middleware chain
 */
export type AuthVariables = RequestIdVariables & {
  identity?: IdentityContext;
};

export type AuthEnv = { Variables: AuthVariables };

export type AuthContext = Context<AuthEnv>;

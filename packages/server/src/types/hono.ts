import type { Context } from 'hono';
import type { Principal } from './user.js';

/**
 * Hono context variables set by the middleware chain
 */
export interface AuthVariables {
  signal: AbortSignal;
  principal: Principal;
}

export type AuthEnv = { Variables: AuthVariables };

export type AuthContext = Context<AuthEnv>;


// ---------------------------------------------------------------------------
// Bearer-token authentication
// ---------------------------------------------------------------------------
// Tokens are HS256 JWTs issued by the account service with claims
// { sub: "<userId>", role: "admin" | "customer" }.
// ---------------------------------------------------------------------------

import { createMiddleware } from 'hono/factory';
import { verify } from 'hono/jwt';
import { extendRequestContext } from '../request-context.js';
import type { UserRole } from '../store/directory.js';
import { TokenClaimsSchema } from './dto.js';
import { errorBody } from './errors.js';
import { createServiceLogger } from '../logging/logger.js';

const log = createServiceLogger('http');

export interface AuthUser {
  id: number;
  role: UserRole;
}

export type AppEnv = {
  Variables: {
    user: AuthUser;
    requestId: string;
  };
};

/**
 * Rejects the request with 401 unless it carries a valid bearer token.
 * `secret` is resolved per request so that configuration loaded after the
 * app was built still applies.
 */
export function requireAuth(secret: () => string) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const header = c.req.header('Authorization');
    const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : undefined;
    if (!token) {
      return c.json(errorBody('UNAUTHORIZED', 'Missing bearer token'), 401);
    }

    let payload: unknown;
    try {
      payload = await verify(token, secret(), 'HS256');
    } catch (err) {
      log.debug('Token rejected', { reason: err instanceof Error ? err.message : String(err) });
      return c.json(errorBody('UNAUTHORIZED', 'Invalid token'), 401);
    }

    const claims = TokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      return c.json(errorBody('UNAUTHORIZED', 'Invalid token claims'), 401);
    }

    const user: AuthUser = { id: Number(claims.data.sub), role: claims.data.role };
    c.set('user', user);
    extendRequestContext({ userId: user.id });
    await next();
  });
}

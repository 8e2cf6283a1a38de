// =============================================================================
// PUBLISHING DESK — Authentication Middleware
//
// Verifies the bearer JWT (signature, expiry, claim shape), checks that its
// session has not been terminated by logout, and attaches the identity from
// the verified claims to the request.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { AppContext } from '../context';
import { bearerToken, verifyAccessToken } from '../auth/tokens';
import { AuthenticatedUser } from '../types/auth';
import { UnauthenticatedError } from '../types/errors';

/**
 * Authenticate incoming requests via JWT Bearer token.
 * Every failure is a 401 and happens before any permission check.
 */
export function authenticate(ctx: AppContext): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const token = bearerToken(req.headers.authorization);
      const user = verifyAccessToken(token, ctx.config.jwt.secret);

      // Check session is still active (not terminated by logout)
      const session = await ctx.store.sessions.findActive(user.tokenId);
      if (!session || session.userId !== user.id) {
        throw new UnauthenticatedError('Session expired or terminated');
      }

      req.user = user;
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** The authenticated identity; routes behind authenticate() only. */
export function currentUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthenticatedError('Authentication required');
  }
  return req.user;
}

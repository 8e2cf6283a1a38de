// =============================================================================
// PUBLISHING DESK — Permission Guard Middleware
//
// Verifies the authenticated user's role holds the named permission.
// Used on individual routes: requirePermission(ctx, 'content.approve')
// Denials are forwarded as ForbiddenError; the error handler records the
// ACCESS_DENIED audit entry before responding.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { AppContext } from '../context';
import { Permission } from '../types/roles';
import { ForbiddenError, UnauthenticatedError } from '../types/errors';

/**
 * Returns middleware that verifies the user's role grants `permission`.
 * Must be used AFTER authenticate middleware.
 */
export function requirePermission(ctx: AppContext, permission: Permission): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthenticatedError('Authentication required'));
      return;
    }

    if (!ctx.evaluator.allowed(req.user.roleId, permission)) {
      next(new ForbiddenError('Insufficient permissions', permission));
      return;
    }

    next();
  };
}

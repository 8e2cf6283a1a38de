// =============================================================================
// PUBLISHING DESK — Authentication Routes
//
// Registration, login, logout and the caller's profile. Login and
// register share one per-IP attempt limiter.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { AppContext } from '../context';
import { authenticate, currentUser } from '../middleware/authenticate';
import { getUser, login, logout, registerUser } from '../services/identity';
import { toUserView } from '../types/user';
import { parseInput } from '../validation';

const registerSchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().trim().email().max(100),
  password: z.string().min(6).max(128),
  full_name: z.string().trim().min(1).max(100),
  role_id: z.number().int().positive().optional(),
});

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

export function authRoutes(ctx: AppContext): Router {
  const router = Router();

  const attemptLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: ctx.config.auth.rateLimitMax,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * POST /api/auth/register
   * Public self-registration. 409 when the username or email is taken.
   */
  router.post('/register', attemptLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(registerSchema, req.body);
      const user = await registerUser(ctx, {
        username: body.username,
        email: body.email,
        password: body.password,
        fullName: body.full_name,
        roleId: body.role_id,
      });
      res.status(201).json({ data: { user_id: user.id } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/auth/login
   * Authenticate with username and password. Returns a bearer token.
   */
  router.post('/login', attemptLimiter, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(loginSchema, req.body);
      const { issued, user } = await login(ctx, body, {
        ip: req.ip ?? null,
        userAgent: req.get('user-agent') ?? null,
      });

      res.json({
        data: {
          tokens: {
            access_token: issued.token,
            token_type: 'Bearer',
            expires_in: issued.expiresIn,
          },
          user: toUserView(user),
        },
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/auth/logout
   * Terminate the current session; the token stops working immediately.
   */
  router.post('/logout', authenticate(ctx), async (req: Request, res: Response, next: NextFunction) => {
    try {
      await logout(ctx, currentUser(req));
      res.json({ data: { message: 'Logged out' } });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/auth/profile
   * The caller's account plus the permissions their role grants.
   */
  router.get('/profile', authenticate(ctx), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = currentUser(req);
      const user = await getUser(ctx, actor.id);
      res.json({
        data: {
          ...toUserView(user),
          permissions: ctx.evaluator.permissionsFor(actor.roleId),
        },
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

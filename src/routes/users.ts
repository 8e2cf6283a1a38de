// =============================================================================
// PUBLISHING DESK — User Administration Routes
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { authenticate, currentUser } from '../middleware/authenticate';
import { requirePermission } from '../middleware/permission-guard';
import {
  createUser,
  deactivateUser,
  getUser,
  listRoles,
  listUsers,
  resetPassword,
  updateUser,
} from '../services/identity';
import { toUserView } from '../types/user';
import { parseId, parseInput } from '../validation';

const listQuery = z.object({
  role_id: z.coerce.number().int().positive().optional(),
  is_active: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional(),
  search: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const createSchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().trim().email().max(100),
  password: z.string().min(6).max(128),
  full_name: z.string().trim().min(1).max(100),
  role_id: z.number().int().positive(),
});

// role_id is not accepted: roles are fixed at creation
const updateSchema = z
  .object({
    full_name: z.string().trim().min(1).max(100).optional(),
    email: z.string().trim().email().max(100).optional(),
    is_active: z.boolean().optional(),
  })
  .strict()
  .refine((body) => Object.keys(body).length > 0, 'Nothing to update');

const passwordSchema = z.object({
  password: z.string().min(6).max(128),
});

export function userRoutes(ctx: AppContext): Router {
  const router = Router();
  router.use(authenticate(ctx));

  /** GET /api/users/roles */
  router.get('/roles', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const roles = await listRoles(ctx);
      res.json({
        data: roles.map((role) => ({
          id: role.id,
          name: role.name,
          permissions: ctx.evaluator.permissionsFor(role.id),
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/users
   * Query: role_id, is_active, search (username / full name / email), limit, offset
   */
  router.get(
    '/',
    requirePermission(ctx, 'users.read'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = parseInput(listQuery, req.query);
        const users = await listUsers(ctx, {
          roleId: query.role_id,
          isActive: query.is_active,
          search: query.search,
          limit: query.limit,
          offset: query.offset,
        });
        res.json({ data: users.map(toUserView), limit: query.limit, offset: query.offset });
      } catch (err) {
        next(err);
      }
    },
  );

  /** GET /api/users/:id */
  router.get(
    '/:id',
    requirePermission(ctx, 'users.read'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const user = await getUser(ctx, parseId(req.params.id));
        res.json({ data: toUserView(user) });
      } catch (err) {
        next(err);
      }
    },
  );

  /**
   * POST /api/users
   * Administrative account creation with an explicit role.
   */
  router.post(
    '/',
    requirePermission(ctx, 'users.create'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = parseInput(createSchema, req.body);
        const user = await createUser(ctx, currentUser(req), {
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
    },
  );

  /**
   * PUT /api/users/:id
   * Full name, email and active flag. Deactivating ends the account's sessions.
   */
  router.put(
    '/:id',
    requirePermission(ctx, 'users.update'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseId(req.params.id);
        const body = parseInput(updateSchema, req.body);
        const user = await updateUser(ctx, currentUser(req), id, {
          fullName: body.full_name,
          email: body.email,
          isActive: body.is_active,
        });
        res.json({ data: toUserView(user) });
      } catch (err) {
        next(err);
      }
    },
  );

  /** DELETE /api/users/:id — deactivates; accounts are never removed */
  router.delete(
    '/:id',
    requirePermission(ctx, 'users.delete'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const user = await deactivateUser(ctx, currentUser(req), parseId(req.params.id));
        res.json({ data: toUserView(user) });
      } catch (err) {
        next(err);
      }
    },
  );

  /** POST /api/users/:id/reset-password */
  router.post(
    '/:id/reset-password',
    requirePermission(ctx, 'users.update'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseId(req.params.id);
        const { password } = parseInput(passwordSchema, req.body);
        await resetPassword(ctx, currentUser(req), id, password);
        res.json({ data: { message: 'Password reset' } });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}

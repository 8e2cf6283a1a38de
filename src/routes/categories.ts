// =============================================================================
// PUBLISHING DESK — Category Routes
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { authenticate, currentUser } from '../middleware/authenticate';
import { requirePermission } from '../middleware/permission-guard';
import {
  createCategory,
  deleteCategory,
  listCategories,
  updateCategory,
} from '../services/categories';
import { CategoryFields, toCategoryView } from '../types/category';
import { parseId, parseInput } from '../validation';

const categorySchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(1000).nullish(),
  icon: z.string().max(50).nullish(),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, 'must be a #rrggbb colour')
    .nullish(),
});

function categoryFields(body: unknown): CategoryFields {
  const parsed = parseInput(categorySchema, body);
  return {
    name: parsed.name,
    description: parsed.description ?? null,
    icon: parsed.icon ?? null,
    color: parsed.color ?? null,
  };
}

export function categoryRoutes(ctx: AppContext): Router {
  const router = Router();
  router.use(authenticate(ctx));

  /** GET /api/categories */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const categories = await listCategories(ctx);
      res.json({ data: categories.map(toCategoryView) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/categories */
  router.post(
    '/',
    requirePermission(ctx, 'category.create'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const category = await createCategory(ctx, currentUser(req), categoryFields(req.body));
        res.status(201).json({ data: { category_id: category.id } });
      } catch (err) {
        next(err);
      }
    },
  );

  /** PUT /api/categories/:id */
  router.put(
    '/:id',
    requirePermission(ctx, 'category.update'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseId(req.params.id);
        const category = await updateCategory(ctx, currentUser(req), id, categoryFields(req.body));
        res.json({ data: toCategoryView(category) });
      } catch (err) {
        next(err);
      }
    },
  );

  /** DELETE /api/categories/:id — refused while content is filed under it */
  router.delete(
    '/:id',
    requirePermission(ctx, 'category.delete'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        await deleteCategory(ctx, currentUser(req), parseId(req.params.id));
        res.json({ data: { message: 'Category deleted' } });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}

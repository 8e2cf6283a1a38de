// =============================================================================
// PUBLISHING DESK — Content Routes
//
// CRUD on drafts plus the workflow actions:
//   POST /:id/submit   author only
//   POST /:id/approve  content.approve  (stage 1, then stage 2)
//   POST /:id/reject   content.approve
//   POST /:id/publish  content.publish  (after two stages)
// =============================================================================

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { authenticate, currentUser } from '../middleware/authenticate';
import { requirePermission } from '../middleware/permission-guard';
import {
  createContent,
  deleteContent,
  getContent,
  getContentHistory,
  listContents,
  transitionContent,
  updateContent,
} from '../services/content';
import {
  CONTENT_STATUSES,
  ContentAction,
  ContentFields,
  toApprovalView,
  toContentView,
} from '../types/content';
import { parseId, parseInput } from '../validation';

const contentSchema = z.object({
  category_id: z.number().int().positive(),
  title: z.string().trim().min(1).max(200),
  body: z.string().min(1),
  excerpt: z.string().max(500).nullish(),
});

const listQuery = z.object({
  status: z.enum(CONTENT_STATUSES).optional(),
});

const decisionSchema = z.object({
  notes: z.string().max(2000).nullish(),
});

function contentFields(body: unknown): ContentFields {
  const parsed = parseInput(contentSchema, body);
  return {
    categoryId: parsed.category_id,
    title: parsed.title,
    body: parsed.body,
    excerpt: parsed.excerpt ?? null,
  };
}

export function contentRoutes(ctx: AppContext): Router {
  const router = Router();
  router.use(authenticate(ctx));

  /** POST /api/contents — new draft */
  router.post(
    '/',
    requirePermission(ctx, 'content.create'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const content = await createContent(ctx, currentUser(req), contentFields(req.body));
        res.status(201).json({ data: { content_id: content.id } });
      } catch (err) {
        next(err);
      }
    },
  );

  /**
   * GET /api/contents
   * Own items, or every item for content.read_all. Query: status
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(listQuery, req.query);
      const contents = await listContents(ctx, currentUser(req), query);
      res.json({ data: contents.map(toContentView) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/contents/:id */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const content = await getContent(ctx, currentUser(req), parseId(req.params.id));
      res.json({ data: toContentView(content) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/contents/:id/history — approval records, oldest first */
  router.get('/:id/history', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const history = await getContentHistory(ctx, currentUser(req), parseId(req.params.id));
      res.json({ data: history.map(toApprovalView) });
    } catch (err) {
      next(err);
    }
  });

  /** PUT /api/contents/:id — author, draft only */
  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id);
      const content = await updateContent(ctx, currentUser(req), id, contentFields(req.body));
      res.json({ data: toContentView(content) });
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/contents/:id — author, draft only */
  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await deleteContent(ctx, currentUser(req), parseId(req.params.id));
      res.json({ data: { message: 'Content deleted' } });
    } catch (err) {
      next(err);
    }
  });

  // ── Workflow ─────────────────────────────────────────────────────────

  const transition =
    (action: ContentAction): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseId(req.params.id);
        const { notes } = parseInput(decisionSchema, req.body ?? {});
        const outcome = await transitionContent(ctx, currentUser(req), id, action, notes ?? null);
        res.json({
          data: {
            content: toContentView(outcome.content),
            approval: outcome.approval ? toApprovalView(outcome.approval) : null,
          },
        });
      } catch (err) {
        next(err);
      }
    };

  router.post('/:id/submit', transition('submit'));
  router.post('/:id/approve', requirePermission(ctx, 'content.approve'), transition('approve'));
  router.post('/:id/reject', requirePermission(ctx, 'content.approve'), transition('reject'));
  router.post('/:id/publish', requirePermission(ctx, 'content.publish'), transition('publish'));

  return router;
}

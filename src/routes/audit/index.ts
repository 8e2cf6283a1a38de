// =============================================================================
// PUBLISHING DESK — Audit Routes
//
// Read-only access to the audit trail for holders of audit.read.
// Consumers page with a watermark: pass the highest id already seen as
// `after` and receive the entries appended since, in ascending id order.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppContext } from '../../context';
import { authenticate } from '../../middleware/authenticate';
import { requirePermission } from '../../middleware/permission-guard';
import { listAuditLogAfter } from '../../services/audit';
import { toAuditView } from '../../types/audit';
import { parseInput } from '../../validation';

const watermarkQuery = z.object({
  after: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export function auditRoutes(ctx: AppContext): Router {
  const router = Router();

  router.use(authenticate(ctx));

  /**
   * GET /api/audit-logs
   *
   * Query params:
   *   after  — return entries with id > after (default 0)
   *   limit  — max results (default 100, max 500)
   */
  router.get(
    '/',
    requirePermission(ctx, 'audit.read'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { after, limit } = parseInput(watermarkQuery, req.query);
        const entries = await listAuditLogAfter(ctx.store.audit, after, limit);
        const last = entries.length > 0 ? entries[entries.length - 1].id : after;

        res.json({ data: entries.map(toAuditView), watermark: last, limit });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}

// =============================================================================
// PUBLISHING DESK — Cooperation Request Routes
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppContext } from '../context';
import { authenticate, currentUser } from '../middleware/authenticate';
import { requirePermission } from '../middleware/permission-guard';
import {
  getCooperation,
  listCooperations,
  submitCooperation,
  transitionCooperation,
} from '../services/cooperation';
import { CooperationAction, toCooperationView } from '../types/cooperation';
import { COOPERATION_ACTIONS } from '../workflow/cooperation-machine';
import { parseId, parseInput } from '../validation';

const submissionSchema = z.object({
  institution_name: z.string().trim().min(1).max(200),
  contact_name: z.string().trim().min(1).max(100),
  email: z.string().trim().email(),
  phone: z.string().trim().max(30).nullish(),
  purpose: z.string().trim().min(1),
  event_date: z.string().date('must be a calendar date (YYYY-MM-DD)').nullish(),
  document_name: z.string().trim().min(1).max(255),
  document_mime: z.string().trim().min(1).max(100),
  document_base64: z.string().min(1),
});

export function cooperationRoutes(ctx: AppContext): Router {
  const router = Router();
  router.use(authenticate(ctx));

  /**
   * POST /api/cooperations
   * The attachment arrives as base64; only its reference is stored.
   */
  router.post(
    '/',
    requirePermission(ctx, 'submit_coop'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = parseInput(submissionSchema, req.body);
        const coop = await submitCooperation(ctx, currentUser(req), {
          institutionName: body.institution_name,
          contactName: body.contact_name,
          email: body.email,
          phone: body.phone ?? null,
          purpose: body.purpose,
          eventDate: body.event_date ?? null,
          document: {
            name: body.document_name,
            mime: body.document_mime,
            base64: body.document_base64,
          },
        });
        res.status(201).json({ data: { cooperation_id: coop.id } });
      } catch (err) {
        next(err);
      }
    },
  );

  /** GET /api/cooperations */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const requests = await listCooperations(ctx, currentUser(req));
      res.json({ data: requests.map(toCooperationView) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/cooperations/:id */
  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const coop = await getCooperation(ctx, currentUser(req), parseId(req.params.id));
      res.json({ data: toCooperationView(coop) });
    } catch (err) {
      next(err);
    }
  });

  // POST /:id/verify and POST /:id/approve
  const actions: CooperationAction[] = ['verify', 'approve'];
  for (const action of actions) {
    router.post(
      `/:id/${action}`,
      requirePermission(ctx, COOPERATION_ACTIONS[action].permission),
      async (req: Request, res: Response, next: NextFunction) => {
        try {
          const coop = await transitionCooperation(ctx, currentUser(req), parseId(req.params.id), action);
          res.json({ data: toCooperationView(coop) });
        } catch (err) {
          next(err);
        }
      },
    );
  }

  return router;
}

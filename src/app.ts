// =============================================================================
// PUBLISHING DESK — HTTP Application
//
//   /api/auth/*          — register, login (rate-limited), logout, profile
//   /api/users/*         — user administration
//   /api/categories/*    — content categories
//   /api/contents/*      — content drafts and the approval workflow
//   /api/cooperations/*  — cooperation requests
//   /api/audit-logs      — audit trail (audit.read)
//   /api/health          — health check (unauthenticated)
//
// Every protected route authenticates first, then evaluates the route's
// permission. Denials reach the error handler, which records them.
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { AppContext } from './context';
import { errorHandler, requestId, requestSanitization } from './middleware/security';
import { authRoutes } from './routes/auth';
import { userRoutes } from './routes/users';
import { categoryRoutes } from './routes/categories';
import { contentRoutes } from './routes/contents';
import { cooperationRoutes } from './routes/cooperations';
import { auditRoutes } from './routes/audit/index';
import { healthRoutes } from './routes/health';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(
    cors({
      origin: ctx.config.nodeEnv === 'development' ? '*' : undefined,
      credentials: true,
    }),
  );
  // Attachments travel base64-encoded inside the JSON body
  app.use(express.json({ limit: '10mb' }));

  app.use(requestId());
  app.use(
    pinoHttp({
      logger: ctx.logger,
      genReqId: (_req, res) => {
        const id = res.getHeader('X-Request-ID');
        return typeof id === 'string' ? id : uuidv4();
      },
    }),
  );
  app.use(requestSanitization());

  // ── Routes ───────────────────────────────────────────────────────────

  app.use('/api/health', healthRoutes(ctx));
  app.use('/api/auth', authRoutes(ctx));
  app.use('/api/users', userRoutes(ctx));
  app.use('/api/categories', categoryRoutes(ctx));
  app.use('/api/contents', contentRoutes(ctx));
  app.use('/api/cooperations', cooperationRoutes(ctx));
  app.use('/api/audit-logs', auditRoutes(ctx));

  // ── 404 Handler ──────────────────────────────────────────────────────

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use(errorHandler(ctx));

  return app;
}

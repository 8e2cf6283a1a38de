// =============================================================================
// PUBLISHING DESK — Request Hygiene & Error Handling
//
// Covers:
//   - Request IDs for tracing
//   - Null-byte stripping of JSON bodies
//   - Central error handler: maps the error taxonomy to HTTP, records
//     ACCESS_DENIED for every 403, never leaks stack traces in production
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../types/express';
import { AppContext } from '../context';
import { AppError, ForbiddenError } from '../types/errors';
import { recordAuditEvent } from '../services/audit';

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || `desk-${uuidv4()}`;
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Input Sanitization ─────────────────────────────────────────────────

/**
 * Strip null bytes from string values in JSON bodies.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (req.body && typeof req.body === 'object') {
      req.body = sanitizeValue(req.body);
    }
    next();
  };
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') return value.replace(/\0/g, '');
  if (Array.isArray(value)) return value.map(sanitizeValue);
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = sanitizeValue(inner);
    }
    return out;
  }
  return value;
}

// ── Access Denied Trail ────────────────────────────────────────────────

/** Path the caller attempted, without the query string */
function endpointOf(req: Request): string {
  return req.originalUrl.split('?')[0];
}

async function recordAccessDenied(ctx: AppContext, req: Request, err: ForbiddenError): Promise<void> {
  await ctx.store.transaction((tx) =>
    recordAuditEvent(tx, {
      action: 'ACCESS_DENIED',
      userId: req.user?.id ?? null,
      details: {
        endpoint: endpointOf(req),
        method: req.method,
        role: req.user?.roleName ?? null,
        role_id: req.user?.roleId ?? null,
        permission: err.permission ?? null,
        reason: err.reason,
        request_id: req.requestId ?? null,
      },
    }),
  );
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * JSON body parser failures carry an HTTP status of their own.
 */
function clientStatusOf(err: unknown): number | null {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

/**
 * Global error handler. Every ForbiddenError produces exactly one
 * ACCESS_DENIED entry before the 403 goes out.
 */
export function errorHandler(ctx: AppContext): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    void handle(ctx, err, req, res);
  };
}

async function handle(ctx: AppContext, err: unknown, req: Request, res: Response): Promise<void> {
  const log = ctx.logger.child({ component: 'http', requestId: req.requestId });

  try {
    if (err instanceof ForbiddenError) {
      await recordAccessDenied(ctx, req, err);
      log.warn(
        { userId: req.user?.id, endpoint: endpointOf(req), permission: err.permission },
        'Access denied',
      );
    }

    if (err instanceof AppError) {
      res.status(err.status).json({ error: err.message, code: err.code });
      return;
    }

    const clientStatus = clientStatusOf(err);
    if (clientStatus !== null) {
      res.status(clientStatus).json({ error: 'Malformed request', code: 'VALIDATION_ERROR' });
      return;
    }

    log.error({ err }, 'Unhandled error');
    const isProd = ctx.config.nodeEnv === 'production';
    res.status(500).json({
      error: isProd || !(err instanceof Error) ? 'Internal server error' : err.message,
    });
  } catch (handlerErr) {
    log.error({ err: handlerErr }, 'Error handler failed');
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error' });
    }
  }
}

// =============================================================================
// PUBLISHING DESK — Structured Logger
// =============================================================================

import pino, { Logger } from 'pino';

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    level,
    redact: ['password', 'password_hash', 'token', 'access_token', 'req.headers.authorization'],
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

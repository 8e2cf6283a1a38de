// =============================================================================
// PUBLISHING DESK — Main Server
//
// Wires configuration, logging, the PostgreSQL store and the permission
// evaluator into the HTTP application, then listens. The capability map
// is loaded before the first request is accepted and reloaded on a timer.
// =============================================================================

import { loadConfig } from './config';
import { createLogger } from './observability/logger';
import { createPool } from './db/pool';
import { PgStore } from './db/pg-store';
import { PermissionEvaluator } from './authorization/evaluator';
import { createApp } from './app';
import { AppContext } from './context';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logging.level);

  const store = new PgStore(createPool(config, logger), logger);
  const evaluator = new PermissionEvaluator();
  await evaluator.refresh(store.roles);
  const stopPermissionRefresh = evaluator.startAutoRefresh(
    store.roles,
    config.rbac.refreshIntervalMs,
    logger,
  );

  const ctx: AppContext = { config, store, evaluator, logger };
  const app = createApp(ctx);

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, 'Publishing desk listening');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    stopPermissionRefresh();
    server.close(() => {
      store
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  createLogger('error').fatal({ err }, 'Startup failed');
  process.exit(1);
});

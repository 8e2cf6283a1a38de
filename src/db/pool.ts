// =============================================================================
// PUBLISHING DESK — Database Connection Pool
// =============================================================================

import { Pool, QueryResult } from 'pg';
import { AppConfig } from '../config';
import { Logger } from '../observability/logger';

export interface PgClient {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  release(): void;
}

/** The part of a pg Pool the store relies on */
export interface PgPool {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

export function createPool(config: AppConfig, logger: Logger): PgPool {
  const pool = new Pool({
    connectionString: config.db.connectionString,
    max: config.db.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error({ err, component: 'db' }, 'Unexpected pool error');
  });

  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

import type { ExecutionConfig } from './config.js';
import { MemoryExecutionStore } from './db/memoryStore.js';
import { PgExecutionStore } from './db/pgStore.js';
import type { ExecutionStore } from './db/store.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('db');

/**
 * Postgres when DATABASE_URL is set, otherwise the in-memory store. The
 * Postgres schema is applied before the store is handed out.
 */
export async function createStore(config: Pick<ExecutionConfig, 'databaseUrl'>): Promise<ExecutionStore> {
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set, using in-memory store; state is lost on restart');
    return new MemoryExecutionStore();
  }
  const store = new PgExecutionStore({ connectionString: config.databaseUrl });
  await store.migrate();
  return store;
}

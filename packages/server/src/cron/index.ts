import cron from 'node-cron';
import type { ExecutionConfig } from '../config.js';
import type { OrderManager } from '../execution/orderManager.js';
import type { TradeLedger } from '../execution/tradeLedger.js';
import { describeError } from '../execution/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('cron');

export interface ScheduledJobs {
  stop(): void;
}

function guarded(name: string, job: () => Promise<unknown>): () => void {
  return () => {
    job().catch((err: unknown) => logger.error(`Job ${name} failed`, { error: describeError(err) }));
  };
}

/** Periodic trade-ledger reconciliation and stale-order sweep. */
export function scheduleJobs(
  schedules: ExecutionConfig['schedules'],
  manager: OrderManager,
  tradeLedger: TradeLedger
): ScheduledJobs {
  for (const expr of [schedules.reconcile, schedules.staleOrders]) {
    if (!cron.validate(expr)) throw new Error(`invalid cron expression "${expr}"`);
  }

  const tasks = [
    cron.schedule(schedules.reconcile, guarded('reconcile', () => manager.reconcile(tradeLedger))),
    cron.schedule(schedules.staleOrders, guarded('staleOrders', () => manager.cleanupStaleOrders())),
  ];
  logger.info('Jobs scheduled', { reconcile: schedules.reconcile, staleOrders: schedules.staleOrders });

  return {
    stop: () => {
      for (const task of tasks) task.stop();
    },
  };
}

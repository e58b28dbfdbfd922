import 'dotenv/config';
import { loadConfig } from './config.js';
import { scheduleJobs } from './cron/index.js';
import { createStore } from './db.js';
import { describeError } from './execution/errors.js';
import { createExecutionCore } from './execution/index.js';
import { buildServer } from './server.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('main');

async function main() {
  const config = loadConfig();
  const store = await createStore(config);
  const core = createExecutionCore(config, { store });
  await core.manager.restore();

  const app = await buildServer({
    manager: core.manager,
    tradeLedger: core.tradeLedger,
    store,
    webhookSecret: config.webhookSecret,
    requestLogging: config.env !== 'test',
  });
  const jobs = scheduleJobs(config.schedules, core.manager, core.tradeLedger);

  const startup = await core.manager.reconcile(core.tradeLedger);
  if (!startup.match) {
    logger.warn('Starting with a realized pnl discrepancy', { discrepancy: startup.discrepancy });
  }

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(`Server started on port ${config.port}`, {
    accountId: config.accountId,
    broker: core.broker.name,
    store: store.kind,
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    jobs.stop();
    app
      .close()
      .then(() => core.manager.idle())
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error('Shutdown failed', { error: describeError(err) });
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.logFatal('Startup failed', { error: describeError(err) });
  process.exit(1);
});

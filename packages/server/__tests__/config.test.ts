import { describe, it, expect } from '@jest/globals';
import { ZodError } from 'zod';
import { loadConfig } from '../src/config.js';
import { scheduleJobs } from '../src/cron/index.js';
import { TradeLedger } from '../src/execution/tradeLedger.js';
import { setupManager } from './helpers.js';

describe('loadConfig', () => {
  it('fills every setting with its default', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      env: 'development',
      port: 3334,
      logLevel: 'debug',
      accountId: 'default',
      initialCapital: 1_000_000,
      maxSubmitAttempts: 3,
      orderTimeoutSec: 60,
      schedules: { reconcile: '*/5 * * * *', staleOrders: '*/30 * * * * *' },
    });
    expect(config.risk).toMatchObject({ riskPerTradePct: 1, defaultStopLossPct: 2, maxOpenPositions: 10, dailyLossLimit: 50_000 });
    expect(config.validator).toEqual({ cooldownTicks: 5, cooldownSeconds: 30, idempotencyWindowMs: 60_000 });
    expect(config.broker).toEqual({
      minLatencyMs: 200,
      maxLatencyMs: 800,
      slippagePct: 0.05,
      partialFillProbability: 0.3,
      rejectProbability: 0.05,
    });
    expect(config.databaseUrl).toBeUndefined();
  });

  it('coerces values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      INITIAL_CAPITAL: '250000',
      COOLDOWN_TICKS: '2',
      IDEMPOTENCY_WINDOW_SEC: '5',
      WEBHOOK_SECRET: 'test-secret',
    });
    expect(config.logLevel).toBe('info');
    expect(config.initialCapital).toBe(250_000);
    expect(config.validator).toMatchObject({ cooldownTicks: 2, idempotencyWindowMs: 5_000 });
    expect(config.webhookSecret).toBe('test-secret');
  });

  it('rejects out-of-range values', () => {
    expect(() => loadConfig({ MAX_SUBMIT_ATTEMPTS: '4' })).toThrow(ZodError);
    expect(() => loadConfig({ INITIAL_CAPITAL: '-5' })).toThrow(ZodError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ZodError);
    expect(() => loadConfig({ BROKER_MIN_LATENCY_MS: '900' })).toThrow(
      'BROKER_MIN_LATENCY_MS (900) exceeds BROKER_MAX_LATENCY_MS (800)'
    );
  });
});

describe('scheduleJobs', () => {
  it('refuses an invalid cron expression', () => {
    const h = setupManager();
    const tradeLedger = new TradeLedger(h.store, h.config.accountId, h.clock);
    expect(() => scheduleJobs({ reconcile: 'every minute', staleOrders: '* * * * *' }, h.manager, tradeLedger)).toThrow(
      'invalid cron expression "every minute"'
    );
  });

  it('schedules both jobs and stops them', () => {
    const h = setupManager();
    const tradeLedger = new TradeLedger(h.store, h.config.accountId, h.clock);
    const jobs = scheduleJobs(h.config.schedules, h.manager, tradeLedger);
    expect(() => jobs.stop()).not.toThrow();
  });
});

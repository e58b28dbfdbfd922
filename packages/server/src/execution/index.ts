import type { ExecutionConfig } from '../config.js';
import type { ExecutionStore } from '../db/store.js';
import { CapitalLedger } from './capitalLedger.js';
import type { BrokerAdapter } from './interface.js';
import { OrderManager } from './orderManager.js';
import { SimulatedBroker } from './sim.js';
import { TradeLedger } from './tradeLedger.js';
import { systemClock, type Clock } from './types.js';

export type { BrokerAdapter, BrokerEvent, BrokerEventHandler } from './interface.js';
export { CapitalLedger } from './capitalLedger.js';
export { OrderManager } from './orderManager.js';
export { SimulatedBroker } from './sim.js';
export { TradeLedger } from './tradeLedger.js';

export interface ExecutionCore {
  ledger: CapitalLedger;
  broker: BrokerAdapter;
  store: ExecutionStore;
  manager: OrderManager;
  tradeLedger: TradeLedger;
}

export interface ExecutionCoreOptions {
  store: ExecutionStore;
  /** Venue adapter; the simulated broker is built from config when omitted. */
  broker?: BrokerAdapter;
  clock?: Clock;
}

/** Wire one account's ledger, broker and order manager from configuration. */
export function createExecutionCore(config: ExecutionConfig, opts: ExecutionCoreOptions): ExecutionCore {
  const clock = opts.clock ?? systemClock;
  const ledger = new CapitalLedger({
    accountId: config.accountId,
    initialCapital: config.initialCapital,
    dailyLossLimit: config.risk.dailyLossLimit,
  });
  const broker = opts.broker ?? new SimulatedBroker({ ...config.broker, clock });
  const manager = new OrderManager({ settings: config, ledger, broker, store: opts.store, clock });
  const tradeLedger = new TradeLedger(opts.store, config.accountId, clock);
  return { ledger, broker, store: opts.store, manager, tradeLedger };
}

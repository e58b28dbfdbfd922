import type { AccountState, Incident, Order, Position, Trade } from '../execution/types.js';
import type { ExecutionStore, OrderQuery } from './store.js';

/** Process-local store used when no DATABASE_URL is configured and in tests. */
export class MemoryExecutionStore implements ExecutionStore {
  readonly kind = 'memory';
  private readonly accounts = new Map<string, AccountState>();
  private readonly orders = new Map<string, { order: Order; insertedAt: number }>();
  private readonly trades: Trade[] = [];
  private readonly positions = new Map<string, Position>();
  private readonly incidents: Incident[] = [];
  private insertions = 0;

  async upsertAccount(account: AccountState): Promise<void> {
    this.accounts.set(account.accountId, { ...account });
  }

  async getAccount(accountId: string): Promise<AccountState | undefined> {
    const account = this.accounts.get(accountId);
    return account ? { ...account } : undefined;
  }

  async upsertOrder(order: Order): Promise<void> {
    const existing = this.orders.get(order.orderId);
    this.orders.set(order.orderId, { order: { ...order }, insertedAt: existing?.insertedAt ?? this.insertions++ });
  }

  async getOrder(orderId: string): Promise<Order | undefined> {
    const row = this.orders.get(orderId);
    return row ? { ...row.order } : undefined;
  }

  async listOrders(accountId: string, query: OrderQuery = {}): Promise<Order[]> {
    const rows = [...this.orders.values()]
      .filter(({ order }) => order.accountId === accountId)
      .filter(({ order }) => query.symbol === undefined || order.symbol === query.symbol)
      .filter(({ order }) => query.statuses === undefined || query.statuses.includes(order.status))
      .sort((a, b) => b.order.createdAt.localeCompare(a.order.createdAt) || b.insertedAt - a.insertedAt);
    const limited = query.limit === undefined ? rows : rows.slice(0, query.limit);
    return limited.map(({ order }) => ({ ...order }));
  }

  async insertTrade(trade: Trade): Promise<void> {
    this.trades.push({ ...trade });
  }

  async listTrades(accountId: string): Promise<Trade[]> {
    return this.trades.filter((t) => t.accountId === accountId).map((t) => ({ ...t }));
  }

  async upsertPosition(accountId: string, position: Position): Promise<void> {
    this.positions.set(`${accountId}|${position.symbol}`, { ...position });
  }

  async listPositions(accountId: string): Promise<Position[]> {
    const prefix = `${accountId}|`;
    return [...this.positions.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([, position]) => ({ ...position }));
  }

  async insertIncident(incident: Incident): Promise<void> {
    this.incidents.push({ ...incident });
  }

  async listIncidents(accountId: string): Promise<Incident[]> {
    return this.incidents.filter((i) => i.accountId === accountId).map((i) => ({ ...i }));
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

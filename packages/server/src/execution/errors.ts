import type { OrderStatus } from './types.js';

export type ExecutionErrorCode =
  | 'BROKER_REJECTED'
  | 'SUBMISSION_FAILURE'
  | 'ILLEGAL_TRANSITION'
  | 'CONSISTENCY'
  | 'CAPITAL_INVARIANT'
  | 'INSUFFICIENT_CAPITAL'
  | 'PERSISTENCE';

export class ExecutionError extends Error {
  readonly code: ExecutionErrorCode;

  constructor(code: ExecutionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The venue refused a submission outright. Not retried. */
export class BrokerRejectedError extends ExecutionError {
  constructor(readonly orderId: string, detail: string) {
    super('BROKER_REJECTED', detail);
  }
}

/** Transport or timeout failure talking to the broker. The only retryable error. */
export class BrokerTransportError extends ExecutionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SUBMISSION_FAILURE', message, options);
  }
}

export class IllegalTransitionError extends ExecutionError {
  constructor(readonly orderId: string, readonly from: OrderStatus, readonly to: OrderStatus) {
    super('ILLEGAL_TRANSITION', `illegal transition ${from} -> ${to} for order ${orderId}`);
  }
}

export class ConsistencyError extends ExecutionError {
  constructor(readonly discrepancy: number, message: string) {
    super('CONSISTENCY', message);
  }
}

export class CapitalInvariantViolation extends ExecutionError {
  constructor(message: string) {
    super('CAPITAL_INVARIANT', message);
  }
}

export class InsufficientCapitalError extends ExecutionError {
  constructor(readonly required: number, readonly available: number) {
    super('INSUFFICIENT_CAPITAL', `required ${required.toFixed(2)} exceeds available ${available.toFixed(2)}`);
  }
}

export class PersistenceError extends ExecutionError {
  constructor(operation: string, cause: unknown) {
    super('PERSISTENCE', `store operation ${operation} failed: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// src/services/operation.ts
// What: Lifecycle tracker for one mutating operation (ingest, remove, clear, replace, restore).
// How: A fixed transition table; moving along an edge it does not list throws, which turns
//      out-of-order orchestration into a loud bug instead of a silent inconsistency.

import baseLogger, { type Logger } from '../logging.js';

export type OperationState =
  | 'Idle'
  | 'Validating'
  | 'Embedding'
  | 'Indexing'
  | 'Committed'
  | 'Rejected'
  | 'Failed'
  | 'RolledBack';

const TRANSITIONS: Record<OperationState, readonly OperationState[]> = {
  Idle: ['Validating', 'Failed'],
  Validating: ['Embedding', 'Indexing', 'Rejected', 'Failed'],
  Embedding: ['Indexing', 'Rejected', 'Failed'],
  Indexing: ['Committed', 'Rejected', 'Failed'],
  Committed: [],
  Rejected: [],
  Failed: ['RolledBack'],
  RolledBack: [],
};

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: OperationState,
    readonly to: OperationState,
  ) {
    super(`Invalid operation transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class OperationTracker {
  private current: OperationState = 'Idle';
  private readonly history: OperationState[] = ['Idle'];
  private readonly log: Logger;

  constructor(
    readonly kind: string,
    context: Record<string, unknown> = {},
    logger: Logger = baseLogger,
  ) {
    this.log = logger.child({ op: kind, ...context });
  }

  get state(): OperationState {
    return this.current;
  }

  /** Every state visited, in order, starting with Idle. */
  trail(): readonly OperationState[] {
    return this.history;
  }

  to(next: OperationState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.log.debug({ from: this.current, to: next }, 'Operation transition');
    this.current = next;
    this.history.push(next);
  }

  /** Moves to Failed unless the operation already finished or failed. */
  fail(): void {
    if (this.current === 'Failed' || TRANSITIONS[this.current].length === 0) return;
    this.to('Failed');
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }
}

/**
 * Global budget ledger.
 * Holds the spend ceiling and the running total for the lifetime of the
 * process. Every read-then-act sequence goes through withLock so checks and
 * commits never interleave; callers must not await I/O inside the lock.
 */

import { LedgerError } from '../errors.js';
import { isExhausted, remainingBudget, wouldExceed } from '../cost/budget.js';
import { roundUsd } from '../cost/calculator.js';
import { ledgerLogger } from '../utils/logger.js';
import { createAsyncMutex, type AsyncMutex } from './mutex.js';

/** Point-in-time copy of the ledger */
export interface LedgerSnapshot {
  ceiling: number;
  totalSpent: number;
  /** Negative after an overshoot */
  remaining: number;
}

/** Access handed to code running under the ledger lock */
export interface LedgerView {
  readonly ceiling: number;
  readonly totalSpent: number;
  remaining(): number;
  isExhausted(): boolean;
  wouldExceed(cost: number): boolean;
  /** Add to the total; returns the new total */
  commit(delta: number): number;
}

function assertValidAmount(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new LedgerError(`${label} must be a finite non-negative number, got ${value}`);
  }
}

export class BudgetLedger {
  private spent = 0;
  private readonly mutex: AsyncMutex = createAsyncMutex();
  private readonly view: LedgerView;

  constructor(public readonly ceiling: number) {
    if (!Number.isFinite(ceiling)) {
      throw new LedgerError(`Ceiling must be a finite number, got ${ceiling}`);
    }

    this.view = this.createView();
  }

  /**
   * Run fn with exclusive access to the ledger.
   * The view is only valid while fn runs.
   */
  withLock<T>(fn: (view: LedgerView) => T | Promise<T>): Promise<T> {
    return this.mutex.withLock(() => fn(this.view));
  }

  /** Consistent copy of ceiling, total and remaining */
  snapshot(): Promise<LedgerSnapshot> {
    return this.withLock((view) => ({
      ceiling: view.ceiling,
      totalSpent: view.totalSpent,
      remaining: view.remaining(),
    }));
  }

  /**
   * Add a final cost to the running total.
   * Always succeeds for a valid amount, even when the total passes the ceiling.
   * @returns The new total
   * @throws LedgerError for a negative or non-finite amount
   */
  commit(delta: number): Promise<number> {
    assertValidAmount(delta, 'Cost');
    return this.withLock((view) => view.commit(delta));
  }

  /** Restore a known total */
  reset(totalSpent = 0): Promise<void> {
    assertValidAmount(totalSpent, 'Total');
    return this.withLock(() => {
      this.spent = totalSpent;
      ledgerLogger.info({ totalSpent }, 'Ledger reset');
    });
  }

  private createView(): LedgerView {
    const ledger = this;
    return {
      ceiling: ledger.ceiling,
      get totalSpent(): number {
        return ledger.spent;
      },
      remaining: () => remainingBudget(ledger.spent, ledger.ceiling),
      isExhausted: () => isExhausted(ledger.spent, ledger.ceiling),
      wouldExceed: (cost: number) => wouldExceed(ledger.spent, ledger.ceiling, cost),
      commit: (delta: number) => ledger.apply(delta),
    };
  }

  private apply(delta: number): number {
    assertValidAmount(delta, 'Cost');
    this.spent += delta;

    ledgerLogger.debug(
      { delta: roundUsd(delta), totalSpent: roundUsd(this.spent), ceiling: this.ceiling },
      'Spend committed',
    );
    if (isExhausted(this.spent, this.ceiling)) {
      ledgerLogger.warn({ totalSpent: roundUsd(this.spent), ceiling: this.ceiling }, 'Spend ceiling reached');
    }
    return this.spent;
  }
}

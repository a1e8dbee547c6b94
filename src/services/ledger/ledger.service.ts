/**
 * Ledger Service
 *
 * Owns the two shared counters (balance and bank) and the guarded
 * check-then-update protocol around them. Every operation runs inside one
 * mutex-held critical section:
 * - debit: balance -= amount when balance >= amount
 * - transfer: balance -= amount and bank += amount as one unit
 * - snapshot: read both counters
 *
 * Callers never see the raw counters, only results produced under the lock.
 */

import { Mutex } from '../../utils/mutex';
import { ApiError } from '../../middlewares/errorHandler';
import {
  createServiceLogger,
  getCorrelationId,
  ledgerOperationsTotal,
  ledgerBalance,
  ledgerBank,
} from '../../observability';

const logger = createServiceLogger('ledger');

export type LedgerOperation = 'debit' | 'transfer';

export interface LedgerSnapshot {
  readonly balance: number;
  readonly bank: number;
}

export type LedgerResult =
  | ({ ok: true } & LedgerSnapshot)
  | ({ ok: false; reason: 'INSUFFICIENT_FUNDS' } & LedgerSnapshot);

export interface LedgerOptions {
  initialBalance?: number;
  initialBank?: number;
}

const assertCounter = (name: string, value: number): void => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative safe integer, got ${value}`);
  }
};

export class Ledger {
  private balance: number;
  private bank: number;
  private readonly mutex = new Mutex();

  constructor(options: LedgerOptions = {}) {
    const { initialBalance = 0, initialBank = 0 } = options;
    assertCounter('initialBalance', initialBalance);
    assertCounter('initialBank', initialBank);
    // Transfers conserve balance + bank, so the sum bounds both counters
    assertCounter('initialBalance + initialBank', initialBalance + initialBank);

    this.balance = initialBalance;
    this.bank = initialBank;
    this.publishGauges();
  }

  /**
   * Debit the balance when it covers the amount
   */
  debit(amount: number): Promise<LedgerResult> {
    return this.guarded('debit', amount, () => {
      this.balance -= amount;
    });
  }

  /**
   * Move the amount from balance to bank when the balance covers it
   */
  transfer(amount: number): Promise<LedgerResult> {
    return this.guarded('transfer', amount, () => {
      this.balance -= amount;
      this.bank += amount;
    });
  }

  /**
   * Consistent read of both counters
   */
  snapshot(): Promise<LedgerSnapshot> {
    return this.mutex.runExclusive(() => this.current());
  }

  private guarded(
    operation: LedgerOperation,
    amount: number,
    apply: () => void
  ): Promise<LedgerResult> {
    // Negative amounts would credit the balance; handlers reject them first
    if (!Number.isSafeInteger(amount) || amount < 0) {
      return Promise.reject(ApiError.invalidAmount(`${operation} amount must be a non-negative integer`));
    }

    return this.mutex.runExclusive((): LedgerResult => {
      const correlationId = getCorrelationId();

      if (this.balance < amount) {
        ledgerOperationsTotal.inc({ operation, outcome: 'insufficient_funds' });
        logger.info(
          { correlationId, operation, amount, balance: this.balance },
          'Insufficient funds'
        );
        return { ok: false, reason: 'INSUFFICIENT_FUNDS', ...this.current() };
      }

      apply();

      ledgerOperationsTotal.inc({ operation, outcome: 'success' });
      this.publishGauges();
      logger.info(
        { correlationId, operation, amount, balance: this.balance, bank: this.bank },
        'Ledger updated'
      );

      return { ok: true, ...this.current() };
    });
  }

  private current(): LedgerSnapshot {
    return { balance: this.balance, bank: this.bank };
  }

  private publishGauges(): void {
    ledgerBalance.set(this.balance);
    ledgerBank.set(this.bank);
  }
}

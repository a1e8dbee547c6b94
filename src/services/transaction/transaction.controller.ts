import { Request, Response } from 'express';
import { validationResult } from 'express-validator';

import { Ledger, LedgerOperation, LedgerSnapshot } from '../ledger';
import { createServiceLogger, getCorrelationId } from '../../observability';

import { amountValidation } from './transaction.validation';

const logger = createServiceLogger('transaction');

/**
 * Fixed response bodies. Every outcome is sent with status 200; callers tell
 * them apart by text.
 */
export const TransactionMessage = {
  INVALID_AMOUNT: 'invalid amount',
  LOW_BALANCE: 'low balance',
  LOW_BALANCE_FOR_TRANSFER: 'low balance for bank transfer',
} as const;

export const formatBalances = ({ balance, bank }: LedgerSnapshot): string =>
  `current balance: ${balance}, current bank: ${bank}`;

export class TransactionController {
  constructor(private readonly ledger: Ledger) {}

  /**
   * Debit the balance
   * POST /pay
   */
  async pay(req: Request, res: Response): Promise<void> {
    await this.execute(req, res, 'debit', TransactionMessage.LOW_BALANCE);
  }

  /**
   * Move funds from balance to bank
   * POST /save
   */
  async save(req: Request, res: Response): Promise<void> {
    await this.execute(req, res, 'transfer', TransactionMessage.LOW_BALANCE_FOR_TRANSFER);
  }

  private async execute(
    req: Request,
    res: Response,
    operation: LedgerOperation,
    lowBalanceMessage: string
  ): Promise<void> {
    const correlationId = getCorrelationId(req);

    await Promise.all(amountValidation.map((chain) => chain.run(req)));
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      logger.info(
        { correlationId, operation, errors: errors.array().map((err) => err.msg) },
        'Amount rejected'
      );
      this.reply(res, TransactionMessage.INVALID_AMOUNT);
      return;
    }

    const amount = Number(req.body);
    const result =
      operation === 'debit'
        ? await this.ledger.debit(amount)
        : await this.ledger.transfer(amount);

    if (!result.ok) {
      this.reply(res, lowBalanceMessage);
      return;
    }

    this.reply(res, formatBalances(result));
  }

  private reply(res: Response, message: string): void {
    res.status(200).type('text/plain').send(message);
  }
}

import express, { Router, Request, Response } from 'express';

import { config } from '../../config';
import {
  createServiceLogger,
  getCorrelationId,
  instrument,
  InstrumentedHandler,
  InstrumentationOptions,
} from '../../observability';
import { Ledger } from '../ledger';

import { TransactionController } from './transaction.controller';

const logger = createServiceLogger('transaction');

interface BodyReadError extends Error {
  type: string;
  expose: boolean;
}

/**
 * `type` values the body parser gives the errors it raises while reading
 */
const BODY_READ_ERROR_TYPES: ReadonlySet<string> = new Set([
  'request.aborted',
  'entity.too.large',
  'request.size.invalid',
  'charset.unsupported',
  'encoding.unsupported',
  'stream.encoding.set',
]);

export const isBodyReadError = (err: unknown): err is BodyReadError =>
  err instanceof Error &&
  'expose' in err &&
  typeof err.expose === 'boolean' &&
  'type' in err &&
  typeof err.type === 'string' &&
  BODY_READ_ERROR_TYPES.has(err.type);

export const createTransactionRoutes = (
  ledger: Ledger,
  options: InstrumentationOptions = {}
): Router => {
  const router = Router();
  const transactionController = new TransactionController(ledger);

  // Any content type; the body is always read as text
  const readBody = express.text({ type: () => true, limit: config.api.bodyLimit });

  const parseBody = (req: Request, res: Response): Promise<void> =>
    new Promise((resolve, reject) => {
      readBody(req, res, (err?: unknown) => (err ? reject(err) : resolve()));
    });

  /**
   * Reads the body inside the instrumented scope. A body that cannot be read
   * is reported in the response text, not as an HTTP error, and the ledger
   * is never reached.
   */
  const withBody =
    (handler: InstrumentedHandler): InstrumentedHandler =>
    async (req, res) => {
      try {
        await parseBody(req, res);
      } catch (err) {
        if (!isBodyReadError(err)) {
          throw err;
        }

        const message = `error read HTTP body: ${err.message}`;
        logger.info({ correlationId: getCorrelationId(req), type: err.type }, message);
        res.status(200).type('text/plain').send(message);
        return;
      }

      await handler(req, res);
    };

  // POST /pay - Debit the balance
  router.post(
    '/pay',
    instrument(
      withBody((req, res) => transactionController.pay(req, res)),
      options
    )
  );

  // POST /save - Move funds from balance to bank
  router.post(
    '/save',
    instrument(
      withBody((req, res) => transactionController.save(req, res)),
      options
    )
  );

  return router;
};

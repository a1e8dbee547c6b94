import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from 'pino';

import { getCorrelationId } from './correlation';
import { runWithContext } from './log-context';
import { createServiceLogger } from './logger';
import { ResponseStatusRecorder } from './status-recorder';

export type InstrumentedHandler = (req: Request, res: Response) => void | Promise<void>;

export interface InstrumentationOptions {
  logger?: Logger;
}

const httpLogger = createServiceLogger('http');

/**
 * Logging is a side effect only: a failing write is reported as a process
 * warning and never reaches the request.
 */
const safeLog = (write: () => void): void => {
  try {
    write();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    process.emitWarning(`Request log write failed: ${reason}`);
  }
};

const elapsedMs = (start: bigint): number => {
  return Number(process.hrtime.bigint() - start) / 1e6;
};

/**
 * Wraps a handler with start/end request logging.
 *
 * The end event carries the status recorded on the response and the
 * monotonic time spent inside the handler. Errors from the handler are
 * passed to `next`; their end event waits for the error response.
 */
export const instrument = (
  handler: InstrumentedHandler,
  options: InstrumentationOptions = {}
): RequestHandler => {
  const log = options.logger ?? httpLogger;

  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = getCorrelationId(req);
    const recorder = new ResponseStatusRecorder(res);
    const fields = { correlationId, method: req.method, path: req.path };

    const run = async (): Promise<void> => {
      safeLog(() => log.info(fields, 'Request started'));

      let failed = false;
      let failure: unknown;
      const start = process.hrtime.bigint();

      try {
        await runWithContext({ correlationId }, () => handler(req, res));
      } catch (error) {
        failed = true;
        failure = error;
      }

      const durationMs = elapsedMs(start);
      const logCompleted = (): void =>
        safeLog(() =>
          log.info({ ...fields, statusCode: recorder.status, durationMs }, 'Request completed')
        );

      if (!failed) {
        logCompleted();
        return;
      }

      // The error handler writes the status; log once it is on the wire
      if (res.headersSent) {
        logCompleted();
      } else {
        res.once('finish', logCompleted);
      }
      throw failure;
    };

    run().catch(next);
  };
};

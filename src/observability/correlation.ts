import { Request, Response, NextFunction } from 'express';
import { randomBytes } from 'crypto';

import { getLogContext, runWithContext } from './log-context';
import { logger } from './logger';

export const CORRELATION_HEADER = 'X-Request-ID';

/**
 * Used when the random source fails; tagging is best-effort
 */
export const FALLBACK_CORRELATION_ID = 'fallback-id';

const CORRELATION_ID_BYTES = 16;

/**
 * Request key for the resolved correlation ID.
 * A symbol so no other middleware can clash with it by name.
 */
export const CORRELATION_ID: unique symbol = Symbol('pocket-ledger.correlationId');

declare global {
  namespace Express {
    interface Request {
      [CORRELATION_ID]?: string;
    }
  }
}

export type RandomSource = (size: number) => Buffer;

/**
 * Generate a compact URL-safe identifier (16 random bytes, 22 characters)
 */
export const generateCorrelationId = (source: RandomSource = randomBytes): string => {
  try {
    return source(CORRELATION_ID_BYTES).toString('base64url');
  } catch (error) {
    logger.warn({ error }, 'Random source failed, using fallback correlation ID');
    return FALLBACK_CORRELATION_ID;
  }
};

/**
 * Reuse the inbound header when it carries a usable value, otherwise generate one
 */
export const resolveCorrelationId = (
  headerValue: string | string[] | undefined,
  source?: RandomSource
): string => {
  const inbound = Array.isArray(headerValue) ? headerValue[0] : headerValue;

  if (inbound !== undefined && inbound.trim().length > 0) {
    return inbound;
  }

  return generateCorrelationId(source);
};

/**
 * Correlation ID lookup.
 * Prefers the request, then the async log context; empty string means untagged.
 */
export const getCorrelationId = (req?: Request): string => {
  return req?.[CORRELATION_ID] ?? getLogContext()?.correlationId ?? '';
};

/**
 * Correlation ID middleware
 * - Extracts or generates a correlation ID for each request
 * - Attaches it to the request and to AsyncLocalStorage
 * - Echoes it in the response headers
 */
export const createCorrelationMiddleware = (source?: RandomSource) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = resolveCorrelationId(req.headers['x-request-id'], source);

    req[CORRELATION_ID] = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);

    runWithContext({ correlationId }, () => next());
  };
};

export const correlationMiddleware = createCorrelationMiddleware();

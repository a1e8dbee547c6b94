/**
 * Correlation ID Unit Tests
 */

import express, { Request, Response } from 'express';
import request from 'supertest';

import {
  createCorrelationMiddleware,
  correlationMiddleware,
  FALLBACK_CORRELATION_ID,
  generateCorrelationId,
  getCorrelationId,
  resolveCorrelationId,
  runWithContext,
} from '../../../src/observability';

const GENERATED_ID = /^[A-Za-z0-9_-]{22}$/;

describe('Correlation ID', () => {
  describe('generateCorrelationId', () => {
    it('should encode 16 random bytes as unpadded base64url', () => {
      expect(generateCorrelationId(() => Buffer.alloc(16))).toBe('AAAAAAAAAAAAAAAAAAAAAA');
      expect(generateCorrelationId(() => Buffer.alloc(16, 0xff))).toBe('_____________________w');
    });

    it('should produce distinct ids from the default source', () => {
      const first = generateCorrelationId();
      const second = generateCorrelationId();

      expect(first).toMatch(GENERATED_ID);
      expect(second).toMatch(GENERATED_ID);
      expect(first).not.toBe(second);
    });

    it('should fall back to the sentinel when the random source fails', () => {
      const failingSource = () => {
        throw new Error('entropy unavailable');
      };

      expect(generateCorrelationId(failingSource)).toBe(FALLBACK_CORRELATION_ID);
    });
  });

  describe('resolveCorrelationId', () => {
    it('should reuse a provided header verbatim', () => {
      expect(resolveCorrelationId('abc-123')).toBe('abc-123');
      expect(resolveCorrelationId(' padded ')).toBe(' padded ');
    });

    it.each([
      ['missing', undefined],
      ['empty', ''],
      ['a single space', ' '],
      ['only whitespace', ' \t '],
    ])('should generate a new id when the header is %s', (_label, header) => {
      expect(resolveCorrelationId(header)).toMatch(GENERATED_ID);
    });

    it('should take the first value of a repeated header', () => {
      expect(resolveCorrelationId(['first', 'second'])).toBe('first');
    });
  });

  describe('getCorrelationId', () => {
    it('should return an empty string outside any request', () => {
      expect(getCorrelationId()).toBe('');
    });

    it('should read the id from the active log context', () => {
      const id = runWithContext({ correlationId: 'ctx-1' }, () => getCorrelationId());

      expect(id).toBe('ctx-1');
    });
  });

  describe('correlationMiddleware', () => {
    const buildApp = (middleware: express.RequestHandler) => {
      const app = express();
      app.use(middleware);
      app.get('/echo', (req: Request, res: Response) => {
        res.json({ fromRequest: getCorrelationId(req), fromContext: getCorrelationId() });
      });
      return app;
    };

    it('should echo a provided X-Request-ID and expose it to handlers', async () => {
      const response = await request(buildApp(correlationMiddleware))
        .get('/echo')
        .set('X-Request-ID', 'abc-123');

      expect(response.headers['x-request-id']).toBe('abc-123');
      expect(response.body).toEqual({ fromRequest: 'abc-123', fromContext: 'abc-123' });
    });

    it('should generate an id when none is provided', async () => {
      const response = await request(buildApp(correlationMiddleware)).get('/echo');

      expect(response.headers['x-request-id']).toMatch(GENERATED_ID);
      expect(response.body.fromRequest).toBe(response.headers['x-request-id']);
    });

    it('should tag the request with the sentinel when the random source fails', async () => {
      const middleware = createCorrelationMiddleware(() => {
        throw new Error('entropy unavailable');
      });

      const response = await request(buildApp(middleware)).get('/echo');

      expect(response.status).toBe(200);
      expect(response.headers['x-request-id']).toBe(FALLBACK_CORRELATION_ID);
    });
  });
});

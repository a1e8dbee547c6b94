/**
 * Request Instrumentation Unit Tests
 */

import express from 'express';
import pino from 'pino';
import request from 'supertest';

import { correlationMiddleware, instrument } from '../../../src/observability';
import { errorHandler } from '../../../src/middlewares/errorHandler';
import { createCapturedLogger } from '../../helpers';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('instrument', () => {
  it('should log a start and an end event around the handler', async () => {
    const { logger, lines } = createCapturedLogger();
    const app = express();
    app.use(correlationMiddleware);
    app.post(
      '/test',
      instrument(
        async (_req, res) => {
          await delay(5);
          res.status(200).send('OK');
        },
        { logger }
      )
    );

    const response = await request(app).post('/test').set('X-Request-ID', 'log-test-1');

    expect(response.status).toBe(200);
    expect(response.text).toBe('OK');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      msg: 'Request started',
      correlationId: 'log-test-1',
      method: 'POST',
      path: '/test',
    });
    expect(lines[1]).toMatchObject({
      msg: 'Request completed',
      correlationId: 'log-test-1',
      method: 'POST',
      path: '/test',
      statusCode: 200,
    });
    expect(typeof lines[1].durationMs).toBe('number');
    expect(lines[1].durationMs).toBeGreaterThan(0);
  });

  it('should log the status the handler actually sent', async () => {
    const { logger, lines } = createCapturedLogger();
    const app = express();
    app.use(correlationMiddleware);
    app.get(
      '/missing',
      instrument((_req, res) => {
        res.status(404).send('missing');
      }, { logger })
    );

    await request(app).get('/missing');

    expect(lines[1]).toMatchObject({ msg: 'Request completed', statusCode: 404 });
  });

  it('should log the end event and forward errors thrown by the handler', async () => {
    const { logger, lines } = createCapturedLogger();
    const app = express();
    app.use(correlationMiddleware);
    app.get(
      '/boom',
      instrument(async () => {
        throw new Error('handler failed');
      }, { logger })
    );
    app.use(errorHandler);

    const response = await request(app).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error.message).toBe('handler failed');
    expect(lines.map((line) => line.msg)).toEqual(['Request started', 'Request completed']);
    expect(lines[1]).toMatchObject({ correlationId: response.headers['x-request-id'], statusCode: 500 });
  });

  it('should never let a failing logger affect the response', async () => {
    const emitWarning = jest.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    const brokenLogger = pino(
      { level: 'info' },
      {
        write: () => {
          throw new Error('disk full');
        },
      }
    );
    const app = express();
    app.use(correlationMiddleware);
    app.get(
      '/test',
      instrument((_req, res) => {
        res.status(200).send('OK');
      }, { logger: brokenLogger })
    );

    const response = await request(app).get('/test');

    expect(response.status).toBe(200);
    expect(response.text).toBe('OK');
    expect(emitWarning).toHaveBeenCalledTimes(2);
    expect(emitWarning).toHaveBeenCalledWith('Request log write failed: disk full');

    emitWarning.mockRestore();
  });
});

import { Router, Request, Response } from 'express';

import { asyncHandler } from '../middlewares';
import { Ledger } from '../services/ledger';

export const createHealthRoutes = (ledger: Ledger): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const snapshot = await ledger.snapshot();

      res.status(200).json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        ledger: snapshot,
      });
    })
  );

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};

import cors from 'cors';
import express from 'express';

import { BuyInError, type BuyInErrorCode } from './models/errors.js';
import { registerRoutes } from './routes/index.js';
import type { FleetService } from './services/fleetService.js';
import { logger } from './utils/logger.js';

const STATUS_BY_CODE: Record<BuyInErrorCode, number> = {
  SHIP_NOT_FOUND: 404,
  SHIP_EXISTS: 409,
  MISSING_FIT: 422,
  INVALID_RANGE: 422
};

export function createApp(fleet: FleetService): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  registerRoutes(app, fleet);

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof BuyInError) {
      res.status(STATUS_BY_CODE[err.code]).json({ message: err.message, code: err.code });
      return;
    }
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ message: 'Internal server error' });
  });

  return app;
}

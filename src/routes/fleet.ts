import express from 'express';

import type { FleetService } from '../services/fleetService.js';
import { rankQuerySchema } from './schemas.js';

export function createFleetRouter(fleet: FleetService): express.Router {
  const router = express.Router();

  router.get('/buyin', (req, res) => {
    const parseResult = rankQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid query', issues: parseResult.error.issues });
      return;
    }
    res.json(fleet.fleetBuyin(parseResult.data));
  });

  return router;
}

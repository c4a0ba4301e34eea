import type express from 'express';

import type { FleetService } from '../services/fleetService.js';
import { createCatalogRouter } from './catalog.js';
import { createFleetRouter } from './fleet.js';
import { createShipsRouter } from './ships.js';

export function registerRoutes(app: express.Express, fleet: FleetService): void {
  app.get('/api/v1/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/v1/catalog', createCatalogRouter(fleet.catalog));
  app.use('/api/v1/ships', createShipsRouter(fleet));
  app.use('/api/v1/fleet', createFleetRouter(fleet));
}

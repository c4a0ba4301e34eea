import express from 'express';

import type { CatalogService } from '../services/catalogService.js';

export function createCatalogRouter(catalog: CatalogService): express.Router {
  const router = express.Router();

  router.get('/segments', (_req, res) => {
    res.json(catalog.listSegments());
  });

  router.get('/markets', (_req, res) => {
    res.json(catalog.listMarkets());
  });

  router.get('/markets/:id', (req, res) => {
    const market = catalog.listMarkets().find((entry) => entry.id === req.params.id);
    if (!market) {
      res.status(404).json({ message: 'Market not found' });
      return;
    }
    res.json(market);
  });

  return router;
}

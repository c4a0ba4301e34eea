import express from 'express';

import type { FleetService } from '../services/fleetService.js';
import { createShipSchema, leverSchema, rankQuerySchema, renameShipSchema, scoresSchema } from './schemas.js';

export function createShipsRouter(fleet: FleetService): express.Router {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.json(fleet.list());
  });

  router.post('/', (req, res) => {
    const parseResult = createShipSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const { name, ...input } = parseResult.data;
    const ship = fleet.constructShip(name, input);
    res.status(201).json(ship);
  });

  router.get('/:name', (req, res) => {
    const ship = fleet.get(req.params.name);
    res.json({ ...ship, quality: fleet.quality(ship.name) });
  });

  router.post('/:name/criteria', (req, res) => {
    const parseResult = scoresSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    const status = fleet.evaluateShip(req.params.name, parseResult.data);
    res.json({ status, quality: fleet.quality(req.params.name) });
  });

  router.post('/:name/segments', (req, res) => {
    const parseResult = scoresSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    res.json(fleet.evaluateSegments(req.params.name, parseResult.data));
  });

  router.post('/:name/markets', (req, res) => {
    const parseResult = scoresSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    res.json(fleet.sendToMarkets(req.params.name, parseResult.data));
  });

  router.post('/:name/hold', (req, res) => {
    const parseResult = leverSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    res.json(fleet.holdConstant(req.params.name, parseResult.data));
  });

  router.post('/:name/rename', (req, res) => {
    const parseResult = renameShipSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid payload', issues: parseResult.error.issues });
      return;
    }
    res.json(fleet.renameShip(req.params.name, parseResult.data.newName));
  });

  router.get('/:name/buyin', (req, res) => {
    res.json(fleet.landscape(req.params.name));
  });

  router.get('/:name/levers', (req, res) => {
    const parseResult = rankQuerySchema.safeParse(req.query);
    if (!parseResult.success) {
      res.status(400).json({ message: 'Invalid query', issues: parseResult.error.issues });
      return;
    }
    res.json(fleet.levers(req.params.name, parseResult.data));
  });

  return router;
}

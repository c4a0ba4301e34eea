import type { Server } from 'node:http';

import { z } from 'zod';

import { createApp } from '../../app.js';
import { DEFAULT_ENGINE_OPTIONS } from '../../services/buyInEngine.js';
import { CatalogService } from '../../services/catalogService.js';
import { FleetService } from '../../services/fleetService.js';

const seed = {
  segments: [
    { id: 'A', memberCount: 10, buyinValue: 2, defaultFit: 0.5 },
    { id: 'B', memberCount: 5, buyinValue: 3 }
  ],
  markets: [
    {
      id: 'M1',
      memberships: [
        { segmentId: 'A', count: 10 },
        { segmentId: 'B', count: 5 }
      ]
    }
  ]
};

const reportSchema = z.object({
  levers: z.array(z.object({ lever: z.unknown(), derivative: z.number() })),
  criteria: z.record(z.number())
});

let server: Server;
let baseUrl: string;

beforeAll((done) => {
  const fleet = new FleetService({
    criteria: ['functionality', 'understandability'],
    catalog: new CatalogService(seed),
    engine: DEFAULT_ENGINE_OPTIONS,
    criteriaScale: 10
  });
  server = createApp(fleet).listen(0, '127.0.0.1', () => {
    const address = server.address();
    if (address === null || typeof address === 'string') {
      done(new Error('Server has no TCP address'));
      return;
    }
    baseUrl = `http://127.0.0.1:${address.port}/api/v1`;
    done();
  });
});

afterAll((done) => {
  server.closeAllConnections();
  server.close(done);
});

async function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

describe('ships API', () => {
  test('GET /healthz', async () => {
    const res = await fetch(`${baseUrl}/healthz`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  test('GET /catalog/markets reports capacity', async () => {
    const res = await fetch(`${baseUrl}/catalog/markets`);
    expect(await res.json()).toEqual([{ id: 'M1', capacity: 35, segments: { A: 10, B: 5 } }]);
  });

  test('GET /catalog/markets/:id returns one market', async () => {
    const res = await fetch(`${baseUrl}/catalog/markets/M1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ id: 'M1', capacity: 35, segments: { A: 10, B: 5 } });
  });

  test('GET /catalog/markets/:id returns 404 for an unknown market', async () => {
    const res = await fetch(`${baseUrl}/catalog/markets/nowhere`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ message: 'Market not found' });
  });

  test('POST /ships rejects an invalid payload', async () => {
    const res = await post('/ships', { name: '' });
    expect(res.status).toBe(400);
  });

  test('POST /ships refuses a duplicate', async () => {
    expect((await post('/ships', { name: 'Dup' })).status).toBe(201);
    const res = await post('/ships', { name: 'Dup' });
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ message: 'Ship Dup already exists', code: 'SHIP_EXISTS' });
  });

  test('GET /ships/:name returns 404 for an unknown ship', async () => {
    const res = await fetch(`${baseUrl}/ships/Ghost`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ message: 'Ship Ghost not found', code: 'SHIP_NOT_FOUND' });
  });

  test('POST /ships/:name/markets rejects a fit out of range', async () => {
    await post('/ships', { name: 'Wide' });
    const res = await post('/ships/Wide/markets', { M1: 1.5 });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ message: 'Wide.marketFits.M1 = 1.5 is outside [0, 1]', code: 'INVALID_RANGE' });
  });

  test('evaluates a ship end to end', async () => {
    expect((await post('/ships', { name: 'X', description: 'Worked example' })).status).toBe(201);

    const criteria = await post('/ships/X/criteria', { functionality: 8, understandability: 10 });
    expect(await criteria.json()).toEqual({ status: 80, quality: 0.8 });

    const segments = await post('/ships/X/segments', { B: 1 });
    expect(await segments.json()).toEqual({ A: 0.5, B: 1 });

    const markets = await post('/ships/X/markets', { M1: 1 });
    expect(await markets.json()).toEqual({ M1: 1 });

    const buyin = await fetch(`${baseUrl}/ships/X/buyin`);
    expect(await buyin.json()).toMatchObject({ shipId: 'X', total: expect.closeTo(20, 10) });

    const levers = await fetch(`${baseUrl}/ships/X/levers`);
    const report = reportSchema.parse(await levers.json());
    expect(report.levers[0]).toEqual({ lever: { kind: 'quality' }, derivative: 25 });

    const weighted = await fetch(`${baseUrl}/ships/X/levers?timeWeighted=true`);
    const weightedReport = reportSchema.parse(await weighted.json());
    expect(weightedReport.levers[0].lever).toEqual({ kind: 'segmentFit', segmentId: 'A' });
  });

  test('POST /ships/:name/hold validates the lever', async () => {
    await post('/ships', { name: 'Held' });
    expect((await post('/ships/Held/hold', { kind: 'speed' })).status).toBe(400);
    const res = await post('/ships/Held/hold', { kind: 'marketFit', marketId: 'M1' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ name: 'Held', heldConstant: [{ kind: 'marketFit', marketId: 'M1' }] });
  });

  test('POST /ships/:name/hold accepts criterion levers', async () => {
    const res = await post('/ships/Held/hold', { kind: 'criterion', name: 'functionality' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      heldConstant: [
        { kind: 'marketFit', marketId: 'M1' },
        { kind: 'criterion', name: 'functionality' }
      ]
    });

    const unknown = await post('/ships/Held/hold', { kind: 'criterion', name: 'toString' });
    expect(unknown.status).toBe(422);
    expect(await unknown.json()).toEqual({ message: 'Unknown criterion toString', code: 'MISSING_FIT' });
  });

  test('GET /fleet/buyin lists every ship', async () => {
    const res = await fetch(`${baseUrl}/fleet/buyin`);
    const summary = z.object({ ships: z.array(z.object({ name: z.string() })) }).parse(await res.json());
    expect(summary.ships.map((ship) => ship.name)).toEqual(['Dup', 'Wide', 'X', 'Held']);
  });
});

import { InvalidRangeError } from '../../models/errors.js';
import { CatalogService } from '../catalogService.js';

describe('CatalogService', () => {
  test('loads the bundled catalog', () => {
    const catalog = new CatalogService();
    expect(catalog.listSegments().map((segment) => segment.id)).toEqual([
      'collaborators',
      'domain-experts',
      'adjacent-fields',
      'students',
      'public'
    ]);
    expect(catalog.markets().map((market) => market.id)).toEqual([
      'group-meeting',
      'conference',
      'journal',
      'social-media'
    ]);
  });

  test('resolves memberships to shared segment snapshots', () => {
    const catalog = new CatalogService();
    const journal = catalog.getMarket('journal');
    expect(journal?.memberships[0].segment).toBe(catalog.getSegment('collaborators'));
    expect(journal?.memberships.map(({ count }) => count)).toEqual([12, 300, 400]);
  });

  test('reports market capacity', () => {
    const markets = new CatalogService().listMarkets();
    const groupMeeting = markets.find((market) => market.id === 'group-meeting');
    const journal = markets.find((market) => market.id === 'journal');
    // 8*5 + 4*0.5
    expect(groupMeeting?.capacity).toBe(42);
    // 12*5 + 300*2 + 400*1
    expect(journal?.capacity).toBe(1060);
    expect(journal?.segments).toEqual({ collaborators: 12, 'domain-experts': 300, 'adjacent-fields': 400 });
  });

  test('rejects a market that references an unknown segment', () => {
    expect(
      () =>
        new CatalogService({
          segments: [],
          markets: [{ id: 'M', memberships: [{ segmentId: 'ghost', count: 1 }] }]
        })
    ).toThrow('Market M references unknown segment ghost');
  });

  test('rejects duplicate segments', () => {
    const segment = { id: 'A', memberCount: 1, buyinValue: 1 };
    expect(() => new CatalogService({ segments: [segment, segment], markets: [] })).toThrow(
      'Duplicate market segment A'
    );
  });

  test('rejects negative buy-in values', () => {
    expect(
      () => new CatalogService({ segments: [{ id: 'A', memberCount: 1, buyinValue: -1 }], markets: [] })
    ).toThrow();
  });

  test('rejects a default fit outside the fit bounds', () => {
    const seed = { segments: [{ id: 'A', memberCount: 1, buyinValue: 1, defaultFit: 1.5 }], markets: [] };
    expect(() => new CatalogService(seed)).toThrow(new InvalidRangeError('A.defaultFit', 1.5, { min: 0, max: 1 }));
    expect(new CatalogService(seed, { min: 0, max: 2 }).getSegment('A')?.defaultFit).toBe(1.5);
  });

  test('returns undefined for unknown ids', () => {
    const catalog = new CatalogService();
    expect(catalog.getMarket('nowhere')).toBeUndefined();
    expect(catalog.getSegment('nobody')).toBeUndefined();
  });
});

import { z } from 'zod';

import { config } from '../config.js';
import catalogSeed from '../data/catalog.json';
import { InvalidRangeError } from '../models/errors.js';
import type { Bounds, Market, MarketSegment } from '../models/types.js';
import { logger } from '../utils/logger.js';
import { marketCapacity } from './buyInEngine.js';

const segmentSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  memberCount: z.number().nonnegative(),
  buyinValue: z.number().nonnegative(),
  defaultFit: z.number().nonnegative().optional()
});

const catalogSchema = z.object({
  segments: z.array(segmentSchema),
  markets: z.array(
    z.object({
      id: z.string().min(1),
      label: z.string().optional(),
      memberships: z.array(
        z.object({
          segmentId: z.string().min(1),
          count: z.number().nonnegative()
        })
      )
    })
  )
});

export type CatalogInput = z.input<typeof catalogSchema>;

export class CatalogService {
  private readonly segments = new Map<string, MarketSegment>();
  private readonly marketsById = new Map<string, Market>();

  constructor(seed: CatalogInput = catalogSeed, fitBounds: Bounds = config.engine.fit) {
    const catalog = catalogSchema.parse(seed);

    for (const segment of catalog.segments) {
      if (this.segments.has(segment.id)) {
        throw new Error(`Duplicate market segment ${segment.id}`);
      }
      const { defaultFit } = segment;
      if (defaultFit !== undefined && (defaultFit < fitBounds.min || defaultFit > fitBounds.max)) {
        throw new InvalidRangeError(`${segment.id}.defaultFit`, defaultFit, fitBounds);
      }
      this.segments.set(segment.id, Object.freeze({ ...segment }));
    }

    for (const market of catalog.markets) {
      if (this.marketsById.has(market.id)) {
        throw new Error(`Duplicate market ${market.id}`);
      }
      const memberships = market.memberships.map(({ segmentId, count }) => {
        const segment = this.segments.get(segmentId);
        if (!segment) {
          throw new Error(`Market ${market.id} references unknown segment ${segmentId}`);
        }
        return { segment, count };
      });
      this.marketsById.set(market.id, Object.freeze({ id: market.id, label: market.label, memberships }));
    }

    logger.debug({ segments: this.segments.size, markets: this.marketsById.size }, 'Catalog loaded');
  }

  listSegments(): MarketSegment[] {
    return [...this.segments.values()];
  }

  getSegment(id: string): MarketSegment | undefined {
    return this.segments.get(id);
  }

  markets(): Market[] {
    return [...this.marketsById.values()];
  }

  getMarket(id: string): Market | undefined {
    return this.marketsById.get(id);
  }

  listMarkets(): Array<{ id: string; label?: string; capacity: number; segments: Record<string, number> }> {
    return this.markets().map((market) => ({
      id: market.id,
      label: market.label,
      capacity: marketCapacity(market),
      segments: Object.fromEntries(market.memberships.map(({ segment, count }) => [segment.id, count]))
    }));
  }
}

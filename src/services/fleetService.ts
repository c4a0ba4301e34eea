import { config } from '../config.js';
import { InvalidRangeError, MissingFitError, ShipExistsError, ShipNotFoundError } from '../models/errors.js';
import type {
  BuyinLandscape,
  EngineOptions,
  FleetBuyin,
  Lever,
  RankedLever,
  RankOptions,
  Ship,
  ShipRecord
} from '../models/types.js';
import { logger } from '../utils/logger.js';
import { ownValue } from '../utils/records.js';
import {
  buyinLandscape,
  compareRanked,
  computeTotalBuyin,
  leverId,
  rankLevers,
  sameLever
} from './buyInEngine.js';
import { CatalogService } from './catalogService.js';
import { DEFAULT_CRITERIA, estimateQuality, gradientCriterion } from './quality.js';

export type FleetOptions = {
  criteria?: readonly string[];
  catalog?: CatalogService;
  engine?: EngineOptions;
  criteriaScale?: number;
};

export type ConstructShipInput = {
  criteria?: string[];
  description?: string;
  category?: string;
};

export type LeverReport = {
  levers: RankedLever[];
  criteria: Record<string, number>;
  top: RankedLever | null;
};

/**
 * In-memory registry of tracked ships. Records hold the raw criteria scores
 * and fits; engine snapshots are derived from them on every evaluation.
 */
export class FleetService {
  private readonly ships = new Map<string, ShipRecord>();
  readonly criteria: readonly string[];
  readonly catalog: CatalogService;
  private readonly engine: EngineOptions;
  private readonly criteriaScale: number;

  constructor(options: FleetOptions = {}) {
    this.criteria = options.criteria ?? DEFAULT_CRITERIA;
    this.engine = options.engine ?? config.engine;
    this.catalog = options.catalog ?? new CatalogService(undefined, this.engine.fit);
    this.criteriaScale = options.criteriaScale ?? config.criteriaScale;
  }

  list(): ShipRecord[] {
    return [...this.ships.values()];
  }

  get(name: string): ShipRecord {
    const record = this.ships.get(name);
    if (!record) {
      throw new ShipNotFoundError(name);
    }
    return record;
  }

  constructShip(name: string, input: ConstructShipInput = {}): ShipRecord {
    if (this.ships.has(name)) {
      throw new ShipExistsError(name);
    }
    const criteria = [...new Set([...this.criteria, ...(input.criteria ?? [])])];
    const record: ShipRecord = {
      name,
      description: input.description ?? '',
      category: input.category ?? '',
      criteria: Object.fromEntries(criteria.map((criterion) => [criterion, 0])),
      marketFits: {},
      segmentFits: {},
      heldConstant: []
    };
    this.ships.set(name, record);
    logger.info({ ship: name, criteria }, 'Ship constructed');
    return record;
  }

  /** Merges criteria scores and returns the product of the raw scores. */
  evaluateShip(name: string, scores: Record<string, number>): number {
    const record = this.get(name);
    estimateQuality(scores, this.criteriaScale);
    Object.assign(record.criteria, scores);
    return Object.values(record.criteria).reduce((product, score) => product * score, 1);
  }

  /** Merges segment fits, then fills every catalog segment still unset with its default fit. */
  evaluateSegments(name: string, fits: Record<string, number>): Record<string, number> {
    const record = this.get(name);
    for (const [segmentId, fit] of Object.entries(fits)) {
      if (!this.catalog.getSegment(segmentId)) {
        throw new MissingFitError(name, segmentId, `Unknown market segment ${segmentId}`);
      }
      this.checkFit(`${name}.segmentFits.${segmentId}`, fit);
    }
    Object.assign(record.segmentFits, fits);
    for (const segment of this.catalog.listSegments()) {
      if (ownValue(record.segmentFits, segment.id) === undefined) {
        const fit = segment.defaultFit ?? 0;
        this.checkFit(`${segment.id}.defaultFit`, fit);
        record.segmentFits[segment.id] = fit;
      }
    }
    return { ...record.segmentFits };
  }

  sendToMarkets(name: string, fits: Record<string, number>): Record<string, number> {
    const record = this.get(name);
    for (const [marketId, fit] of Object.entries(fits)) {
      if (!this.catalog.getMarket(marketId)) {
        throw new MissingFitError(name, marketId, `Unknown market ${marketId}`);
      }
      this.checkFit(`${name}.marketFits.${marketId}`, fit);
    }
    Object.assign(record.marketFits, fits);
    return { ...record.marketFits };
  }

  holdConstant(name: string, lever: Lever): ShipRecord {
    const record = this.get(name);
    if (lever.kind === 'criterion' && ownValue(record.criteria, lever.name) === undefined) {
      throw new MissingFitError(name, lever.name, `Unknown criterion ${lever.name}`);
    }
    if (!record.heldConstant.some((held) => sameLever(held, lever))) {
      record.heldConstant.push(lever);
    }
    return record;
  }

  /** Moves a ship out of another fleet into this one; with `other === this` it renames. */
  moveShip(name: string, other: FleetService, newName: string = name): ShipRecord {
    const source = other.get(name);
    if (this.ships.has(newName) && !(other === this && newName === name)) {
      throw new ShipExistsError(newName);
    }
    const record: ShipRecord = { ...structuredClone(source), name: newName };
    other.ships.delete(name);
    this.ships.set(newName, record);
    logger.info({ ship: name, newName }, 'Ship moved');
    return record;
  }

  renameShip(name: string, newName: string): ShipRecord {
    return this.moveShip(name, this, newName);
  }

  /** Moves a ship from the docks and freezes its quality, criteria and segment fits. */
  launchShip(name: string, dock: FleetService): ShipRecord {
    const record = this.moveShip(name, dock);
    this.holdConstant(name, { kind: 'quality' });
    for (const criterion of Object.keys(record.criteria)) {
      this.holdConstant(name, { kind: 'criterion', name: criterion });
    }
    for (const segmentId of Object.keys(record.segmentFits)) {
      this.holdConstant(name, { kind: 'segmentFit', segmentId });
    }
    logger.info({ ship: name }, 'Ship launched');
    return record;
  }

  quality(name: string): number {
    return estimateQuality(this.get(name).criteria, this.criteriaScale);
  }

  toShip(name: string): Ship {
    const record = this.get(name);
    return {
      id: record.name,
      quality: estimateQuality(record.criteria, this.criteriaScale),
      marketFits: { ...record.marketFits },
      segmentFits: { ...record.segmentFits },
      heldConstant: [...record.heldConstant]
    };
  }

  landscape(name: string): BuyinLandscape {
    return buyinLandscape(this.toShip(name), this.catalog.markets(), this.engine);
  }

  /** Ranked engine levers, criterion gradients, and the single best lever across both. */
  levers(name: string, rankOptions: RankOptions = {}): LeverReport {
    const record = this.get(name);
    const ship = this.toShip(name);
    const markets = this.catalog.markets();
    const buyin = computeTotalBuyin([ship], markets, this.engine);
    const levers = [...rankLevers(ship, markets, rankOptions, this.engine)];
    const criterionLevers = this.criterionLevers(record, buyin, rankOptions);
    return {
      levers,
      criteria: Object.fromEntries(criterionLevers.map(({ lever, derivative }) => [leverId(lever), derivative])),
      top: [...levers, ...criterionLevers].sort(compareRanked)[0] ?? null
    };
  }

  fleetBuyin(rankOptions: RankOptions = {}): FleetBuyin {
    const markets = this.catalog.markets();
    const ships = this.list().map((record) => this.toShip(record.name));
    return {
      total: computeTotalBuyin(ships, markets, this.engine),
      ships: ships.map((ship) => ({
        name: ship.id,
        quality: ship.quality,
        buyin: computeTotalBuyin([ship], markets, this.engine),
        topLever: this.levers(ship.id, rankOptions).top
      }))
    } satisfies FleetBuyin;
  }

  private criterionLevers(record: ShipRecord, buyin: number, rankOptions: RankOptions): RankedLever[] {
    return Object.keys(record.criteria).map((criterion): RankedLever => {
      const lever: Lever = { kind: 'criterion', name: criterion };
      if (record.heldConstant.some((held) => sameLever(held, lever))) {
        return { lever, derivative: 0 };
      }
      return {
        lever,
        derivative: gradientCriterion(record.criteria, criterion, buyin, rankOptions, this.criteriaScale)
      };
    });
  }

  private checkFit(field: string, fit: number): void {
    if (!Number.isFinite(fit) || fit < this.engine.fit.min || fit > this.engine.fit.max) {
      throw new InvalidRangeError(field, fit, this.engine.fit);
    }
  }
}

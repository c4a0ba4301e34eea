import { InvalidRangeError, MissingFitError } from '../models/errors.js';
import type {
  Bounds,
  BuyinLandscape,
  EngineOptions,
  Lever,
  LeverKind,
  Market,
  MarketSegment,
  RankedLever,
  RankOptions,
  Ship
} from '../models/types.js';
import { ownValue } from '../utils/records.js';

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  quality: { min: 0, max: 1 },
  fit: { min: 0, max: 1 },
  strictMarketFit: true
};

const NON_NEGATIVE: Bounds = { min: 0, max: Number.POSITIVE_INFINITY };

const LEVER_ORDER: Record<LeverKind, number> = {
  quality: 0,
  marketFit: 1,
  segmentFit: 2,
  criterion: 3
};

function checkRange(field: string, value: number, bounds: Bounds): number {
  if (!Number.isFinite(value) || value < bounds.min || value > bounds.max) {
    throw new InvalidRangeError(field, value, bounds);
  }
  return value;
}

function qualityOf(ship: Ship, options: EngineOptions): number {
  return checkRange(`${ship.id}.quality`, ship.quality, options.quality);
}

function marketFitOf(ship: Ship, marketId: string, options: EngineOptions): number | undefined {
  const fit = ownValue(ship.marketFits, marketId);
  if (fit === undefined) {
    return undefined;
  }
  return checkRange(`${ship.id}.marketFits.${marketId}`, fit, options.fit);
}

function segmentFitOf(ship: Ship, segment: MarketSegment, options: EngineOptions): number {
  const fit = ownValue(ship.segmentFits, segment.id) ?? segment.defaultFit ?? 0;
  return checkRange(`${ship.id}.segmentFits.${segment.id}`, fit, options.fit);
}

function buyinValueOf(segment: MarketSegment): number {
  return checkRange(`${segment.id}.buyinValue`, segment.buyinValue, NON_NEGATIVE);
}

function membershipCount(market: Market, count: number, segmentId: string): number {
  return checkRange(`${market.id}.memberships.${segmentId}`, count, NON_NEGATIVE);
}

// Σ_i n_ij * b_i * f_ik
function weightedSegmentSum(ship: Ship, market: Market, options: EngineOptions): number {
  return market.memberships.reduce(
    (sum, { segment, count }) =>
      sum + membershipCount(market, count, segment.id) * buyinValueOf(segment) * segmentFitOf(ship, segment, options),
    0
  );
}

function distinctSegments(markets: readonly Market[]): MarketSegment[] {
  const segments = new Map<string, MarketSegment>();
  for (const market of markets) {
    for (const { segment } of market.memberships) {
      if (!segments.has(segment.id)) {
        segments.set(segment.id, segment);
      }
    }
  }
  return [...segments.values()];
}

/**
 * Buy-in earned by sending a ship to one market,
 * B(M,S) = F(M,S) * q(S) * Σ_i n(m_i,M) * b(m_i) * f(m_i,S).
 */
export function computeBuyin(ship: Ship, market: Market, options: EngineOptions = DEFAULT_ENGINE_OPTIONS): number {
  const quality = qualityOf(ship, options);
  const marketFit = marketFitOf(ship, market.id, options);
  if (marketFit === undefined) {
    if (options.strictMarketFit) {
      throw new MissingFitError(ship.id, market.id);
    }
    return 0;
  }
  return marketFit * quality * weightedSegmentSum(ship, market, options);
}

/**
 * Sum of buy-in over every (ship, market) pair. A ship that has no fit for a
 * market is not sent there and contributes nothing for it.
 */
export function computeTotalBuyin(
  ships: readonly Ship[],
  markets: readonly Market[],
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): number {
  let total = 0;
  for (const ship of ships) {
    for (const market of markets) {
      if (marketFitOf(ship, market.id, options) !== undefined) {
        total += computeBuyin(ship, market, options);
      }
    }
  }
  return total;
}

export function gradientQuality(
  ship: Ship,
  markets: readonly Market[],
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): number {
  qualityOf(ship, options);
  let gradient = 0;
  for (const market of markets) {
    const marketFit = marketFitOf(ship, market.id, options);
    if (marketFit !== undefined) {
      gradient += marketFit * weightedSegmentSum(ship, market, options);
    }
  }
  return gradient;
}

export function gradientMarketFit(ship: Ship, market: Market, options: EngineOptions = DEFAULT_ENGINE_OPTIONS): number {
  return qualityOf(ship, options) * weightedSegmentSum(ship, market, options);
}

export function gradientSegmentFit(
  ship: Ship,
  segment: MarketSegment,
  markets: readonly Market[],
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): number {
  let reach = 0;
  for (const market of markets) {
    const marketFit = marketFitOf(ship, market.id, options) ?? 0;
    for (const membership of market.memberships) {
      if (membership.segment.id === segment.id) {
        reach += membershipCount(market, membership.count, segment.id) * marketFit;
      }
    }
  }
  return qualityOf(ship, options) * buyinValueOf(segment) * reach;
}

/** Buy-in from a single representative member of a segment. */
export function segmentBuyin(ship: Ship, segment: MarketSegment, options: EngineOptions = DEFAULT_ENGINE_OPTIONS): number {
  return qualityOf(ship, options) * buyinValueOf(segment) * segmentFitOf(ship, segment, options);
}

/** Buy-in a ship with perfect quality and fit would earn in the market. */
export function marketCapacity(market: Market): number {
  return market.memberships.reduce(
    (sum, { segment, count }) => sum + membershipCount(market, count, segment.id) * buyinValueOf(segment),
    0
  );
}

export function leverId(lever: Lever): string {
  switch (lever.kind) {
    case 'quality':
      return 'quality';
    case 'marketFit':
      return lever.marketId;
    case 'segmentFit':
      return lever.segmentId;
    case 'criterion':
      return lever.name;
  }
}

export function sameLever(a: Lever, b: Lever): boolean {
  return a.kind === b.kind && leverId(a) === leverId(b);
}

function isHeldConstant(ship: Ship, lever: Lever): boolean {
  return (ship.heldConstant ?? []).some((held) => sameLever(held, lever));
}

export function compareRanked(a: RankedLever, b: RankedLever): number {
  const magnitude = Math.abs(b.derivative) - Math.abs(a.derivative);
  if (magnitude !== 0) {
    return magnitude;
  }
  const category = LEVER_ORDER[a.lever.kind] - LEVER_ORDER[b.lever.kind];
  if (category !== 0) {
    return category;
  }
  const idA = leverId(a.lever);
  const idB = leverId(b.lever);
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

function evaluateLevers(
  ship: Ship,
  markets: readonly Market[],
  rankOptions: RankOptions,
  options: EngineOptions
): RankedLever[] {
  const entries: Array<{ lever: Lever; derivative: () => number; value: () => number }> = [
    {
      lever: { kind: 'quality' },
      derivative: () => gradientQuality(ship, markets, options),
      value: () => qualityOf(ship, options)
    },
    ...markets.map((market) => ({
      lever: { kind: 'marketFit', marketId: market.id } satisfies Lever,
      derivative: () => gradientMarketFit(ship, market, options),
      value: () => marketFitOf(ship, market.id, options) ?? 0
    })),
    ...distinctSegments(markets).map((segment) => ({
      lever: { kind: 'segmentFit', segmentId: segment.id } satisfies Lever,
      derivative: () => gradientSegmentFit(ship, segment, markets, options),
      value: () => segmentFitOf(ship, segment, options)
    }))
  ];

  const ranked = entries.map(({ lever, derivative, value }): RankedLever => {
    if (isHeldConstant(ship, lever)) {
      return { lever, derivative: 0 };
    }
    // dX/dt = 1 - X: a lever close to saturation is slow to improve further
    const scale = rankOptions.timeWeighted ? 1 - value() : 1;
    return { lever, derivative: derivative() * scale };
  });

  return ranked.sort(compareRanked);
}

/**
 * Levers paired with their partial derivative of total buy-in, largest
 * magnitude first. Nothing is evaluated until iteration starts and every new
 * iteration re-evaluates against the current snapshot.
 */
export function rankLevers(
  ship: Ship,
  markets: readonly Market[],
  rankOptions: RankOptions = {},
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): Iterable<RankedLever> {
  return {
    *[Symbol.iterator]() {
      yield* evaluateLevers(ship, markets, rankOptions, options);
    }
  };
}

export function topLever(
  ship: Ship,
  markets: readonly Market[],
  rankOptions: RankOptions = {},
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): RankedLever | null {
  for (const ranked of rankLevers(ship, markets, rankOptions, options)) {
    return ranked;
  }
  return null;
}

export function buyinLandscape(
  ship: Ship,
  markets: readonly Market[],
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): BuyinLandscape {
  const marketBuyins: Record<string, number> = {};
  let total = 0;
  for (const market of markets) {
    if (marketFitOf(ship, market.id, options) === undefined) {
      continue;
    }
    const buyin = computeBuyin(ship, market, options);
    marketBuyins[market.id] = buyin;
    total += buyin;
  }

  const segmentBuyins: Record<string, number> = {};
  for (const segment of distinctSegments(markets)) {
    segmentBuyins[segment.id] = segmentBuyin(ship, segment, options);
  }

  return {
    shipId: ship.id,
    quality: qualityOf(ship, options),
    total,
    markets: marketBuyins,
    segments: segmentBuyins
  } satisfies BuyinLandscape;
}

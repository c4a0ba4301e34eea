export type MarketSegment = {
  id: string;
  label?: string;
  memberCount: number;
  buyinValue: number;
  defaultFit?: number;
};

export type SegmentMembership = {
  segment: MarketSegment;
  count: number;
};

export type Market = {
  id: string;
  label?: string;
  memberships: SegmentMembership[];
};

export type Lever =
  | { kind: 'quality' }
  | { kind: 'marketFit'; marketId: string }
  | { kind: 'segmentFit'; segmentId: string }
  | { kind: 'criterion'; name: string };

export type LeverKind = Lever['kind'];

export type Ship = {
  id: string;
  quality: number;
  marketFits: Record<string, number>;
  segmentFits: Record<string, number>;
  heldConstant?: Lever[];
};

export type RankedLever = {
  lever: Lever;
  derivative: number;
};

export type Bounds = { min: number; max: number };

export type EngineOptions = {
  quality: Bounds;
  fit: Bounds;
  strictMarketFit: boolean;
};

export type RankOptions = {
  timeWeighted?: boolean;
};

export type BuyinLandscape = {
  shipId: string;
  quality: number;
  total: number;
  markets: Record<string, number>;
  segments: Record<string, number>;
};

export type ShipRecord = {
  name: string;
  description: string;
  category: string;
  criteria: Record<string, number>;
  marketFits: Record<string, number>;
  segmentFits: Record<string, number>;
  heldConstant: Lever[];
};

export type ShipSummary = {
  name: string;
  quality: number;
  buyin: number;
  topLever: RankedLever | null;
};

export type FleetBuyin = {
  total: number;
  ships: ShipSummary[];
};

import { InvalidRangeError, MissingFitError } from '../models/errors.js';
import type { RankOptions } from '../models/types.js';
import { ownValue } from '../utils/records.js';

export const DEFAULT_CRITERIA = [
  'functionality',
  'accuracy',
  'understandability',
  'allure',
  'polish',
  'confidence',
  'compatibility',
  'usability'
] as const;

export const DEFAULT_CRITERIA_SCALE = 10;

function scaledScore(name: string, score: number, scale: number): number {
  if (!Number.isFinite(score) || score < 0 || score > scale) {
    throw new InvalidRangeError(`criteria.${name}`, score, { min: 0, max: scale });
  }
  return score / scale;
}

/**
 * Quality as a Cobb-Douglas product of the criteria scores,
 * q = Π_m (c_m / scale). A ship with no criteria has quality 1.
 */
export function estimateQuality(criteria: Record<string, number>, scale: number = DEFAULT_CRITERIA_SCALE): number {
  return Object.entries(criteria).reduce((product, [name, score]) => product * scaledScore(name, score, scale), 1);
}

/** dB/dc_m = B / c_m for a buy-in B that is proportional to quality. */
export function gradientCriterion(
  criteria: Record<string, number>,
  name: string,
  buyin: number,
  rankOptions: RankOptions = {},
  scale: number = DEFAULT_CRITERIA_SCALE
): number {
  const score = ownValue(criteria, name);
  if (score === undefined) {
    throw new MissingFitError('criteria', name, `Unknown criterion ${name}`);
  }
  const value = scaledScore(name, score, scale);
  // A zero score zeroes the buy-in as well; B / c_m is undefined there.
  if (value === 0) {
    return 0;
  }
  const gradient = buyin / value;
  return rankOptions.timeWeighted ? gradient * (1 - value) : gradient;
}

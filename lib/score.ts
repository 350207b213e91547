import { ValidationError } from './errors';
import { energyPointSchema, parseInput } from './validation';
import type { ScoreBand } from './types';

export const MIN_SCORE = 20;
export const MAX_SCORE = 100;

const BASE_SCORE = 20;
const POINT_WEIGHT = 4;

/**
 * Daily score from physical and mental points: 20 + (physical + mental) * 4.
 * Both inputs are integers in [0, 10], so the result is always in [20, 100].
 */
export function computeScore(physical: number, mental: number): number {
  const p = parseInput(energyPointSchema, physical);
  const m = parseInput(energyPointSchema, mental);
  return BASE_SCORE + (p + m) * POINT_WEIGHT;
}

export function rawPoints(physical: number, mental: number): number {
  return parseInput(energyPointSchema, physical) + parseInput(energyPointSchema, mental);
}

export function scoreBand(score: number): ScoreBand {
  if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
    throw new ValidationError(`Score must be an integer between ${MIN_SCORE} and ${MAX_SCORE}, got ${score}`);
  }
  if (score === 20) return 'None';
  if (score <= 40) return 'Very Low';
  if (score <= 55) return 'Low';
  if (score <= 75) return 'Moderate';
  if (score <= 83) return 'High';
  return 'Maximum';
}

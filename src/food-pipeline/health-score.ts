/**
 * Heuristic health score.
 *
 * Starts from 50, subtracts weighted amounts of sugars, saturated fat, sodium
 * and fat, adds weighted amounts of protein, fiber and four micronutrients,
 * and clamps the result into [1, 100]. Each nutrient value is capped at 10.
 */

import type { NutrientKey, NutrientProfile, ScoreBand } from "./types.js";

export const BASELINE_SCORE = 50;
export const MIN_SCORE = 1;
export const MAX_SCORE = 100;
const VALUE_CAP = 10;

const NEGATIVE_WEIGHTS: ReadonlyArray<readonly [NutrientKey, number]> = [
  ['sugars_100g', 5],
  ['saturated-fat_100g', 5],
  ['sodium_100g', 4],
  ['fat_100g', 3],
];

const POSITIVE_WEIGHTS: ReadonlyArray<readonly [NutrientKey, number]> = [
  ['proteins_100g', 4],
  ['fiber_100g', 4],
  ['vitamin-d_100g', 2],
  ['calcium_100g', 2],
  ['iron_100g', 2],
  ['potassium_100g', 2],
];

function cappedValue(nutrients: NutrientProfile, key: NutrientKey): number {
  const value = nutrients[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) return 0;
  return Math.min(value, VALUE_CAP);
}

export function calculateHealthScore(nutrients: NutrientProfile): number {
  let score = BASELINE_SCORE;
  for (const [key, weight] of NEGATIVE_WEIGHTS) {
    score -= weight * cappedValue(nutrients, key);
  }
  for (const [key, weight] of POSITIVE_WEIGHTS) {
    score += weight * cappedValue(nutrients, key);
  }
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, score));
}

/** Colour band used when presenting a score: below 50 poor, below 70 fair. */
export function scoreBand(score: number): ScoreBand {
  if (score < 50) return 'poor';
  if (score < 70) return 'fair';
  return 'good';
}

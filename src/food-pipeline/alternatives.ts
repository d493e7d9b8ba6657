/**
 * Healthier-alternative discovery.
 *
 * Candidates come from one category search in the product's market. A
 * candidate is kept only if it is sold in the target country, scores strictly
 * higher than the scanned product, and wins on most of the nutrients both
 * products report.
 */

import { calculateHealthScore } from "./health-score.js";
import { describeError } from "./errors.js";
import type { FoodDatabase } from "./open-food-facts.js";
import type { AlternativeCandidate, NutrientKey, NutrientProfile, Product } from "./types.js";

export const DEFAULT_ALTERNATIVES_LIMIT = 3;
export const DEFAULT_CANDIDATE_PAGE_SIZE = 100;
export const MAJORITY_THRESHOLD = 0.6;

type Direction = 'lower' | 'higher';

const COMPARISONS: ReadonlyArray<readonly [NutrientKey, Direction]> = [
  ['sugars_100g', 'lower'],
  ['fat_100g', 'lower'],
  ['saturated-fat_100g', 'lower'],
  ['sodium_100g', 'lower'],
  ['proteins_100g', 'higher'],
  ['fiber_100g', 'higher'],
];

export interface AlternativeOptions {
  /** Country tag without language prefix, e.g. "united-states". */
  country: string;
  limit?: number;
  pageSize?: number;
}

/** First non-empty category tag, or "unknown". */
export function searchCategory(product: Pick<Product, 'categories'>): string {
  return product.categories.find((tag) => tag.trim() !== '') ?? 'unknown';
}

/**
 * Majority-improvement test: of the comparable nutrients reported by both
 * products, at least 60% must move in the healthier direction.
 */
export function isHealthierOption(current: NutrientProfile, candidate: NutrientProfile): boolean {
  let defined = 0;
  let better = 0;
  for (const [key, direction] of COMPARISONS) {
    const currentValue = current[key];
    const candidateValue = candidate[key];
    if (currentValue == null || candidateValue == null) continue;
    defined++;
    if (direction === 'lower' ? candidateValue < currentValue : candidateValue > currentValue) {
      better++;
    }
  }
  return defined > 0 && better / defined >= MAJORITY_THRESHOLD;
}

/**
 * Filter, score, sort and deduplicate a candidate pool. Pure; the result is
 * sorted by score descending, unique by name and at most `limit` long.
 */
export function rankAlternatives(
  source: Product,
  sourceScore: number,
  candidates: readonly Product[],
  options: Pick<AlternativeOptions, 'country' | 'limit'>
): AlternativeCandidate[] {
  const countryTag = `en:${options.country}`;
  const limit = options.limit ?? DEFAULT_ALTERNATIVES_LIMIT;

  const accepted: AlternativeCandidate[] = [];
  for (const candidate of candidates) {
    if (candidate.code === source.code) continue;
    if (!candidate.countries.includes(countryTag)) continue;

    const healthScore = calculateHealthScore(candidate.nutrients);
    if (healthScore <= sourceScore) continue;
    if (!isHealthierOption(source.nutrients, candidate.nutrients)) continue;

    accepted.push({ ...candidate, healthScore });
  }

  accepted.sort((a, b) => b.healthScore - a.healthScore);

  const unique: AlternativeCandidate[] = [];
  const seen = new Set<string>();
  for (const alt of accepted) {
    if (unique.length >= limit) break;
    if (seen.has(alt.name)) continue;
    seen.add(alt.name);
    unique.push(alt);
  }
  return unique;
}

/**
 * Search the database for healthier products in the same category and market.
 * Any failure aborts the search and yields an empty list.
 */
export async function findHealthierAlternatives(
  source: Product,
  sourceScore: number,
  database: FoodDatabase,
  options: AlternativeOptions
): Promise<AlternativeCandidate[]> {
  const category = searchCategory(source);
  try {
    const candidates = await database.searchByCategory({
      category,
      country: options.country,
      pageSize: options.pageSize ?? DEFAULT_CANDIDATE_PAGE_SIZE,
    });
    return rankAlternatives(source, sourceScore, candidates, options);
  } catch (err) {
    console.error(`[alternatives] Error searching '${category}' in ${options.country}:`, describeError(err));
    return [];
  }
}

/**
 * Per-scan evaluation: barcode → product → score → alternatives.
 *
 * Session state is an explicit value owned by the caller; nothing here keeps
 * state between scans.
 */

import type { ScanMode } from "../config.js";
import { findHealthierAlternatives } from "./alternatives.js";
import { scanImage } from "./barcode-scanner.js";
import { calculateHealthScore, scoreBand } from "./health-score.js";
import { formatNumber, formatNutritionFacts, type NutritionFactLine } from "./nutrition-facts.js";
import { lookupProduct, type FoodDatabase } from "./open-food-facts.js";
import type { AlternativeCandidate, Product, ScoreBand, SymbolDecoder } from "./types.js";

export const DEFAULT_SCORE_THRESHOLD = 70;

export interface ScanDependencies {
  database: FoodDatabase;
  decoder: SymbolDecoder;
}

export interface EvaluationOptions {
  country: string;
  /** Alternatives are searched only below this score. */
  scoreThreshold?: number;
  pageSize?: number;
  limit?: number;
  scanMode?: ScanMode;
}

export interface ScanReport {
  barcode: string;
  product: Product;
  healthScore: number;
  formattedScore: string;
  band: ScoreBand;
  nutritionFacts: NutritionFactLine[];
  alternativesSearched: boolean;
  alternatives: AlternativeCandidate[];
}

export type ImageEvaluation =
  | { status: 'no-barcode' }
  | { status: 'not-found'; barcode: string }
  | { status: 'found'; report: ScanReport };

export async function evaluateProduct(
  product: Product,
  database: FoodDatabase,
  options: EvaluationOptions
): Promise<ScanReport> {
  const healthScore = calculateHealthScore(product.nutrients);
  const alternativesSearched = healthScore < (options.scoreThreshold ?? DEFAULT_SCORE_THRESHOLD);
  const alternatives = alternativesSearched
    ? await findHealthierAlternatives(product, healthScore, database, options)
    : [];

  return {
    barcode: product.code,
    product,
    healthScore,
    formattedScore: `${formatNumber(healthScore)}/100`,
    band: scoreBand(healthScore),
    nutritionFacts: formatNutritionFacts(product.nutrients),
    alternativesSearched,
    alternatives,
  };
}

/** Null when the barcode is unknown or the lookup failed. */
export async function evaluateBarcode(
  barcode: string,
  database: FoodDatabase,
  options: EvaluationOptions
): Promise<ScanReport | null> {
  const code = barcode.trim();
  if (!code) return null;
  const product = await lookupProduct(code, database);
  if (!product) return null;
  return evaluateProduct(product, database, options);
}

export async function evaluateImage(
  image: Buffer | Uint8Array,
  deps: ScanDependencies,
  options: EvaluationOptions
): Promise<ImageEvaluation> {
  const barcode = await scanImage(image, deps.decoder, { mode: options.scanMode });
  if (!barcode) return { status: 'no-barcode' };
  const report = await evaluateBarcode(barcode, deps.database, options);
  return report ? { status: 'found', report } : { status: 'not-found', barcode };
}

/** State carried between calls of one client connection. */
export interface ScanSession {
  readonly lastReport?: ScanReport;
}

export function emptySession(): ScanSession {
  return {};
}

export function withReport(session: ScanSession, report: ScanReport): ScanSession {
  return { ...session, lastReport: report };
}

/**
 * Shared types for the scan pipeline.
 *
 * Covers nutrient profiles and products from Open Food Facts, the scored
 * alternatives found for a product, and the raster frames handed to the
 * barcode decoder.
 */

/** Per-100g nutrient fields, in the order a nutrition facts panel lists them. */
export const NUTRIENT_KEYS = [
  'energy-kcal_100g',
  'fat_100g',
  'saturated-fat_100g',
  'trans-fat_100g',
  'cholesterol_100g',
  'sodium_100g',
  'carbohydrates_100g',
  'fiber_100g',
  'sugars_100g',
  'proteins_100g',
  'vitamin-d_100g',
  'calcium_100g',
  'iron_100g',
  'potassium_100g',
] as const;

export type NutrientKey = (typeof NUTRIENT_KEYS)[number];

/** Nutrient values per 100 g. `null` or a missing key means unknown. */
export type NutrientProfile = Partial<Record<NutrientKey, number | null>>;

/** A product as read from the food database. */
export interface Product {
  code: string;
  name: string;
  brand: string;
  servingSize: string;
  countries: string[];
  categories: string[];
  nutrients: NutrientProfile;
  stores?: string;
  purchasePlaces?: string;
}

/** A product that beat the scanned one on score and on most comparable nutrients. */
export interface AlternativeCandidate extends Product {
  healthScore: number;
}

export type ScoreBand = 'poor' | 'fair' | 'good';

/** A decoded frame: `channels` interleaved 8-bit samples per pixel, row-major. */
export interface RasterFrame {
  width: number;
  height: number;
  channels: 1 | 3 | 4;
  data: Uint8Array | Uint8ClampedArray;
}

/** Single-channel frame. */
export interface GrayFrame extends RasterFrame {
  channels: 1;
}

export interface BoundingRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** One symbol found by a decoder. */
export interface DetectedSymbol {
  format: string;
  rect: BoundingRect;
  data: Uint8Array;
}

/** Barcode decoding collaborator. Returns an empty list when nothing is found. */
export interface SymbolDecoder {
  decode(frame: RasterFrame): DetectedSymbol[];
}

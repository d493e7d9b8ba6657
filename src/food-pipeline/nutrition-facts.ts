/**
 * Nutrition facts panel formatting.
 *
 * Open Food Facts stores every per-100g value in grams (kcal and µg aside),
 * so nutrients shown in milligrams are scaled by 1000.
 */

import type { NutrientKey, NutrientProfile } from "./types.js";

export type NutrientUnit = 'kcal' | 'g' | 'mg' | 'µg';

export interface NutritionFactRow {
  key: NutrientKey;
  label: string;
  unit: NutrientUnit;
  /** Sub-rows (saturated fat under total fat, sugars under carbohydrates). */
  indent: boolean;
}

export interface NutritionFactLine {
  label: string;
  value: string;
  unit: NutrientUnit;
  indent: boolean;
}

export const NUTRITION_FACTS_ORDER: readonly NutritionFactRow[] = [
  { key: 'energy-kcal_100g', label: 'Calories', unit: 'kcal', indent: false },
  { key: 'fat_100g', label: 'Total Fat', unit: 'g', indent: false },
  { key: 'saturated-fat_100g', label: 'Saturated Fat', unit: 'g', indent: true },
  { key: 'trans-fat_100g', label: 'Trans Fat', unit: 'g', indent: true },
  { key: 'cholesterol_100g', label: 'Cholesterol', unit: 'mg', indent: false },
  { key: 'sodium_100g', label: 'Sodium', unit: 'mg', indent: false },
  { key: 'carbohydrates_100g', label: 'Total Carbohydrates', unit: 'g', indent: false },
  { key: 'fiber_100g', label: 'Dietary Fiber', unit: 'g', indent: true },
  { key: 'sugars_100g', label: 'Sugars', unit: 'g', indent: true },
  { key: 'proteins_100g', label: 'Protein', unit: 'g', indent: false },
  { key: 'vitamin-d_100g', label: 'Vitamin D', unit: 'µg', indent: false },
  { key: 'calcium_100g', label: 'Calcium', unit: 'mg', indent: false },
  { key: 'iron_100g', label: 'Iron', unit: 'mg', indent: false },
  { key: 'potassium_100g', label: 'Potassium', unit: 'mg', indent: false },
];

/** Two decimal places; values that are not numbers are returned as text. */
export function formatNumber(value: number | string): string {
  const n = typeof value === 'number' ? value : Number(value);
  if (typeof value === 'string' && value.trim() === '') return value;
  return Number.isFinite(n) ? n.toFixed(2) : String(value);
}

export function formatNutritionFacts(
  nutrients: NutrientProfile,
  options: { skipZero?: boolean } = {}
): NutritionFactLine[] {
  const lines: NutritionFactLine[] = [];
  for (const row of NUTRITION_FACTS_ORDER) {
    const value = nutrients[row.key];
    if (value == null) continue;
    if (options.skipZero && value === 0) continue;
    const scaled = row.unit === 'mg' ? value * 1000 : value;
    lines.push({ label: row.label, value: formatNumber(scaled), unit: row.unit, indent: row.indent });
  }
  return lines;
}

/** Plain-text panel, one "Label: 1.00g" line per nutrient. */
export function renderNutritionFacts(lines: readonly NutritionFactLine[]): string[] {
  return lines.map((line) => `${line.indent ? '  ' : ''}${line.label}: ${line.value}${line.unit}`);
}

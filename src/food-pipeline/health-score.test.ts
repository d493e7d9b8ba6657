import { describe, expect, it } from 'vitest';
import { calculateHealthScore, scoreBand } from './health-score.js';
import { NUTRIENT_KEYS, type NutrientProfile } from './types.js';

describe('calculateHealthScore', () => {
  it('returns the baseline for an empty profile', () => {
    expect(calculateHealthScore({})).toBe(50);
  });

  it('treats null and non-finite values as no contribution', () => {
    expect(calculateHealthScore({ 'sugars_100g': null, 'proteins_100g': Number.NaN })).toBe(50);
  });

  it('applies negative and positive weights', () => {
    // 50 - 5*2 + 4*3
    expect(calculateHealthScore({ 'sugars_100g': 2, 'proteins_100g': 3 })).toBe(52);
  });

  it('caps each nutrient at 10 before weighting', () => {
    expect(calculateHealthScore({ 'sodium_100g': 800 })).toBe(calculateHealthScore({ 'sodium_100g': 10 }));
    expect(calculateHealthScore({ 'sodium_100g': 800 })).toBe(10);
  });

  it('clamps a very unhealthy profile to 1', () => {
    const nutrients: NutrientProfile = {
      'sugars_100g': 40,
      'fat_100g': 20,
      'saturated-fat_100g': 15,
      'sodium_100g': 800,
      'proteins_100g': 2,
      'fiber_100g': 1,
    };
    // 50 - 50 - 30 - 50 - 40 + 8 + 4 = -108
    expect(calculateHealthScore(nutrients)).toBe(1);
  });

  it('clamps a very healthy profile to 100', () => {
    expect(
      calculateHealthScore({
        'proteins_100g': 10,
        'fiber_100g': 10,
        'vitamin-d_100g': 10,
        'calcium_100g': 10,
        'iron_100g': 10,
        'potassium_100g': 10,
      })
    ).toBe(100);
  });

  it('ignores nutrients outside the weighted set', () => {
    expect(calculateHealthScore({ 'energy-kcal_100g': 900, 'cholesterol_100g': 5 })).toBe(50);
  });

  it('does not depend on key order', () => {
    const forward: NutrientProfile = { 'sugars_100g': 4, 'fat_100g': 1.5, 'fiber_100g': 6, 'iron_100g': 0.2 };
    const reversed: NutrientProfile = Object.fromEntries(Object.entries(forward).reverse());
    expect(calculateHealthScore(reversed)).toBe(calculateHealthScore(forward));
  });

  it('stays within [1, 100] for arbitrary profiles', () => {
    let seed = 7;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };
    for (let i = 0; i < 200; i++) {
      const nutrients: NutrientProfile = {};
      for (const key of NUTRIENT_KEYS) {
        if (next() < 0.7) nutrients[key] = next() * 60;
      }
      const score = calculateHealthScore(nutrients);
      expect(score).toBeGreaterThanOrEqual(1);
      expect(score).toBeLessThanOrEqual(100);
    }
  });
});

describe('scoreBand', () => {
  it('maps boundaries to bands', () => {
    expect(scoreBand(1)).toBe('poor');
    expect(scoreBand(49.99)).toBe('poor');
    expect(scoreBand(50)).toBe('fair');
    expect(scoreBand(69.99)).toBe('fair');
    expect(scoreBand(70)).toBe('good');
    expect(scoreBand(100)).toBe('good');
  });
});

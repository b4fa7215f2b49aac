// tests/meal-planner.spec.ts
// End-to-end through the facade with the bundled catalog.

import { test, expect } from '@playwright/test';
import { IngredientNotFoundError, RatioSpecError } from '../src/domain/errors';
import {
  computeWeeklyPlan,
  estimateEnergy,
  loadDefaultCatalog,
  validateSubmittedPlan,
} from '../src/services/mealPlanner';
import { getRatioPreset } from '../src/services/ratioSpecs';
import type { RatioSpec } from '../src/types/mealPlan';
import type { AnimalProfile } from '../src/types/nutrition';
import { gramsOf } from './fixtures';

const catalog = loadDefaultCatalog();
const profile: AnimalProfile = { weightKg: 10, lifeStage: 'adult', activity: 'moderate', healthFlags: [] };
const pantry = [
  'turkey-lean',
  'chicken-lean',
  'white-rice',
  'sweet-potato',
  'olive-oil',
  'fish-oil',
  'carrot',
  'green-beans',
  'eggshell-powder',
];

test.describe('computeWeeklyPlan', () => {
  test('rotates two complete meals through the week', () => {
    const week = computeWeeklyPlan(pantry, profile, getRatioPreset('balanced'), catalog);

    expect(week.energy.mer).toBeCloseTo(629.82, 2);
    expect(week.days).toHaveLength(7);
    expect(gramsOf(week.days[0].portions)).toEqual([
      ['turkey-lean', 202.6],
      ['olive-oil', 17.9],
      ['sweet-potato', 136.4],
      ['carrot', 144],
      ['eggshell-powder', 2],
    ]);
    expect(gramsOf(week.days[1].portions)).toEqual([
      ['chicken-lean', 187.1],
      ['fish-oil', 15.6],
      ['white-rice', 100],
      ['green-beans', 162.5],
      ['eggshell-powder', 1.8],
    ]);
    expect(week.days[6].signature).toBe(week.days[0].signature);
    expect(week.days.every((d) => !d.usedFallback)).toBe(true);
  });

  test('every day stays on energy and inside the Ca:P bounds', () => {
    const week = computeWeeklyPlan(pantry, profile, getRatioPreset('balanced'), catalog);
    for (const day of week.days) {
      expect(Math.abs(day.totals.kcal - week.energy.mer) / week.energy.mer).toBeLessThanOrEqual(0.05);
      expect(day.totals.caPRatio).toBeGreaterThanOrEqual(1);
      expect(day.totals.caPRatio).toBeLessThanOrEqual(2);
    }
  });

  test('reports the missing organ meat and nothing else', () => {
    const week = computeWeeklyPlan(pantry, profile, getRatioPreset('balanced'), catalog);
    expect(Object.keys(week.report.issues)).toEqual(['MISSING_MICRONUTRIENT_SOURCE:organ']);
    expect(week.report.highestSeverity).toBe('info');
  });

  test('carries caution notes for flagged ingredients', () => {
    const week = computeWeeklyPlan(pantry, profile, getRatioPreset('balanced'), catalog);
    const noted = [...new Set(week.days[0].notes.map((n) => n.ingredientId))];
    expect(noted).toEqual(['olive-oil', 'sweet-potato']);
  });

  test('identical inputs give identical grams', () => {
    const first = computeWeeklyPlan(pantry, profile, getRatioPreset('balanced'), catalog);
    const second = computeWeeklyPlan(pantry, profile, getRatioPreset('balanced'), catalog);
    expect(second.days.map((d) => gramsOf(d.portions))).toEqual(first.days.map((d) => gramsOf(d.portions)));
  });

  test('rejects a mis-summed custom ratio before balancing', () => {
    const ninety: RatioSpec = { ...getRatioPreset('balanced'), kind: 'custom', key: 'custom', carbPct: 15 };
    expect(() => computeWeeklyPlan(pantry, profile, ninety, catalog)).toThrow(RatioSpecError);
  });

  test('rejects unknown pantry ids', () => {
    expect(() => computeWeeklyPlan([...pantry, 'chocolate'], profile, getRatioPreset('balanced'), catalog)).toThrow(
      IngredientNotFoundError
    );
  });
});

test.describe('validateSubmittedPlan', () => {
  test('flags a hand-edited day that doubled the meat', () => {
    const { report, plan } = validateSubmittedPlan(
      {
        profile,
        ratio: getRatioPreset('balanced'),
        days: [
          [
            { ingredientId: 'turkey-lean', grams: 405.2 },
            { ingredientId: 'olive-oil', grams: 17.9 },
            { ingredientId: 'sweet-potato', grams: 136.4 },
            { ingredientId: 'carrot', grams: 144 },
            { ingredientId: 'eggshell-powder', grams: 2 },
          ],
        ],
      },
      catalog
    );

    expect(plan.energy.mer).toBeCloseTo(estimateEnergy(profile).mer, 10);
    expect(plan.days[0].portions[0].role).toBe('protein');
    expect(report.issues['ENERGY_OFF_TARGET:day-1'].severity).toBe('critical');
    expect(report.issues['MACRO_OFF_TARGET:day-1'].severity).toBe('warning');
    expect(report.highestSeverity).toBe('critical');
  });

  test('flags liver for a dog with kidney disease', () => {
    const { report } = validateSubmittedPlan(
      {
        profile: { ...profile, healthFlags: ['kidney'] },
        ratio: getRatioPreset('balanced'),
        days: [
          [
            { ingredientId: 'turkey-lean', grams: 190 },
            { ingredientId: 'beef-liver', grams: 10 },
            { ingredientId: 'white-rice', grams: 100 },
          ],
        ],
      },
      catalog
    );

    expect(report.issues['HEALTH_FLAG_CONFLICT:beef-liver']).toEqual({
      code: 'HEALTH_FLAG_CONFLICT',
      severity: 'warning',
      subject: 'beef-liver',
      message: "Beef liver (cooked) conflicts with the dog's health flags (kidney/high_phosphorus).",
    });
    expect(report.issues['HEALTH_FLAG_CONFLICT:turkey-lean']).toBeUndefined();
    expect(report.issues['MISSING_MICRONUTRIENT_SOURCE:organ']).toBeUndefined();
  });
});

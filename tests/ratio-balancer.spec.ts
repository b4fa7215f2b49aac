// tests/ratio-balancer.spec.ts
import { test, expect } from '@playwright/test';
import { BalanceError, InsufficientCandidatesError } from '../src/domain/errors';
import { computeTotals } from '../src/services/nutrientMath';
import { balance, groupByRole } from '../src/services/ratioBalancer';
import { createCustomRatioSpec } from '../src/services/ratioSpecs';
import { solveLinearSystem } from '../src/utils/linearAlgebra';
import {
  carbC,
  eggshell,
  energyTarget,
  fatF,
  gramsOf,
  halfProteinSpec,
  makeIngredient,
  proteinA,
  proteinDense,
  testSettings,
  vegCalcium,
  vegPlain,
} from './fixtures';

const target = energyTarget(1000);

test.describe('solveLinearSystem', () => {
  test('solves a system that needs a row swap', () => {
    const x = solveLinearSystem(
      [
        [0, 2],
        [1, 1],
      ],
      [4, 3]
    );
    expect(x).toEqual([1, 2]);
  });

  test('returns null for a singular matrix', () => {
    expect(
      solveLinearSystem(
        [
          [1, 2],
          [2, 4],
        ],
        [1, 2]
      )
    ).toBeNull();
  });
});

test.describe('groupByRole', () => {
  test('orders candidates by closeness to 1 kcal per gram, then id', () => {
    const pools = groupByRole([proteinA, proteinDense, fatF, carbC, vegCalcium, vegPlain, eggshell]);
    expect(pools.protein.map((i) => i.id)).toEqual(['protein-dense', 'protein-a']);
    expect(pools.vegetable.map((i) => i.id)).toEqual(['veg-a-plain', 'veg-b-calcium']);
    expect(pools.calcium.map((i) => i.id)).toEqual(['eggshell']);
  });

  test('leaves out protein-category items that are mostly fat', () => {
    const porkBelly = makeIngredient('pork-belly', 'protein', { kcal: 330, protein: 15, fat: 30 });
    expect(groupByRole([porkBelly]).protein).toEqual([]);
  });
});

test.describe('balance', () => {
  test('hits energy, macro shares and Ca:P with a calcium-bearing vegetable', () => {
    const portions = balance(target, halfProteinSpec, [proteinA, fatF, carbC, vegCalcium], { settings: testSettings });

    expect(gramsOf(portions)).toEqual([
      ['protein-a', 714.3],
      ['fat-f', 29.4],
      ['carb-c', 214.3],
      ['veg-b-calcium', 285.7],
    ]);
    expect(portions.map((p) => p.role)).toEqual(['protein', 'fat', 'carb', 'vegetable']);

    const totals = computeTotals(portions);
    expect(totals.kcal).toBeCloseTo(999.915, 6);
    expect(totals.proteinPct).toBeCloseTo(50, 1);
    expect(totals.fatPct).toBeCloseTo(25, 1);
    expect(totals.carbPct).toBeCloseTo(25, 1);
    expect(totals.caPRatio).toBeCloseTo(1.4999, 3);
  });

  test('adds a calcium supplement when Ca:P is too low', () => {
    const portions = balance(target, halfProteinSpec, [proteinA, fatF, carbC, vegPlain, eggshell], {
      settings: testSettings,
    });

    expect(gramsOf(portions)).toEqual([
      ['protein-a', 714.3],
      ['fat-f', 29.4],
      ['carb-c', 214.3],
      ['veg-a-plain', 285.7],
      ['eggshell', 2.9],
    ]);
    expect(portions[4].role).toBe('calcium');
    expect(computeTotals(portions).caPRatio).toBeCloseTo(1.5428, 3);
  });

  test('prefers the candidate closest to 1 kcal per gram', () => {
    const portions = balance(target, halfProteinSpec, [proteinA, proteinDense, fatF, carbC, vegCalcium], {
      settings: testSettings,
    });
    expect(gramsOf(portions)[0]).toEqual(['protein-dense', 476.2]);
  });

  test('fails on calcium when nothing can lift Ca:P', () => {
    let caught: unknown;
    try {
      balance(target, halfProteinSpec, [proteinA, fatF, carbC, vegPlain], { settings: testSettings });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BalanceError);
    expect(caught instanceof BalanceError && caught.constraint).toBe('calcium_phosphorus');
  });

  test('fails on macro distribution when the solution needs negative fat', () => {
    const marbled = makeIngredient('protein-marbled', 'protein', { kcal: 197.5, protein: 20, fat: 15 });
    const lean = createCustomRatioSpec({ proteinPct: 60, fatPct: 10, carbPct: 30 }, testSettings);

    expect(() => balance(target, lean, [marbled, fatF, carbC], { settings: testSettings })).toThrow(
      /macro distribution/
    );
  });

  test('raises InsufficientCandidatesError when the protein role is empty', () => {
    const porkBelly = makeIngredient('pork-belly', 'protein', { kcal: 330, protein: 15, fat: 30 });
    let caught: unknown;
    try {
      balance(target, halfProteinSpec, [porkBelly, fatF, carbC], { settings: testSettings });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InsufficientCandidatesError);
    expect(caught instanceof InsufficientCandidatesError && caught.role).toBe('protein');
  });

  test('skips avoided combinations while another one balances', () => {
    const candidates = [proteinA, fatF, carbC, vegPlain, vegCalcium, eggshell];
    const first = balance(target, halfProteinSpec, candidates, { settings: testSettings });
    expect(first.map((p) => p.ingredient.id)).toContain('veg-a-plain');

    const second = balance(target, halfProteinSpec, candidates, {
      settings: testSettings,
      avoidSignatures: ['carb-c+eggshell+fat-f+protein-a+veg-a-plain'],
    });
    expect(second.map((p) => p.ingredient.id)).toEqual(['protein-a', 'fat-f', 'carb-c', 'veg-b-calcium']);
  });

  test('falls back to an avoided combination when it is the only one left', () => {
    const portions = balance(target, halfProteinSpec, [proteinA, fatF, carbC, vegPlain, vegCalcium, eggshell], {
      settings: testSettings,
      avoidSignatures: [
        'carb-c+eggshell+fat-f+protein-a+veg-a-plain',
        'carb-c+fat-f+protein-a+veg-b-calcium',
      ],
    });
    expect(portions.map((p) => p.ingredient.id)).toEqual(['protein-a', 'fat-f', 'carb-c', 'veg-a-plain', 'eggshell']);
  });

  test('is deterministic for identical inputs', () => {
    const run = () => gramsOf(balance(target, halfProteinSpec, [proteinA, fatF, carbC, vegCalcium], { settings: testSettings }));
    expect(run()).toEqual(run());
  });
});

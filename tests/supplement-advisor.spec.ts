// tests/supplement-advisor.spec.ts
import { test, expect } from '@playwright/test';
import { ZodError } from 'zod';
import { FOCUS_SUPPLEMENTS, SUPPLEMENTS } from '../src/data/supplements';
import { SupplementQuerySchema } from '../src/schema';
import { suggestSupplements } from '../src/services/mealPlanner';
import { listSupplements } from '../src/services/supplementAdvisor';

const ids = (list: readonly { id: string }[]) => list.map((s) => s.id);

test.describe('Supplement advisor', () => {
  test('suggests in focus order without duplicates', () => {
    expect(ids(suggestSupplements(['skin_coat', 'joint_mobility']))).toEqual([
      'omega-3',
      'vitamin-e',
      'zinc',
      'joint-support',
    ]);
    expect(ids(suggestSupplements(['senior_vitality', 'gut']))).toEqual([
      'omega-3',
      'joint-support',
      'probiotics',
      'prebiotic-fiber',
    ]);
  });

  test('suggests nothing without a focus', () => {
    expect(suggestSupplements([])).toEqual([]);
  });

  test('every focus points at guide entries', () => {
    const known = new Set(ids(SUPPLEMENTS));
    for (const entries of Object.values(FOCUS_SUPPLEMENTS)) {
      expect(entries.every((id) => known.has(id))).toBe(true);
    }
  });

  test('listSupplements hands out a copy of the guide', () => {
    const guide = listSupplements();
    expect(guide).toHaveLength(11);
    guide.pop();
    expect(listSupplements()).toHaveLength(11);
  });
});

test.describe('SupplementQuerySchema', () => {
  test('accepts comma separated and repeated focus values', () => {
    expect(SupplementQuerySchema.parse({ focus: 'gut, dental' })).toEqual({ focus: ['gut', 'dental'] });
    expect(SupplementQuerySchema.parse({ focus: ['gut', 'urinary'] })).toEqual({ focus: ['gut', 'urinary'] });
    expect(SupplementQuerySchema.parse({})).toEqual({ focus: [] });
  });

  test('rejects an unknown focus', () => {
    expect(() => SupplementQuerySchema.parse({ focus: 'gut,cake' })).toThrow(ZodError);
  });
});

// src/services/supplementAdvisor.ts
// Focus areas -> conservative supplement reading list. Educational only; no doses.

import { FOCUS_SUPPLEMENTS, SUPPLEMENTS, type SupplementDefinition, type SupplementFocus } from "../data/supplements";

export const SUPPLEMENT_DISCLAIMER =
  "For dosing and long-term use, confirm with a veterinarian, especially if the dog has a medical condition or takes medication.";

const BY_ID = new Map(SUPPLEMENTS.map((supplement) => [supplement.id, supplement] as const));

export function listSupplements(): SupplementDefinition[] {
  return [...SUPPLEMENTS];
}

/**
 * Supplements worth reading about for the chosen focus areas, in focus order
 * and without duplicates. No focus, no suggestions.
 */
export function suggestSupplements(focus: readonly SupplementFocus[]): SupplementDefinition[] {
  const seen = new Set<string>();
  const suggestions: SupplementDefinition[] = [];

  for (const area of focus) {
    for (const id of FOCUS_SUPPLEMENTS[area]) {
      const supplement = BY_ID.get(id);
      if (!supplement || seen.has(id)) continue;
      seen.add(id);
      suggestions.push(supplement);
    }
  }
  return suggestions;
}

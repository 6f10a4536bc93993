import type { ExperimentResult, Formulation } from './types.js';

export const MAX_PERFORMANCE_SCORE = 10;

// Solubility at which the score saturates, in g/L
export const SATURATION_SOLUBILITY = 100;

const TO_GRAMS_PER_LITRE: Record<string, number> = {
  'g/l': 1,
  'mg/ml': 1,
  'mg/l': 0.001,
  'g/ml': 1000,
};

/**
 * Solubility in g/L. Unknown units are taken as g/L.
 */
export function solubilityInGramsPerLitre(value: number, unit: string): number {
  const factor = TO_GRAMS_PER_LITRE[unit.trim().toLowerCase()] ?? 1;
  return value * factor;
}

/**
 * Score in [0, 10]: 0 when no liquid formed, otherwise 1 plus 9 points per
 * 100 g/L of solubility, capped at 10.
 */
export function performanceScore(result: Pick<ExperimentResult, 'isLiquidFormed' | 'solubility' | 'solubilityUnit'>): number {
  if (!result.isLiquidFormed) return 0;

  const grams = result.solubility === null
    ? 0
    : Math.max(0, solubilityInGramsPerLitre(result.solubility, result.solubilityUnit));

  return Math.min(MAX_PERFORMANCE_SCORE, 1 + (9 * grams) / SATURATION_SOLUBILITY);
}

/**
 * One-line human-readable form of a formulation, e.g. "ChCl + Urea (1:2)"
 */
export function formulationSummary(formulation: Formulation): string {
  const ratio = formulation.molar_ratio ? ` (${formulation.molar_ratio})` : '';

  if (formulation.HBA || formulation.HBD) {
    const parts = [formulation.HBA, formulation.HBD].filter((p): p is string => Boolean(p));
    return `${parts.join(' + ')}${ratio}`;
  }

  if (formulation.components && formulation.components.length > 0) {
    return `${formulation.components.map((c) => c.name).join(' + ')}${ratio}`;
  }

  return 'Unknown formulation';
}

import { describe, it, expect } from 'vitest';
import {
  formulationSummary,
  performanceScore,
  solubilityInGramsPerLitre,
} from '../../src/recommendations/performance.js';

describe('solubilityInGramsPerLitre', () => {
  it('converts the known units, case-insensitively', () => {
    expect(solubilityInGramsPerLitre(5, 'g/L')).toBe(5);
    expect(solubilityInGramsPerLitre(5, 'mg/mL')).toBe(5);
    expect(solubilityInGramsPerLitre(5000, 'MG/L')).toBeCloseTo(5, 10);
    expect(solubilityInGramsPerLitre(0.05, 'g/mL')).toBeCloseTo(50, 10);
  });

  it('takes unknown units as g/L', () => {
    expect(solubilityInGramsPerLitre(7, 'wt%')).toBe(7);
  });
});

describe('performanceScore', () => {
  it('is 0 when no liquid formed', () => {
    expect(performanceScore({ isLiquidFormed: false, solubility: null, solubilityUnit: 'g/L' })).toBe(0);
  });

  it('is 1 for a liquid with no measured solubility', () => {
    expect(performanceScore({ isLiquidFormed: true, solubility: null, solubilityUnit: 'g/L' })).toBe(1);
    expect(performanceScore({ isLiquidFormed: true, solubility: 0, solubilityUnit: 'g/L' })).toBe(1);
  });

  it('grows 9 points per 100 g/L', () => {
    expect(performanceScore({ isLiquidFormed: true, solubility: 6.5, solubilityUnit: 'g/L' })).toBeCloseTo(1.585, 10);
    expect(performanceScore({ isLiquidFormed: true, solubility: 50, solubilityUnit: 'g/L' })).toBeCloseTo(5.5, 10);
  });

  it('caps at 10', () => {
    expect(performanceScore({ isLiquidFormed: true, solubility: 100, solubilityUnit: 'g/L' })).toBe(10);
    expect(performanceScore({ isLiquidFormed: true, solubility: 1, solubilityUnit: 'g/mL' })).toBe(10);
  });

  it('scores the same amount the same in any unit', () => {
    const inGrams = performanceScore({ isLiquidFormed: true, solubility: 20, solubilityUnit: 'g/L' });
    const inMilligrams = performanceScore({ isLiquidFormed: true, solubility: 20000, solubilityUnit: 'mg/L' });
    expect(inMilligrams).toBeCloseTo(inGrams, 10);
  });
});

describe('formulationSummary', () => {
  it('summarizes binary formulations', () => {
    expect(formulationSummary({ HBA: 'Choline chloride', HBD: 'Urea', molar_ratio: '1:2' })).toBe('Choline chloride + Urea (1:2)');
    expect(formulationSummary({ HBA: 'Choline chloride' })).toBe('Choline chloride');
  });

  it('summarizes component lists', () => {
    expect(formulationSummary({
      components: [
        { name: 'ChCl', role: 'HBA' },
        { name: 'Urea', role: 'HBD' },
        { name: 'Water', role: 'modifier' },
      ],
      molar_ratio: '1:2:0.5',
    })).toBe('ChCl + Urea + Water (1:2:0.5)');
  });

  it('falls back for anything else', () => {
    expect(formulationSummary({})).toBe('Unknown formulation');
    expect(formulationSummary({ components: [] })).toBe('Unknown formulation');
  });
});

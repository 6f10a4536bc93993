import { describe, it, expect } from 'vitest';
import { computeStatistics, performanceTrend } from '../../src/statistics/index.js';
import { ValidationError } from '../../src/errors.js';
import type { IndexListing } from '../../src/recommendations/types.js';

function entry(id: string, overrides: Partial<IndexListing>): IndexListing {
  return {
    id,
    status: 'PENDING',
    targetMaterial: 'Cellulose',
    formulationSummary: 'ChCl + Urea (1:2)',
    confidence: 0.5,
    performanceScore: null,
    createdAt: '2024-03-15T10:00:00.000Z',
    updatedAt: '2024-03-15T10:00:00.000Z',
    ...overrides,
  };
}

describe('computeStatistics', () => {
  it('returns zeros and nulls for an empty index', () => {
    expect(computeStatistics([])).toEqual({
      total: 0,
      byStatus: { PENDING: 0, PROCESSING: 0, COMPLETED: 0, FAILED: 0, CANCELLED: 0 },
      averagePerformanceScore: null,
      liquidFormationRate: null,
      byMaterial: {},
      performanceTrend: [],
      topFormulations: [],
    });
  });

  it('summarises statuses, scores, materials and days', () => {
    const stats = computeStatistics([
      entry('r1', { status: 'COMPLETED', performanceScore: 4 }),
      entry('r2', { status: 'COMPLETED', performanceScore: 0, formulationSummary: 'ChCl + Glycerol (1:2)' }),
      entry('r3', { status: 'COMPLETED', performanceScore: 6 }),
      entry('r4', { status: 'FAILED', targetMaterial: 'Lignin', createdAt: '2024-03-14T23:59:00.000Z' }),
      entry('r5', { status: 'PENDING', targetMaterial: 'Lignin', createdAt: '2024-03-16T08:00:00.000Z' }),
      entry('r6', { status: 'CANCELLED', createdAt: 'not a date' }),
    ]);

    expect(stats.total).toBe(6);
    expect(stats.byStatus).toEqual({ PENDING: 1, PROCESSING: 0, COMPLETED: 3, FAILED: 1, CANCELLED: 1 });
    expect(stats.averagePerformanceScore).toBeCloseTo(10 / 3, 10);
    expect(stats.liquidFormationRate).toBeCloseTo(2 / 3, 10);
    expect(stats.byMaterial).toEqual({ Cellulose: 4, Lignin: 2 });
    expect(stats.performanceTrend).toHaveLength(1);
    expect(stats.performanceTrend[0].date).toBe('2024-03-15');
    expect(stats.performanceTrend[0].experimentCount).toBe(3);
    expect(stats.performanceTrend[0].averagePerformanceScore).toBeCloseTo(10 / 3, 10);
    expect(stats.performanceTrend[0].liquidFormationRate).toBeCloseTo(2 / 3, 10);
    expect(stats.topFormulations).toEqual([
      { formulation: 'ChCl + Urea (1:2)', averageScore: 5, count: 2 },
      { formulation: 'ChCl + Glycerol (1:2)', averageScore: 0, count: 1 },
    ]);
  });

  it('ignores completed entries without a score and labels legacy entries', () => {
    const stats = computeStatistics([
      entry('r1', { status: 'COMPLETED', performanceScore: undefined }),
      entry('r2', { status: 'COMPLETED', performanceScore: 2, formulationSummary: undefined }),
    ]);

    expect(stats.averagePerformanceScore).toBe(2);
    expect(stats.topFormulations).toEqual([{ formulation: 'Unknown formulation', averageScore: 2, count: 1 }]);
  });

  it('breaks score ties by count, then name', () => {
    const stats = computeStatistics([
      entry('r1', { status: 'COMPLETED', performanceScore: 3, formulationSummary: 'B' }),
      entry('r2', { status: 'COMPLETED', performanceScore: 3, formulationSummary: 'A' }),
      entry('r3', { status: 'COMPLETED', performanceScore: 3, formulationSummary: 'C' }),
      entry('r4', { status: 'COMPLETED', performanceScore: 3, formulationSummary: 'C' }),
    ]);

    expect(stats.topFormulations.map((f) => f.formulation)).toEqual(['C', 'A', 'B']);
  });
});

describe('performanceTrend', () => {
  const entries = [
    entry('r1', { status: 'COMPLETED', performanceScore: 4, createdAt: '2024-03-14T23:59:00.000Z' }),
    entry('r2', { status: 'COMPLETED', performanceScore: 0, createdAt: '2024-03-15T01:00:00.000Z' }),
    entry('r3', { status: 'COMPLETED', performanceScore: 6, createdAt: '2024-03-15T12:00:00.000Z' }),
    entry('r4', { status: 'COMPLETED', performanceScore: 8, createdAt: '2024-03-17T09:00:00.000Z' }),
    entry('r5', { status: 'PENDING', createdAt: '2024-03-16T08:00:00.000Z' }),
    entry('r6', { status: 'COMPLETED', performanceScore: null, createdAt: '2024-03-16T08:00:00.000Z' }),
    entry('r7', { status: 'COMPLETED', performanceScore: 5, createdAt: 'not a date' }),
  ];

  it('groups scored completions by UTC creation day', () => {
    expect(performanceTrend(entries)).toEqual([
      { date: '2024-03-14', experimentCount: 1, averagePerformanceScore: 4, liquidFormationRate: 1 },
      { date: '2024-03-15', experimentCount: 2, averagePerformanceScore: 3, liquidFormationRate: 0.5 },
      { date: '2024-03-17', experimentCount: 1, averagePerformanceScore: 8, liquidFormationRate: 1 },
    ]);
  });

  it('keeps only days inside an inclusive range', () => {
    expect(performanceTrend(entries, { from: '2024-03-15', to: '2024-03-16' }).map((p) => p.date)).toEqual(['2024-03-15']);
    expect(performanceTrend(entries, { from: '2024-03-15' }).map((p) => p.date)).toEqual(['2024-03-15', '2024-03-17']);
    expect(performanceTrend(entries, { to: '2024-03-14' }).map((p) => p.date)).toEqual(['2024-03-14']);
  });

  it('applies the range to the trend only', () => {
    const stats = computeStatistics(entries, { from: '2024-03-17' });
    expect(stats.total).toBe(7);
    expect(stats.performanceTrend.map((p) => p.date)).toEqual(['2024-03-17']);
  });

  it('rejects malformed or reversed bounds', () => {
    expect(() => performanceTrend(entries, { from: '15/03/2024' })).toThrow(ValidationError);
    expect(() => performanceTrend(entries, { to: '2024-02-30' })).toThrow('Invalid to date: 2024-02-30 (expected YYYY-MM-DD)');
    expect(() => performanceTrend(entries, { from: '2024-03-16', to: '2024-03-15' })).toThrow(
      'Date range start 2024-03-16 is after its end 2024-03-15'
    );
  });
});

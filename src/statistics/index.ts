import { ValidationError } from '../errors.js';
import type { IndexListing, RecommendationStatus } from '../recommendations/types.js';

/** Scored completions created on one UTC day */
export interface TrendPoint {
  date: string;      // YYYY-MM-DD (UTC)
  experimentCount: number;
  averagePerformanceScore: number;
  liquidFormationRate: number;
}

/** Inclusive bounds on the creation day, each YYYY-MM-DD */
export interface DateRange {
  from?: string;
  to?: string;
}

export interface FormulationScore {
  formulation: string;
  averageScore: number;
  count: number;
}

export interface Statistics {
  total: number;
  byStatus: Record<RecommendationStatus, number>;
  averagePerformanceScore: number | null;   // Over completed entries with a score
  liquidFormationRate: number | null;       // Share of scored completions with score > 0
  byMaterial: Record<string, number>;
  performanceTrend: TrendPoint[];
  topFormulations: FormulationScore[];
}

const TOP_FORMULATIONS = 10;

/**
 * Summary statistics computed from index entries alone (no record reads)
 */
export function computeStatistics(entries: IndexListing[], range: DateRange = {}): Statistics {
  const byStatus: Record<RecommendationStatus, number> = {
    PENDING: 0,
    PROCESSING: 0,
    COMPLETED: 0,
    FAILED: 0,
    CANCELLED: 0,
  };
  const byMaterial: Record<string, number> = {};
  const perFormulation = new Map<string, { sum: number; count: number }>();
  const scores: number[] = [];

  for (const entry of entries) {
    byStatus[entry.status]++;
    byMaterial[entry.targetMaterial] = (byMaterial[entry.targetMaterial] ?? 0) + 1;

    const score = entry.performanceScore;
    if (entry.status === 'COMPLETED' && typeof score === 'number') {
      scores.push(score);

      const key = entry.formulationSummary ?? 'Unknown formulation';
      const acc = perFormulation.get(key) ?? { sum: 0, count: 0 };
      acc.sum += score;
      acc.count++;
      perFormulation.set(key, acc);
    }
  }

  const averagePerformanceScore = scores.length > 0
    ? scores.reduce((sum, s) => sum + s, 0) / scores.length
    : null;
  const liquidFormationRate = scores.length > 0
    ? scores.filter((s) => s > 0).length / scores.length
    : null;

  const trend = performanceTrend(entries, range);

  const topFormulations = [...perFormulation]
    .map(([formulation, { sum, count }]) => ({ formulation, averageScore: sum / count, count }))
    .sort((a, b) => b.averageScore - a.averageScore || b.count - a.count || a.formulation.localeCompare(b.formulation))
    .slice(0, TOP_FORMULATIONS);

  return {
    total: entries.length,
    byStatus,
    averagePerformanceScore,
    liquidFormationRate,
    byMaterial,
    performanceTrend: trend,
    topFormulations,
  };
}

/**
 * Per-day average score, experiment count and liquid formation rate over
 * scored completions, oldest day first. Days with no completions are omitted.
 */
export function performanceTrend(entries: IndexListing[], range: DateRange = {}): TrendPoint[] {
  const from = range.from === undefined ? undefined : parseDay(range.from, 'from');
  const to = range.to === undefined ? undefined : parseDay(range.to, 'to');
  if (from !== undefined && to !== undefined && from > to) {
    throw new ValidationError(`Date range start ${from} is after its end ${to}`);
  }

  const perDay = new Map<string, number[]>();
  for (const entry of entries) {
    const score = entry.performanceScore;
    if (entry.status !== 'COMPLETED' || typeof score !== 'number') continue;

    const day = dayOf(entry.createdAt);
    if (!day) continue;
    if ((from !== undefined && day < from) || (to !== undefined && day > to)) continue;

    const scores = perDay.get(day) ?? [];
    scores.push(score);
    perDay.set(day, scores);
  }

  return [...perDay]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, scores]) => ({
      date,
      experimentCount: scores.length,
      averagePerformanceScore: scores.reduce((sum, s) => sum + s, 0) / scores.length,
      liquidFormationRate: scores.filter((s) => s > 0).length / scores.length,
    }));
}

function parseDay(value: string, label: string): string {
  const day = /^\d{4}-\d{2}-\d{2}$/.test(value) ? dayOf(`${value}T00:00:00Z`) : null;
  if (day !== value) {
    throw new ValidationError(`Invalid ${label} date: ${value} (expected YYYY-MM-DD)`);
  }
  return value;
}

function dayOf(timestamp: string): string | null {
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return null;
  return new Date(time).toISOString().slice(0, 10);
}

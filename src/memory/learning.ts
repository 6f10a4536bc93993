import { z } from 'zod';
import type { MemoryExtractor } from './extractor.js';
import { disambiguateFallback } from './extractor.js';
import type { MemoryStore } from './store.js';
import type { ConsolidationReport, Trajectory } from './types.js';
import { ValidationError } from '../errors.js';

export const TrajectorySchema = z.object({
  taskId: z.string().min(1),
  query: z.string().min(1),
  steps: z.array(z.object({
    action: z.string(),
    reasoning: z.string().optional(),
    tool: z.string().optional(),
    observation: z.string().optional(),
  })).default([]),
  finalAnswer: z.string().optional(),
});

export interface LearningDeps {
  extractor: MemoryExtractor;
  store: MemoryStore;
}

/**
 * Learn from a finished agent run: extract memories in success or failure
 * mode and fold them into the store under the trajectory's task id.
 * Learning twice from the same task replaces what was learned before.
 */
export async function learnFromTrajectory(
  deps: LearningDeps,
  trajectory: Trajectory,
  outcome: 'success' | 'failure',
  options: { signal?: AbortSignal } = {}
): Promise<ConsolidationReport> {
  if (!trajectory.taskId.trim()) {
    throw new ValidationError('Trajectory taskId must not be empty');
  }
  if (!trajectory.query.trim()) {
    throw new ValidationError('Trajectory query must not be empty');
  }

  const extraction = await deps.extractor.extract({ mode: outcome, trajectory }, options);

  return deps.store.consolidate(disambiguateFallback(extraction.candidates, trajectory.taskId), {
    sourceTaskId: trajectory.taskId,
    replaceBySource: true,
  });
}

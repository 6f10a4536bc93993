import type { MemoryExtractor } from '../memory/extractor.js';
import { disambiguateFallback } from '../memory/extractor.js';
import type { MemoryStore } from '../memory/store.js';
import type { RecommendationStore } from '../recommendations/store.js';
import { performanceScore } from '../recommendations/performance.js';
import type { ExperimentResult, Recommendation } from '../recommendations/types.js';
import { ExtractionFailure, StateConflictError, errorMessage } from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { ProcessingResult } from './types.js';

export interface FeedbackProcessorDeps {
  recommendations: RecommendationStore;
  memories: MemoryStore;
  extractor: MemoryExtractor;
  logger?: Logger;
  extractionTimeoutMs?: number | null;
}

/**
 * A recommendation held by the processor for one feedback run
 */
export interface FeedbackClaim {
  recommendation: Recommendation;
  isUpdate: boolean;
}

export type ProcessingOutcome =
  | { ok: true; result: ProcessingResult }
  | { ok: false; error: string; isUpdate: boolean };

/**
 * Drives one recommendation from an experiment result to COMPLETED (or
 * FAILED): extraction, memory consolidation and the final record update.
 */
export class FeedbackProcessor {
  private readonly inFlight = new Set<string>();
  private readonly logger: Logger;
  private readonly timeoutMs: number | null;

  constructor(private deps: FeedbackProcessorDeps) {
    this.logger = (deps.logger ?? silentLogger).child('feedback');
    this.timeoutMs = deps.extractionTimeoutMs ?? null;
  }

  isInFlight(id: string): boolean {
    return this.inFlight.has(id);
  }

  /**
   * Take a recommendation for processing. PENDING moves to PROCESSING;
   * COMPLETED is held in place as an update. Everything else conflicts.
   */
  async claim(id: string): Promise<FeedbackClaim> {
    if (this.inFlight.has(id)) {
      throw new StateConflictError(`Feedback for recommendation ${id} is already being processed`, 'in_flight');
    }
    this.inFlight.add(id);

    try {
      const current = await this.deps.recommendations.get(id);

      switch (current.status) {
        case 'COMPLETED':
          this.logger.warn('Recommendation already has feedback; updating it', { id });
          return { recommendation: current, isUpdate: true };

        case 'PENDING': {
          const claimed = await this.deps.recommendations.transition(id, ['PENDING'], 'PROCESSING');
          return { recommendation: claimed, isUpdate: false };
        }

        case 'PROCESSING':
          throw new StateConflictError(`Feedback for recommendation ${id} is already being processed`, 'in_flight');

        case 'FAILED':
        case 'CANCELLED':
          throw new StateConflictError(
            `Cannot submit feedback for ${current.status.toLowerCase()} recommendation ${id}`,
            'terminal_state'
          );
      }
    } catch (error) {
      this.inFlight.delete(id);
      throw error;
    }
  }

  /**
   * Run extraction and consolidation for a claimed recommendation. Failures
   * are returned, never thrown; a first submission is then marked FAILED,
   * an update leaves the previous COMPLETED state alone.
   */
  async process(claim: FeedbackClaim, result: ExperimentResult): Promise<ProcessingOutcome> {
    const { recommendation, isUpdate } = claim;
    const id = recommendation.id;
    const score = performanceScore(result);

    try {
      const extraction = await this.withTimeout((signal) =>
        this.deps.extractor.extract(
          { mode: 'experiment', recommendation, result, performanceScore: score },
          { signal }
        )
      );

      const report = await this.deps.memories.consolidate(
        disambiguateFallback(extraction.candidates, id),
        { sourceTaskId: id, replaceBySource: isUpdate }
      );

      await this.deps.recommendations.complete(id, result, score);

      this.logger.info('Feedback processed', {
        id,
        score: Number(score.toFixed(2)),
        memories: report.titles.length,
        update: isUpdate,
      });

      return {
        ok: true,
        result: {
          performanceScore: score,
          memoriesExtracted: report.titles,
          numMemories: report.titles.length,
          isUpdate,
          deletedMemories: report.deleted,
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Feedback processing failed', { id, error: message });

      if (!isUpdate) {
        await this.markFailed(id, message);
      }
      return { ok: false, error: message, isUpdate };
    } finally {
      this.inFlight.delete(id);
    }
  }

  private async markFailed(id: string, message: string): Promise<void> {
    try {
      await this.deps.recommendations.fail(id, message);
    } catch (error) {
      this.logger.error('Could not mark recommendation as failed', { id, error: errorMessage(error) });
    }
  }

  private async withTimeout<T>(fn: (signal: AbortSignal | undefined) => Promise<T>): Promise<T> {
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === null) return fn(undefined);

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ExtractionFailure(`Memory extraction timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}

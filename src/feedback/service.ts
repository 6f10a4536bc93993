import type { FeedbackProcessor } from './processor.js';
import type { WorkerPool } from './pool.js';
import { validateExperimentResult } from './validation.js';
import type {
  ExperimentResultInput,
  FeedbackAccepted,
  FeedbackOutcome,
  ProcessingStatus,
  SubmitOptions,
} from './types.js';
import { errorMessage } from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export interface FeedbackServiceDeps {
  processor: FeedbackProcessor;
  pool: WorkerPool;
  logger?: Logger;
  solubilityWarnCeiling?: number;
  clock?: () => Date;
}

/**
 * Accepts experiment results and schedules their processing on the worker
 * pool. Validation, lookup and the claim happen before the call returns;
 * extraction and consolidation run on a worker.
 */
export class FeedbackService {
  private readonly statuses = new Map<string, ProcessingStatus>();
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private deps: FeedbackServiceDeps) {
    this.logger = (deps.logger ?? silentLogger).child('feedback');
    this.clock = deps.clock ?? (() => new Date());
  }

  submitFeedback(id: string, input: ExperimentResultInput, options?: { async?: true }): Promise<FeedbackAccepted>;
  submitFeedback(id: string, input: ExperimentResultInput, options: { async: false }): Promise<FeedbackOutcome>;
  submitFeedback(id: string, input: ExperimentResultInput, options: SubmitOptions): Promise<FeedbackAccepted | FeedbackOutcome>;
  async submitFeedback(
    id: string,
    input: ExperimentResultInput,
    options: SubmitOptions = {}
  ): Promise<FeedbackAccepted | FeedbackOutcome> {
    const { result, warnings } = validateExperimentResult(input, {
      warnCeiling: this.deps.solubilityWarnCeiling,
      now: this.clock,
    });
    for (const warning of warnings) {
      this.logger.warn(warning, { id });
    }

    const claim = await this.deps.processor.claim(id);
    const startedAt = this.clock().toISOString();
    this.statuses.set(id, { status: 'processing', startedAt });
    this.logger.info('Feedback accepted', {
      id,
      liquid: result.isLiquidFormed,
      solubility: result.solubility,
      unit: result.solubilityUnit,
    });

    const job = this.deps.pool.submit(`feedback:${id}`, async (): Promise<FeedbackOutcome> => {
      const outcome = await this.deps.processor.process(claim, result);

      if (outcome.ok) {
        this.statuses.set(id, {
          status: 'completed',
          startedAt,
          completedAt: this.clock().toISOString(),
          result: outcome.result,
        });
        return { status: 'completed', recommendationId: id, ...outcome.result, warnings };
      }

      this.statuses.set(id, {
        status: 'failed',
        startedAt,
        failedAt: this.clock().toISOString(),
        error: outcome.error,
      });
      return { status: 'failed', recommendationId: id, isUpdate: outcome.isUpdate, error: outcome.error };
    });

    if (options.async === false) {
      return job;
    }

    job.catch((error: unknown) => {
      this.logger.error('Background feedback job crashed', { id, error: errorMessage(error) });
    });
    return { status: 'accepted', recommendationId: id, isUpdate: claim.isUpdate };
  }

  /**
   * Processing state of the last submission for `id` in this process
   */
  checkStatus(id: string): ProcessingStatus | null {
    const status = this.statuses.get(id);
    return status ? { ...status } : null;
  }

  get activeJobs(): number {
    return this.deps.pool.activeCount + this.deps.pool.queuedCount;
  }

  /**
   * Wait for queued and running feedback jobs to finish
   */
  async close(): Promise<void> {
    await this.deps.pool.onIdle();
  }
}

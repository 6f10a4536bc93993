import { z } from 'zod';
import type { ExperimentResult } from '../recommendations/types.js';
import { ValidationError } from '../errors.js';
import type { ExperimentResultInput } from './types.js';

export const DEFAULT_SOLUBILITY_WARN_CEILING = 1000;

export const ExperimentResultInputSchema = z.object({
  isLiquidFormed: z.boolean(),
  solubility: z.number().finite().nullable().optional(),
  solubilityUnit: z.string().trim().min(1).optional(),
  properties: z.record(z.unknown()).optional(),
  experimenter: z.string().optional(),
  experimentDate: z.string().optional(),
  notes: z.string().optional(),
});

// Wire form used by the MCP surface
export const FeedbackRequestSchema = z.object({
  recommendation_id: z.string().min(1),
  experiment_result: z.object({
    is_liquid_formed: z.boolean(),
    solubility: z.number().finite().nullable().optional(),
    solubility_unit: z.string().trim().min(1).optional(),
    properties: z.record(z.unknown()).optional(),
    experimenter: z.string().optional(),
    experiment_date: z.string().optional(),
    notes: z.string().optional(),
  }),
});

export type FeedbackRequest = z.infer<typeof FeedbackRequestSchema>;

export function fromFeedbackRequest(request: FeedbackRequest): { recommendationId: string; experimentResult: ExperimentResultInput } {
  const r = request.experiment_result;
  return {
    recommendationId: request.recommendation_id,
    experimentResult: {
      isLiquidFormed: r.is_liquid_formed,
      solubility: r.solubility,
      solubilityUnit: r.solubility_unit,
      properties: r.properties,
      experimenter: r.experimenter,
      experimentDate: r.experiment_date,
      notes: r.notes,
    },
  };
}

export interface ValidatedResult {
  result: ExperimentResult;
  warnings: string[];
}

/**
 * Check an experiment result and normalise it.
 *
 * - a formed liquid needs a solubility
 * - solubility is never negative
 * - solubility reported for a non-liquid is dropped, with a warning
 * - solubility above `warnCeiling` is kept, with a warning
 */
export function validateExperimentResult(
  input: unknown,
  options: { warnCeiling?: number; now?: () => Date } = {}
): ValidatedResult {
  const parsed = ExperimentResultInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ValidationError(`Invalid experiment result: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  const warnCeiling = options.warnCeiling ?? DEFAULT_SOLUBILITY_WARN_CEILING;
  const unit = data.solubilityUnit ?? 'g/L';
  const warnings: string[] = [];
  let solubility = data.solubility ?? null;

  if (solubility !== null && solubility < 0) {
    throw new ValidationError('Solubility cannot be negative');
  }

  if (data.isLiquidFormed && solubility === null) {
    throw new ValidationError('Solubility is required when isLiquidFormed is true');
  }

  if (!data.isLiquidFormed && solubility !== null && solubility > 0) {
    warnings.push('Solubility provided but no liquid formed; solubility set to null');
    solubility = null;
  }

  if (solubility !== null && solubility > warnCeiling) {
    warnings.push(`Very high solubility value: ${solubility} ${unit}. Please verify this is correct.`);
  }

  return {
    result: {
      isLiquidFormed: data.isLiquidFormed,
      solubility,
      solubilityUnit: unit,
      properties: data.properties ?? {},
      experimenter: data.experimenter,
      experimentDate: data.experimentDate ?? (options.now ?? (() => new Date()))().toISOString(),
      notes: data.notes,
    },
    warnings,
  };
}

import { z } from 'zod';
import { TimestampSchema } from '../storage/index.js';
import { RECOMMENDATION_STATUSES } from './types.js';
import type {
  ExperimentResult,
  IndexEntry,
  Recommendation,
} from './types.js';

// On-disk (snake_case) shapes of recommendation records and the index

export const StatusSchema = z.enum(RECOMMENDATION_STATUSES);

export const FormulationSchema = z.object({
  HBA: z.string().optional(),
  HBD: z.string().optional(),
  components: z.array(z.object({
    name: z.string(),
    role: z.string(),
    function: z.string().optional(),
  })).optional(),
  molar_ratio: z.string().optional(),
}).passthrough();

const PersistedTaskSchema = z.object({
  description: z.string(),
  target_material: z.string(),
  target_temperature: z.number().nullable().optional(),
  constraints: z.record(z.string()).optional(),
  task_id: z.string().nullable().optional(),
});

const PersistedExperimentSchema = z.object({
  is_liquid_formed: z.boolean(),
  solubility: z.number().nullable().default(null),
  solubility_unit: z.string().default('g/L'),
  properties: z.record(z.unknown()).default({}),
  experimenter: z.string().optional(),
  experiment_date: z.string().optional(),
  notes: z.string().optional(),
});

export const PersistedRecordSchema = z.object({
  recommendation_id: z.string(),
  task: PersistedTaskSchema,
  formulation: FormulationSchema,
  reasoning: z.string().nullable().default(null),
  confidence: z.number(),
  status: StatusSchema,
  experiment_result: PersistedExperimentSchema.nullable().default(null),
  performance_score: z.number().nullable().default(null),
  error: z.string().nullable().default(null),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const PersistedIndexEntrySchema = z.object({
  status: StatusSchema,
  target_material: z.string(),
  formulation_summary: z.string().optional(),
  formulation: FormulationSchema.optional(),
  confidence: z.number().optional(),
  performance_score: z.number().nullable().optional(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
});

export const PersistedIndexSchema = z.record(PersistedIndexEntrySchema);

type PersistedRecord = z.input<typeof PersistedRecordSchema>;
type PersistedIndexEntry = z.infer<typeof PersistedIndexEntrySchema>;

export function recordToJson(rec: Recommendation): PersistedRecord {
  return {
    recommendation_id: rec.id,
    task: {
      description: rec.task.description,
      target_material: rec.task.targetMaterial,
      target_temperature: rec.task.targetTemperature ?? null,
      constraints: rec.task.constraints,
      task_id: rec.task.taskId ?? null,
    },
    formulation: rec.formulation,
    reasoning: rec.reasoning,
    confidence: rec.confidence,
    status: rec.status,
    experiment_result: rec.experimentResult ? experimentToJson(rec.experimentResult) : null,
    performance_score: rec.performanceScore,
    error: rec.error,
    created_at: rec.createdAt.toISOString(),
    updated_at: rec.updatedAt.toISOString(),
  };
}

export function recordFromJson(row: z.infer<typeof PersistedRecordSchema>): Recommendation {
  return {
    id: row.recommendation_id,
    task: {
      description: row.task.description,
      targetMaterial: row.task.target_material,
      targetTemperature: row.task.target_temperature ?? undefined,
      constraints: row.task.constraints,
      taskId: row.task.task_id ?? undefined,
    },
    formulation: row.formulation,
    reasoning: row.reasoning,
    confidence: row.confidence,
    status: row.status,
    experimentResult: row.experiment_result ? experimentFromJson(row.experiment_result) : null,
    performanceScore: row.performance_score,
    error: row.error,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function experimentToJson(result: ExperimentResult): z.input<typeof PersistedExperimentSchema> {
  return {
    is_liquid_formed: result.isLiquidFormed,
    solubility: result.solubility,
    solubility_unit: result.solubilityUnit,
    properties: result.properties,
    experimenter: result.experimenter,
    experiment_date: result.experimentDate,
    notes: result.notes,
  };
}

function experimentFromJson(row: z.infer<typeof PersistedExperimentSchema>): ExperimentResult {
  return {
    isLiquidFormed: row.is_liquid_formed,
    solubility: row.solubility,
    solubilityUnit: row.solubility_unit,
    properties: row.properties,
    experimenter: row.experimenter,
    experimentDate: row.experiment_date,
    notes: row.notes,
  };
}

// Key order here is the key order on disk
export function indexEntryToJson(entry: IndexEntry): PersistedIndexEntry {
  return {
    status: entry.status,
    target_material: entry.targetMaterial,
    formulation_summary: entry.formulationSummary,
    formulation: entry.formulation,
    confidence: entry.confidence,
    performance_score: entry.performanceScore,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  };
}

export function indexEntryFromJson(row: PersistedIndexEntry): IndexEntry {
  return {
    status: row.status,
    targetMaterial: row.target_material,
    formulationSummary: row.formulation_summary,
    formulation: row.formulation,
    confidence: row.confidence,
    performanceScore: row.performance_score,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

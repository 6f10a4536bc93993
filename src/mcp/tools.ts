/**
 * MCP tool catalogue and handlers
 *
 * Inputs and outputs use snake_case. Handlers never throw: failures come back
 * as `isError` results whose text is `<kind>: <message>`.
 */

import { z } from 'zod';
import type { Runtime } from '../runtime.js';
import { FormulationSchema, StatusSchema, indexEntryToJson, recordToJson } from '../recommendations/schema.js';
import type { TaskDescriptor } from '../recommendations/types.js';
import { FeedbackRequestSchema, fromFeedbackRequest } from '../feedback/validation.js';
import type { FeedbackAccepted, FeedbackOutcome, ProcessingStatus } from '../feedback/types.js';
import { computeStatistics } from '../statistics/index.js';
import type { MemoryItem } from '../memory/types.js';
import { MAX_TITLE_LENGTH } from '../memory/store.js';
import { NotFoundError, errorMessage, isFormulationError } from '../errors.js';

const MAX_CONTENT_LENGTH = 4000;
const MAX_QUERY_LENGTH = 500;

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required: string[];
  };
}

// Tool input schemas

const TaskSchema = z.object({
  description: z.string().trim().min(1).max(MAX_CONTENT_LENGTH),
  target_material: z.string().trim().min(1),
  target_temperature: z.number().optional(),
  constraints: z.record(z.string()).optional(),
});

const MemorySearchSchema = z.object({
  query: z.string().trim().min(1).max(MAX_QUERY_LENGTH),
  top_k: z.number().int().min(1).max(50).optional().default(3),
  min_similarity: z.number().min(-1).max(1).optional(),
  is_from_success: z.boolean().optional(),
});

const MemoryListSchema = z.object({
  is_from_success: z.boolean().optional(),
  source_task_id: z.string().optional(),
  limit: z.number().int().min(1).max(200).optional().default(20),
  offset: z.number().int().min(0).optional().default(0),
});

const MemoryAddSchema = z.object({
  title: z.string().trim().min(1).max(MAX_TITLE_LENGTH),
  description: z.string().max(MAX_CONTENT_LENGTH).optional().default(''),
  content: z.string().trim().min(1).max(MAX_CONTENT_LENGTH),
  is_from_success: z.boolean().optional().default(true),
  source_task_id: z.string().optional(),
});

const ContextSchema = z.object({ task: TaskSchema });

const CreateSchema = z.object({
  task: TaskSchema,
  formulation: FormulationSchema,
  confidence: z.number().min(0).max(1),
  reasoning: z.string().max(MAX_CONTENT_LENGTH).optional(),
});

const ListSchema = z.object({
  status: StatusSchema.optional(),
  target_material: z.string().optional(),
  limit: z.number().int().min(1).max(200).optional().default(20),
  offset: z.number().int().min(0).optional().default(0),
});

const IdSchema = z.object({ recommendation_id: z.string().trim().min(1) });

const StatsSchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
});

const SubmitSchema = FeedbackRequestSchema.extend({
  async: z.boolean().optional().default(true),
});

const taskProperties = {
  type: 'object',
  description: 'Formulation task',
  properties: {
    description: { type: 'string', description: 'What the formulation should achieve' },
    target_material: { type: 'string', description: 'Material to dissolve' },
    target_temperature: { type: 'number', description: 'Target temperature in °C' },
    constraints: { type: 'object', description: 'Named constraints (string values)' },
  },
  required: ['description', 'target_material'],
};

export const TOOLS: ToolDefinition[] = [
  {
    name: 'fm_memory_search',
    description: `Find past experience similar to a query.

Returns the top memories by embedding similarity, with their similarity score.`,
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search text' },
        top_k: { type: 'number', description: 'Max results (default 3)' },
        min_similarity: { type: 'number', description: 'Drop results below this similarity' },
        is_from_success: { type: 'boolean', description: 'Only successes (true) or failures (false)' },
      },
      required: ['query'],
    },
  },
  {
    name: 'fm_memory_list',
    description: 'List stored memories, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        is_from_success: { type: 'boolean', description: 'Filter by origin' },
        source_task_id: { type: 'string', description: 'Only memories learned from this task or recommendation' },
        limit: { type: 'number', description: 'Max results (default 20)' },
        offset: { type: 'number', description: 'Skip this many' },
      },
      required: [],
    },
  },
  {
    name: 'fm_memory_add',
    description: 'Store a memory by hand. Titles are unique.',
    inputSchema: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Unique title' },
        description: { type: 'string', description: 'One-sentence summary' },
        content: { type: 'string', description: 'The insight itself' },
        is_from_success: { type: 'boolean', description: 'Learned from a success (default true)' },
        source_task_id: { type: 'string', description: 'Task or recommendation it came from' },
      },
      required: ['title', 'content'],
    },
  },
  {
    name: 'fm_recommendation_context',
    description: `Get the context for designing a formulation.

Call this BEFORE proposing a formulation: it returns similar past outcomes and,
when configured, relevant literature snippets.`,
    inputSchema: {
      type: 'object',
      properties: { task: taskProperties },
      required: ['task'],
    },
  },
  {
    name: 'fm_recommendation_create',
    description: 'Record a proposed formulation as a PENDING recommendation awaiting an experiment.',
    inputSchema: {
      type: 'object',
      properties: {
        task: taskProperties,
        formulation: { type: 'object', description: 'HBA, HBD and molar_ratio, or components and molar_ratio' },
        confidence: { type: 'number', description: 'Confidence between 0 and 1' },
        reasoning: { type: 'string', description: 'Why this formulation' },
      },
      required: ['task', 'formulation', 'confidence'],
    },
  },
  {
    name: 'fm_recommendation_list',
    description: 'List recommendations from the index, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        status: { type: 'string', enum: ['PENDING', 'PROCESSING', 'COMPLETED', 'FAILED', 'CANCELLED'] },
        target_material: { type: 'string', description: 'Case-insensitive material filter' },
        limit: { type: 'number', description: 'Max results (default 20)' },
        offset: { type: 'number', description: 'Skip this many' },
      },
      required: [],
    },
  },
  {
    name: 'fm_recommendation_get',
    description: 'Get the full record of a recommendation.',
    inputSchema: {
      type: 'object',
      properties: { recommendation_id: { type: 'string' } },
      required: ['recommendation_id'],
    },
  },
  {
    name: 'fm_recommendation_cancel',
    description: 'Cancel a PENDING recommendation.',
    inputSchema: {
      type: 'object',
      properties: { recommendation_id: { type: 'string' } },
      required: ['recommendation_id'],
    },
  },
  {
    name: 'fm_feedback_submit',
    description: `Submit the experiment result for a recommendation.

Memories are extracted from the outcome. By default this returns at once with
status "accepted"; poll fm_feedback_status. Pass async=false to wait.
Submitting again for a COMPLETED recommendation updates it and replaces the
memories learned from it.`,
    inputSchema: {
      type: 'object',
      properties: {
        recommendation_id: { type: 'string' },
        experiment_result: {
          type: 'object',
          properties: {
            is_liquid_formed: { type: 'boolean' },
            solubility: { type: 'number', description: 'Required when a liquid formed' },
            solubility_unit: { type: 'string', description: 'g/L (default), mg/mL, mg/L or g/mL' },
            properties: { type: 'object' },
            experimenter: { type: 'string' },
            experiment_date: { type: 'string' },
            notes: { type: 'string' },
          },
          required: ['is_liquid_formed'],
        },
        async: { type: 'boolean', description: 'Return before processing finishes (default true)' },
      },
      required: ['recommendation_id', 'experiment_result'],
    },
  },
  {
    name: 'fm_feedback_status',
    description: 'Processing status of the last feedback submitted for a recommendation in this server.',
    inputSchema: {
      type: 'object',
      properties: { recommendation_id: { type: 'string' } },
      required: ['recommendation_id'],
    },
  },
  {
    name: 'fm_stats',
    description: 'Summary statistics over recommendations and memories, with a per-day performance trend.',
    inputSchema: {
      type: 'object',
      properties: {
        from: { type: 'string', description: 'First creation day of the trend (YYYY-MM-DD, inclusive)' },
        to: { type: 'string', description: 'Last creation day of the trend (YYYY-MM-DD, inclusive)' },
      },
      required: [],
    },
  },
];

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(error: unknown): ToolResult {
  let text: string;
  if (isFormulationError(error)) {
    text = `${error.kind}: ${error.message}`;
  } else if (error instanceof z.ZodError) {
    text = `validation: ${error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ')}`;
  } else {
    text = `error: ${errorMessage(error)}`;
  }
  return { content: [{ type: 'text', text }], isError: true };
}

function toTask(input: z.infer<typeof TaskSchema>): TaskDescriptor {
  return {
    description: input.description,
    targetMaterial: input.target_material,
    targetTemperature: input.target_temperature,
    constraints: input.constraints,
  };
}

function memoryJson(memory: MemoryItem) {
  return {
    title: memory.title,
    description: memory.description,
    content: memory.content,
    is_from_success: memory.isFromSuccess,
    source_task_id: memory.sourceTaskId,
    created_at: memory.createdAt.toISOString(),
    has_embedding: memory.embedding !== null,
  };
}

function submissionJson(outcome: FeedbackAccepted | FeedbackOutcome) {
  switch (outcome.status) {
    case 'accepted':
      return { status: 'accepted', recommendation_id: outcome.recommendationId, is_update: outcome.isUpdate };
    case 'completed':
      return {
        status: 'completed',
        recommendation_id: outcome.recommendationId,
        performance_score: outcome.performanceScore,
        memories_extracted: outcome.memoriesExtracted,
        num_memories: outcome.numMemories,
        is_update: outcome.isUpdate,
        deleted_memories: outcome.deletedMemories,
        warnings: outcome.warnings,
      };
    case 'failed':
      return {
        status: 'failed',
        recommendation_id: outcome.recommendationId,
        is_update: outcome.isUpdate,
        error: outcome.error,
      };
  }
}

function statusJson(status: ProcessingStatus) {
  return {
    status: status.status,
    started_at: status.startedAt,
    completed_at: status.completedAt,
    failed_at: status.failedAt,
    error: status.error,
    result: status.result && {
      performance_score: status.result.performanceScore,
      memories_extracted: status.result.memoriesExtracted,
      num_memories: status.result.numMemories,
      is_update: status.result.isUpdate,
      deleted_memories: status.result.deletedMemories,
    },
  };
}

export type ToolRuntime = Pick<
  Runtime,
  'memories' | 'retriever' | 'recommendations' | 'feedback' | 'contextBuilder'
>;

/**
 * Run one tool call against the project runtime
 */
export async function callTool(runtime: ToolRuntime, name: string, args: unknown = {}): Promise<ToolResult> {
  try {
    switch (name) {
      case 'fm_memory_search': {
        const input = MemorySearchSchema.parse(args);
        const results = await runtime.retriever.retrieve(input.query, {
          topK: input.top_k,
          minSimilarity: input.min_similarity,
          isFromSuccess: input.is_from_success,
        });
        return json(results.map((r) => ({ ...memoryJson(r.memory), similarity: r.similarity })));
      }

      case 'fm_memory_list': {
        const input = MemoryListSchema.parse(args);
        const page = runtime.memories.list({
          isFromSuccess: input.is_from_success,
          sourceTaskId: input.source_task_id,
          limit: input.limit,
          offset: input.offset,
        });
        return json({ total: page.total, memories: page.items.map(memoryJson) });
      }

      case 'fm_memory_add': {
        const input = MemoryAddSchema.parse(args);
        const memory = await runtime.memories.add({
          title: input.title,
          description: input.description,
          content: input.content,
          isFromSuccess: input.is_from_success,
          sourceTaskId: input.source_task_id ?? null,
        }, { computeEmbedding: true });
        return json(memoryJson(memory));
      }

      case 'fm_recommendation_context': {
        const input = ContextSchema.parse(args);
        const context = await runtime.contextBuilder.build(toTask(input.task));
        return json({
          messages: context.messages,
          token_estimate: context.tokenEstimate,
          memories: context.memories.map((r) => ({ title: r.memory.title, similarity: r.similarity })),
          snippets: context.snippets.map((s) => ({ id: s.id, score: s.score })),
        });
      }

      case 'fm_recommendation_create': {
        const input = CreateSchema.parse(args);
        const rec = await runtime.recommendations.create(
          toTask(input.task),
          input.formulation,
          input.confidence,
          { reasoning: input.reasoning }
        );
        return json({ recommendation_id: rec.id, status: rec.status });
      }

      case 'fm_recommendation_list': {
        const input = ListSchema.parse(args);
        const page = runtime.recommendations.list({
          status: input.status,
          targetMaterial: input.target_material,
          limit: input.limit,
          offset: input.offset,
        });
        return json({
          total: page.total,
          recommendations: page.items.map((entry) => ({ id: entry.id, ...indexEntryToJson(entry) })),
        });
      }

      case 'fm_recommendation_get': {
        const input = IdSchema.parse(args);
        return json(recordToJson(await runtime.recommendations.get(input.recommendation_id)));
      }

      case 'fm_recommendation_cancel': {
        const input = IdSchema.parse(args);
        const rec = await runtime.recommendations.cancel(input.recommendation_id);
        return json({ recommendation_id: rec.id, status: rec.status });
      }

      case 'fm_feedback_submit': {
        const input = SubmitSchema.parse(args);
        const { recommendationId, experimentResult } = fromFeedbackRequest(input);
        const outcome = await runtime.feedback.submitFeedback(recommendationId, experimentResult, { async: input.async });
        const result = json(submissionJson(outcome));
        return outcome.status === 'failed' ? { ...result, isError: true } : result;
      }

      case 'fm_feedback_status': {
        const input = IdSchema.parse(args);
        const status = runtime.feedback.checkStatus(input.recommendation_id);
        if (status) {
          return json({ recommendation_id: input.recommendation_id, ...statusJson(status) });
        }
        // Nothing submitted in this process; report the stored state instead
        const entry = runtime.recommendations.entry(input.recommendation_id);
        if (!entry) {
          throw new NotFoundError('recommendation', input.recommendation_id);
        }
        return json({ recommendation_id: input.recommendation_id, status: null, recommendation_status: entry.status });
      }

      case 'fm_stats': {
        const input = StatsSchema.parse(args);
        const stats = computeStatistics(runtime.recommendations.entries(), input);
        return json({
          total: stats.total,
          by_status: stats.byStatus,
          average_performance_score: stats.averagePerformanceScore,
          liquid_formation_rate: stats.liquidFormationRate,
          by_material: stats.byMaterial,
          performance_trend: stats.performanceTrend.map((p) => ({
            date: p.date,
            experiment_count: p.experimentCount,
            average_performance_score: p.averagePerformanceScore,
            liquid_formation_rate: p.liquidFormationRate,
          })),
          top_formulations: stats.topFormulations.map((t) => ({
            formulation: t.formulation,
            average_score: t.averageScore,
            count: t.count,
          })),
          memories: runtime.memories.size,
        });
      }

      default:
        return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
    }
  } catch (error) {
    return failure(error);
  }
}

import { z } from 'zod';
import type { LanguageModel } from '../adapters/types.js';
import { CapabilityError } from '../adapters/types.js';
import type { ExperimentResult, Recommendation } from '../recommendations/types.js';
import { formulationSummary } from '../recommendations/performance.js';
import { ExtractionFailure, errorMessage } from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { MAX_TITLE_LENGTH } from './store.js';
import type { ExtractionMode, NewMemoryItem, Trajectory } from './types.js';

export const FALLBACK_TITLE = 'Unstructured extraction insight';

export type ExtractionContext =
  | { mode: 'success' | 'failure'; trajectory: Trajectory }
  | {
      mode: 'experiment';
      recommendation: Recommendation;
      result: ExperimentResult;
      performanceScore: number;
    };

export interface ExtractionResult {
  candidates: NewMemoryItem[];
  insights: Record<string, unknown>;
  fallback: boolean;
  raw: string;
}

export interface ExtractorOptions {
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

const ExtractedMemorySchema = z.object({
  title: z.string().trim().min(1).max(MAX_TITLE_LENGTH),
  description: z.string().default(''),
  content: z.string().min(1),
});

const ExtractionResponseSchema = z.object({
  memories: z.array(ExtractedMemorySchema).min(1),
}).passthrough();

const SYSTEM_PROMPT =
  'You distill lessons from deep eutectic solvent formulation work into short, reusable memories. ' +
  'Answer with a single JSON object and nothing else.';

/**
 * Turns a trajectory or an experiment outcome into candidate memories by
 * asking the language model for a JSON document.
 */
export class MemoryExtractor {
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly logger: Logger;

  constructor(
    private model: LanguageModel,
    options: ExtractorOptions = {}
  ) {
    this.temperature = options.temperature ?? 1.0;
    this.maxTokens = options.maxTokens ?? 2048;
    this.logger = (options.logger ?? silentLogger).child('extractor');
  }

  async extract(context: ExtractionContext, options: { signal?: AbortSignal } = {}): Promise<ExtractionResult> {
    const prompt = context.mode === 'experiment'
      ? buildExperimentPrompt(context.recommendation, context.result, context.performanceScore)
      : buildTrajectoryPrompt(context.trajectory, context.mode);

    let raw: string;
    try {
      raw = await this.model.generate(prompt, {
        system: SYSTEM_PROMPT,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        signal: options.signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new ExtractionFailure('Memory extraction timed out', { cause: error });
      }
      const kind = error instanceof CapabilityError ? ` (${error.kind})` : '';
      throw new ExtractionFailure(`Language model call failed${kind}: ${errorMessage(error)}`, { cause: error });
    }

    if (!raw.trim()) {
      throw new ExtractionFailure('Language model returned an empty response');
    }

    const parsed = parseExtractionResponse(raw);
    const base = baseMetadata(context);

    if (!parsed) {
      this.logger.warn('Could not parse extraction output; keeping it as one unstructured memory', { mode: context.mode });
      return {
        candidates: [{
          title: FALLBACK_TITLE,
          description: 'Raw model output that could not be parsed as structured memories',
          content: raw.trim(),
          isFromSuccess: isFromSuccess(context),
          sourceTaskId: sourceTaskId(context),
          metadata: { ...base, fallback: true },
        }],
        insights: {},
        fallback: true,
        raw,
      };
    }

    const { memories, ...insights } = parsed;
    const seen = new Set<string>();
    const candidates: NewMemoryItem[] = [];
    for (const memory of memories) {
      if (seen.has(memory.title)) continue;
      seen.add(memory.title);
      candidates.push({
        title: memory.title,
        description: memory.description,
        content: memory.content,
        isFromSuccess: isFromSuccess(context),
        sourceTaskId: sourceTaskId(context),
        metadata: { ...base, ...(Object.keys(insights).length > 0 ? { insights } : {}) },
      });
    }

    this.logger.debug('Extracted memories', { mode: context.mode, count: candidates.length });
    return { candidates, insights, fallback: false, raw };
  }
}

/**
 * Make fallback titles unique per source so they do not overwrite each other
 */
export function disambiguateFallback(candidates: NewMemoryItem[], sourceId: string): NewMemoryItem[] {
  return candidates.map((candidate) =>
    candidate.title === FALLBACK_TITLE
      ? { ...candidate, title: `${FALLBACK_TITLE} (${sourceId})`.slice(0, MAX_TITLE_LENGTH) }
      : candidate
  );
}

/**
 * Pull a `{ memories: [...] }` object out of model output, fenced or bare.
 * Returns null when there is none.
 */
export function parseExtractionResponse(raw: string): z.infer<typeof ExtractionResponseSchema> | null {
  for (const candidate of jsonCandidates(raw)) {
    let value: unknown;
    try {
      value = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = ExtractionResponseSchema.safeParse(value);
    if (result.success) return result.data;
  }
  return null;
}

function jsonCandidates(raw: string): string[] {
  const candidates: string[] = [];

  const fenced = /```(?:json)?\s*([\s\S]*?)```/gi;
  for (const match of raw.matchAll(fenced)) {
    candidates.push(match[1].trim());
  }

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidates.push(raw.slice(start, end + 1));
  }

  return candidates;
}

function isFromSuccess(context: ExtractionContext): boolean {
  return context.mode === 'experiment' ? context.result.isLiquidFormed : context.mode === 'success';
}

function sourceTaskId(context: ExtractionContext): string {
  return context.mode === 'experiment' ? context.recommendation.id : context.trajectory.taskId;
}

function baseMetadata(context: ExtractionContext): Record<string, unknown> {
  const mode: ExtractionMode = context.mode;
  if (context.mode !== 'experiment') {
    return { extraction_mode: mode };
  }
  return {
    extraction_mode: mode,
    performance_score: context.performanceScore,
    target_material: context.recommendation.task.targetMaterial,
  };
}

// ─────────────────────────────────────────────────────────────
// Prompts
// ─────────────────────────────────────────────────────────────

const OUTPUT_FORMAT = `Respond with JSON of this shape:
{
  "memories": [
    { "title": "short unique title", "description": "one sentence summary", "content": "the reusable lesson" }
  ]
}
Any additional top-level fields are kept as insights.`;

function buildTrajectoryPrompt(trajectory: Trajectory, mode: 'success' | 'failure'): string {
  const steps = trajectory.steps.map((step, i) => {
    const lines = [`${i + 1}. ${step.action}`];
    if (step.tool) lines.push(`   tool: ${step.tool}`);
    if (step.reasoning) lines.push(`   reasoning: ${step.reasoning}`);
    if (step.observation) lines.push(`   observation: ${step.observation}`);
    return lines.join('\n');
  });

  const goal = mode === 'success'
    ? 'The task was solved. Extract the strategies that made it work.'
    : 'The task failed. Extract what went wrong and how to avoid it next time.';

  return [
    `Task: ${trajectory.query}`,
    '',
    'Steps:',
    steps.join('\n') || '(none)',
    '',
    trajectory.finalAnswer ? `Final answer: ${trajectory.finalAnswer}\n` : '',
    goal,
    'Extract at most 3 memories.',
    '',
    OUTPUT_FORMAT,
  ].join('\n');
}

function buildExperimentPrompt(rec: Recommendation, result: ExperimentResult, score: number): string {
  const solubility = result.solubility === null
    ? 'not measured'
    : `${result.solubility} ${result.solubilityUnit}`;
  const properties = Object.entries(result.properties)
    .map(([key, value]) => `- ${key}: ${String(value)}`)
    .join('\n');

  return [
    `Target material: ${rec.task.targetMaterial}`,
    rec.task.targetTemperature !== undefined ? `Target temperature: ${rec.task.targetTemperature} °C` : '',
    `Task: ${rec.task.description}`,
    '',
    `Recommended formulation: ${formulationSummary(rec.formulation)}`,
    `Formulation details: ${JSON.stringify(rec.formulation)}`,
    rec.reasoning ? `Reasoning given: ${rec.reasoning}` : '',
    `Confidence: ${rec.confidence}`,
    '',
    'Experimental outcome:',
    `- Liquid formed: ${result.isLiquidFormed ? 'yes' : 'no'}`,
    `- Solubility: ${solubility}`,
    `- Performance score: ${score.toFixed(1)} / 10`,
    properties,
    result.notes ? `- Notes: ${result.notes}` : '',
    '',
    'Compare the prediction with the outcome and extract data-driven lessons for future formulation design.',
    'Add "prediction_accuracy" and "key_factors" fields with your assessment.',
    '',
    OUTPUT_FORMAT,
  ].filter((line, i, lines) => line !== '' || lines[i - 1] !== '').join('\n');
}

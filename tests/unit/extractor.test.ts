import { describe, it, expect } from 'vitest';
import {
  FALLBACK_TITLE,
  MemoryExtractor,
  disambiguateFallback,
  parseExtractionResponse,
} from '../../src/memory/extractor.js';
import type { ExtractionContext } from '../../src/memory/extractor.js';
import { learnFromTrajectory } from '../../src/memory/learning.js';
import { MemoryStore } from '../../src/memory/store.js';
import type { Trajectory } from '../../src/memory/types.js';
import type { Recommendation } from '../../src/recommendations/types.js';
import { CapabilityError } from '../../src/adapters/types.js';
import type { GenerateOptions } from '../../src/adapters/types.js';
import { ExtractionFailure, ValidationError } from '../../src/errors.js';
import { ScriptedLanguageModel, extractionReply } from '../helpers/fakes.js';

const recommendation: Recommendation = {
  id: 'rec_20240101_000000_cellulose_abc123',
  task: { description: 'Dissolve cellulose', targetMaterial: 'cellulose', targetTemperature: 80 },
  formulation: { HBA: 'ChCl', HBD: 'Urea', molar_ratio: '1:2' },
  reasoning: 'Urea disrupts hydrogen bonds',
  confidence: 0.7,
  status: 'PROCESSING',
  experimentResult: null,
  performanceScore: null,
  error: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
};

const experiment: ExtractionContext = {
  mode: 'experiment',
  recommendation,
  result: {
    isLiquidFormed: true,
    solubility: 6.5,
    solubilityUnit: 'g/L',
    properties: { viscosity: 'low' },
  },
  performanceScore: 1.585,
};

const trajectory: Trajectory = {
  taskId: 'task-1',
  query: 'Find a solvent for lignin',
  steps: [{ action: 'search literature', tool: 'kb', observation: 'betaine systems look promising' }],
  finalAnswer: 'Betaine:lactic acid',
};

describe('MemoryExtractor', () => {
  it('turns a fenced JSON reply into candidates with experiment metadata', async () => {
    const model = new ScriptedLanguageModel('Here is my analysis:\n```json\n' + JSON.stringify({
      memories: [
        { title: 'Urea helps cellulose', description: 'Short', content: 'ChCl:Urea 1:2 dissolved 6.5 g/L' },
        { title: 'Heat matters', content: 'Run at 80 °C' },
      ],
      prediction_accuracy: 'overestimated',
    }) + '\n```');

    const result = await new MemoryExtractor(model).extract(experiment);

    expect(result.fallback).toBe(false);
    expect(result.insights).toEqual({ prediction_accuracy: 'overestimated' });
    expect(result.candidates).toEqual([
      {
        title: 'Urea helps cellulose',
        description: 'Short',
        content: 'ChCl:Urea 1:2 dissolved 6.5 g/L',
        isFromSuccess: true,
        sourceTaskId: recommendation.id,
        metadata: {
          extraction_mode: 'experiment',
          performance_score: 1.585,
          target_material: 'cellulose',
          insights: { prediction_accuracy: 'overestimated' },
        },
      },
      {
        title: 'Heat matters',
        description: '',
        content: 'Run at 80 °C',
        isFromSuccess: true,
        sourceTaskId: recommendation.id,
        metadata: {
          extraction_mode: 'experiment',
          performance_score: 1.585,
          target_material: 'cellulose',
          insights: { prediction_accuracy: 'overestimated' },
        },
      },
    ]);
  });

  it('marks memories from a failed experiment as failures', async () => {
    const model = new ScriptedLanguageModel(extractionReply([{ title: 'No liquid', content: 'Glycerol ratio too high' }]));
    const context: ExtractionContext = {
      ...experiment,
      result: { isLiquidFormed: false, solubility: null, solubilityUnit: 'g/L', properties: {} },
      performanceScore: 0,
    };

    const result = await new MemoryExtractor(model).extract(context);
    expect(result.candidates[0].isFromSuccess).toBe(false);
  });

  it('describes the recommendation and outcome in the prompt', async () => {
    const model = new ScriptedLanguageModel(extractionReply([{ title: 'T', content: 'C' }]));
    await new MemoryExtractor(model).extract(experiment);

    const prompt = model.prompts[0];
    expect(prompt).toContain('Target material: cellulose');
    expect(prompt).toContain('Recommended formulation: ChCl + Urea (1:2)');
    expect(prompt).toContain('- Solubility: 6.5 g/L');
    expect(prompt).toContain('- Performance score: 1.6 / 10');
    expect(prompt).toContain('- viscosity: low');
  });

  it('passes temperature, token limit and signal to the model', async () => {
    let seen: GenerateOptions = {};
    const model = new ScriptedLanguageModel(async (_prompt, options) => {
      seen = options;
      return extractionReply([{ title: 'T', content: 'C' }]);
    });
    const controller = new AbortController();

    await new MemoryExtractor(model, { temperature: 0.2, maxTokens: 512 }).extract(experiment, { signal: controller.signal });

    expect(seen.temperature).toBe(0.2);
    expect(seen.maxTokens).toBe(512);
    expect(seen.signal).toBe(controller.signal);
    expect(seen.system).toContain('JSON');
  });

  it('finds a bare JSON object inside prose', async () => {
    const model = new ScriptedLanguageModel('Sure! {"memories": [{"title": "Bare", "content": "found"}]} Hope this helps.');
    const result = await new MemoryExtractor(model).extract(experiment);
    expect(result.candidates.map((c) => c.title)).toEqual(['Bare']);
  });

  it('drops repeated titles', async () => {
    const model = new ScriptedLanguageModel(extractionReply([
      { title: 'Same', content: 'first' },
      { title: 'Same', content: 'second' },
    ]));
    const result = await new MemoryExtractor(model).extract(experiment);
    expect(result.candidates.map((c) => c.content)).toEqual(['first']);
  });

  it('keeps unparseable output as a single fallback memory', async () => {
    const model = new ScriptedLanguageModel('  Urea worked well, keep the ratio.  ');
    const result = await new MemoryExtractor(model).extract(experiment);

    expect(result.fallback).toBe(true);
    expect(result.candidates).toHaveLength(1);
    expect(result.candidates[0]).toMatchObject({
      title: FALLBACK_TITLE,
      content: 'Urea worked well, keep the ratio.',
      sourceTaskId: recommendation.id,
      metadata: { extraction_mode: 'experiment', fallback: true },
    });
  });

  it('fails on an empty response', async () => {
    const model = new ScriptedLanguageModel('   ');
    await expect(new MemoryExtractor(model).extract(experiment)).rejects.toThrow(
      new ExtractionFailure('Language model returned an empty response')
    );
  });

  it('wraps capability errors with their kind', async () => {
    const model = new ScriptedLanguageModel(new CapabilityError('slow down', 'language_model', 'rate_limit'));
    await expect(new MemoryExtractor(model).extract(experiment)).rejects.toThrow(
      'Language model call failed (rate_limit): slow down'
    );
  });

  it('reports an aborted call as a timeout', async () => {
    const controller = new AbortController();
    controller.abort();
    const model = new ScriptedLanguageModel(new Error('aborted'));

    const error = await new MemoryExtractor(model).extract(experiment, { signal: controller.signal }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionFailure);
    expect(error).toMatchObject({ message: 'Memory extraction timed out', kind: 'extraction_failure' });
  });

  it('extracts from a trajectory in success mode', async () => {
    const model = new ScriptedLanguageModel(extractionReply([{ title: 'Search first', content: 'Check literature' }]));
    const result = await new MemoryExtractor(model).extract({ mode: 'success', trajectory });

    expect(result.candidates[0]).toEqual({
      title: 'Search first',
      description: '',
      content: 'Check literature',
      isFromSuccess: true,
      sourceTaskId: 'task-1',
      metadata: { extraction_mode: 'success' },
    });
    expect(model.prompts[0]).toContain('Task: Find a solvent for lignin');
    expect(model.prompts[0]).toContain('   tool: kb');
  });
});

describe('parseExtractionResponse', () => {
  it('rejects documents without memories', () => {
    expect(parseExtractionResponse('{"memories": []}')).toBeNull();
    expect(parseExtractionResponse('{"notes": "x"}')).toBeNull();
    expect(parseExtractionResponse('{"memories": [{"title": "", "content": "x"}]}')).toBeNull();
  });

  it('tries the next candidate when a fenced block is malformed', () => {
    const raw = '```json\nnot json\n```\nand then {"memories": [{"title": "T", "content": "C"}]}';
    expect(parseExtractionResponse(raw)?.memories).toEqual([{ title: 'T', description: '', content: 'C' }]);
  });
});

describe('disambiguateFallback', () => {
  it('suffixes only the fallback title with the source id', () => {
    const result = disambiguateFallback([
      { title: FALLBACK_TITLE, description: '', content: 'x', isFromSuccess: true },
      { title: 'Other', description: '', content: 'y', isFromSuccess: true },
    ], 'rec_1');

    expect(result.map((c) => c.title)).toEqual([`${FALLBACK_TITLE} (rec_1)`, 'Other']);
  });
});

describe('learnFromTrajectory', () => {
  it('stores memories under the task id and replaces them when learning again', async () => {
    const store = new MemoryStore();
    const model = new ScriptedLanguageModel(
      extractionReply([{ title: 'A', content: 'a' }, { title: 'B', content: 'b' }]),
      extractionReply([{ title: 'C', content: 'c' }])
    );
    const extractor = new MemoryExtractor(model);

    const first = await learnFromTrajectory({ extractor, store }, trajectory, 'success');
    expect(first).toMatchObject({ titles: ['A', 'B'], added: 2 });

    const second = await learnFromTrajectory({ extractor, store }, trajectory, 'failure');
    expect(second).toMatchObject({ titles: ['C'], replaced: 1, deleted: 1 });
    expect(store.getAll().map((m) => [m.title, m.isFromSuccess])).toEqual([['C', false]]);
  });

  it('rejects a trajectory without a task id', async () => {
    const extractor = new MemoryExtractor(new ScriptedLanguageModel(''));
    await expect(
      learnFromTrajectory({ extractor, store: new MemoryStore() }, { ...trajectory, taskId: ' ' }, 'success')
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

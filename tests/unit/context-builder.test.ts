import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../../src/memory/store.js';
import { MemoryRetriever, formatMemoriesForPrompt } from '../../src/memory/retriever.js';
import { LocalKnowledgeBase } from '../../src/knowledge/local.js';
import type { KnowledgeRetriever } from '../../src/knowledge/types.js';
import { RecommendationContextBuilder, formatTask, taskQuery } from '../../src/core/context-builder.js';
import type { TaskDescriptor } from '../../src/recommendations/types.js';
import { KeywordEmbedder } from '../helpers/fakes.js';

const INTRO = `You design deep eutectic solvent formulations.
Propose a hydrogen bond acceptor, a hydrogen bond donor and a molar ratio, with your reasoning and a confidence between 0 and 1.`;

const task: TaskDescriptor = {
  description: 'Dissolve cellulose',
  targetMaterial: 'Cellulose',
  targetTemperature: 80,
  constraints: { toxicity: 'low' },
};

describe('task formatting', () => {
  it('lists the task fields one per line', () => {
    expect(formatTask(task)).toBe([
      'Task: Dissolve cellulose',
      'Target material: Cellulose',
      'Target temperature: 80 °C',
      'Constraint (toxicity): low',
    ].join('\n'));
    expect(formatTask({ description: 'x', targetMaterial: 'y' })).toBe('Task: x\nTarget material: y');
  });

  it('queries with the description and material', () => {
    expect(taskQuery(task)).toBe('Dissolve cellulose Cellulose');
  });
});

describe('RecommendationContextBuilder', () => {
  let store: MemoryStore;
  let retriever: MemoryRetriever;

  beforeEach(() => {
    const embedder = new KeywordEmbedder(['cellulose', 'urea', 'water']);
    store = new MemoryStore({ embedder });
    retriever = new MemoryRetriever(store, embedder);
  });

  it('builds a system prompt and the task message with no memories', async () => {
    const built = await new RecommendationContextBuilder(retriever).build(task);

    expect(built.messages).toEqual([
      { role: 'system', content: INTRO },
      { role: 'user', content: formatTask(task) },
    ]);
    expect(built.memories).toEqual([]);
    expect(built.snippets).toEqual([]);
    expect(built.tokenEstimate).toBe(Math.ceil(INTRO.length / 4) + Math.ceil(formatTask(task).length / 4));
  });

  it('includes the most similar memories', async () => {
    await store.add({
      title: 'Urea helps',
      description: 'Urea donors dissolve cellulose',
      content: 'ChCl:Urea 1:2 reached 6.5 g/L.',
      isFromSuccess: true,
      embedding: new Float32Array([1, 0, 0]),
    });
    await store.add({
      title: 'Water hurts',
      description: 'Keep it dry',
      content: 'Water above 5% stopped dissolution.',
      isFromSuccess: false,
      embedding: new Float32Array([0, 0, 1]),
    });

    const built = await new RecommendationContextBuilder(retriever, null, { memoryTopK: 1 }).build(task);

    expect(built.memories.map((m) => m.memory.title)).toEqual(['Urea helps']);
    expect(built.messages[0].content).toBe([
      INTRO,
      formatMemoriesForPrompt(built.memories),
      'Lessons from failures describe what to avoid; lessons from successes describe what worked.',
    ].join('\n\n'));
    expect(built.messages[0].content).toContain('### 1. Urea helps (success, similarity 1.00)');
  });

  it('adds literature within the token budget', async () => {
    const knowledge = new LocalKnowledgeBase([
      { title: 'Cellulose in DES', text: 'Cellulose dissolves in choline chloride and urea.' },
      { title: 'Long review', text: 'cellulose '.repeat(40) },
      { title: 'Unrelated', text: 'Lithium battery electrolytes.' },
    ]);

    const built = await new RecommendationContextBuilder(retriever, knowledge, { knowledgeTokens: 20 }).build(task);

    expect(built.snippets.map((s) => s.title)).toEqual(['Cellulose in DES']);
    expect(built.messages[0].content).toBe(`${INTRO}\n\n## Literature\n\n[1] Cellulose in DES\nCellulose dissolves in choline chloride and urea.`);
  });

  it('goes on without literature when the knowledge base fails', async () => {
    const broken: KnowledgeRetriever = {
      name: 'broken',
      query: () => Promise.reject(new Error('index offline')),
    };

    const built = await new RecommendationContextBuilder(retriever, broken).build(task);

    expect(built.snippets).toEqual([]);
    expect(built.messages[0].content).toBe(INTRO);
  });
});

import type { Message } from '../adapters/types.js';
import type { KnowledgeRetriever, KnowledgeSnippet } from '../knowledge/types.js';
import type { MemoryRetriever } from '../memory/retriever.js';
import { formatMemoriesForPrompt } from '../memory/retriever.js';
import type { RetrievalResult } from '../memory/types.js';
import type { TaskDescriptor } from '../recommendations/types.js';
import { errorMessage } from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export interface ContextConfig {
  memoryTopK: number;          // Memories to retrieve
  knowledgeTopK: number;       // Literature snippets to retrieve
  knowledgeTokens: number;     // Budget for the literature section
}

export const DEFAULT_CONTEXT_CONFIG: ContextConfig = {
  memoryTopK: 3,
  knowledgeTopK: 5,
  knowledgeTokens: 1500,
};

export interface BuiltContext {
  messages: Message[];
  tokenEstimate: number;
  memories: RetrievalResult[];
  snippets: KnowledgeSnippet[];
}

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Assembles what a formulation-design agent sees for a task: the task
 * itself, the most similar past experience and, when a knowledge base is
 * configured, relevant literature.
 */
export class RecommendationContextBuilder {
  private config: ContextConfig;
  private logger: Logger;

  constructor(
    private retriever: MemoryRetriever,
    private knowledge: KnowledgeRetriever | null = null,
    config: Partial<ContextConfig> = {},
    logger: Logger = silentLogger
  ) {
    this.config = { ...DEFAULT_CONTEXT_CONFIG, ...config };
    this.logger = logger.child('context');
  }

  async build(task: TaskDescriptor): Promise<BuiltContext> {
    const query = taskQuery(task);

    const memories = await this.retriever.retrieve(query, { topK: this.config.memoryTopK });

    let snippets: KnowledgeSnippet[] = [];
    if (this.knowledge) {
      try {
        snippets = this.fitToBudget(await this.knowledge.query(query, this.config.knowledgeTopK));
      } catch (error) {
        // Literature is optional context; go on without it
        this.logger.warn('Knowledge retrieval failed', { error: errorMessage(error) });
      }
    }

    const messages: Message[] = [
      { role: 'system', content: this.buildSystemPrompt(memories, snippets) },
      { role: 'user', content: formatTask(task) },
    ];

    const tokenEstimate = messages.reduce(
      (sum, msg) => sum + estimateTokens(msg.content),
      0
    );

    return { messages, tokenEstimate, memories, snippets };
  }

  private buildSystemPrompt(memories: RetrievalResult[], snippets: KnowledgeSnippet[]): string {
    const sections: string[] = [];

    sections.push(`You design deep eutectic solvent formulations.
Propose a hydrogen bond acceptor, a hydrogen bond donor and a molar ratio, with your reasoning and a confidence between 0 and 1.`);

    if (memories.length > 0) {
      sections.push(formatMemoriesForPrompt(memories));
      sections.push('Lessons from failures describe what to avoid; lessons from successes describe what worked.');
    }

    if (snippets.length > 0) {
      sections.push(formatSnippets(snippets));
    }

    return sections.join('\n\n');
  }

  /**
   * Keep snippets, best first, until the token budget is used up
   */
  private fitToBudget(snippets: KnowledgeSnippet[]): KnowledgeSnippet[] {
    const kept: KnowledgeSnippet[] = [];
    let used = 0;

    for (const snippet of snippets) {
      const tokens = estimateTokens(snippet.text);
      if (used + tokens > this.config.knowledgeTokens) break;
      kept.push(snippet);
      used += tokens;
    }

    return kept;
  }
}

export function taskQuery(task: TaskDescriptor): string {
  return `${task.description} ${task.targetMaterial}`.trim();
}

export function formatTask(task: TaskDescriptor): string {
  const lines = [
    `Task: ${task.description}`,
    `Target material: ${task.targetMaterial}`,
  ];
  if (task.targetTemperature !== undefined) {
    lines.push(`Target temperature: ${task.targetTemperature} °C`);
  }
  for (const [key, value] of Object.entries(task.constraints ?? {})) {
    lines.push(`Constraint (${key}): ${value}`);
  }
  return lines.join('\n');
}

function formatSnippets(snippets: KnowledgeSnippet[]): string {
  const items = snippets.map((snippet, i) => {
    const heading = snippet.title ?? snippet.source ?? snippet.id;
    return `[${i + 1}] ${heading}\n${snippet.text}`;
  });
  return `## Literature\n\n${items.join('\n\n')}`;
}

import type { MemoryStore } from './store.js';
import { cosineSimilarity } from './embeddings.js';
import type { Embedder } from './embeddings.js';
import type { RetrievalResult, RetrievalOptions } from './types.js';

export const DEFAULT_TOP_K = 3;

export class MemoryRetriever {
  constructor(
    private store: MemoryStore,
    private embedder: Embedder
  ) {}

  /**
   * Rank memories by cosine similarity to the query. Memories without an
   * embedding, or with one of another dimension, are never returned.
   */
  async retrieve(
    query: string,
    options: RetrievalOptions = {}
  ): Promise<RetrievalResult[]> {
    const {
      topK = DEFAULT_TOP_K,
      minSimilarity,
      isFromSuccess,
    } = options;

    if (topK <= 0) return [];

    const queryEmbedding = await this.embedder.embed(query);

    const results: RetrievalResult[] = [];
    for (const memory of this.store.getAll()) {
      if (!memory.embedding || memory.embedding.length !== queryEmbedding.length) continue;
      if (isFromSuccess !== undefined && memory.isFromSuccess !== isFromSuccess) continue;

      const similarity = cosineSimilarity(queryEmbedding, memory.embedding);
      if (minSimilarity !== undefined && similarity < minSimilarity) continue;

      results.push({ memory, similarity });
    }

    return results
      .sort((a, b) =>
        b.similarity - a.similarity ||
        b.memory.createdAt.getTime() - a.memory.createdAt.getTime()
      )
      .slice(0, topK);
  }
}

/**
 * Render retrieved memories as a prompt section
 */
export function formatMemoriesForPrompt(results: RetrievalResult[]): string {
  if (results.length === 0) return '';

  const sections = results.map((result, i) => {
    const origin = result.memory.isFromSuccess ? 'success' : 'failure';
    return [
      `### ${i + 1}. ${result.memory.title} (${origin}, similarity ${result.similarity.toFixed(2)})`,
      result.memory.description,
      '',
      result.memory.content,
    ].join('\n');
  });

  return `## Relevant Past Experience\n\n${sections.join('\n\n')}`;
}

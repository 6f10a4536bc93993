import { z } from 'zod';
import type { KnowledgeRetriever, KnowledgeSnippet } from './types.js';
import { readJsonFile } from '../storage/index.js';
import { PersistenceError } from '../errors.js';

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'is', 'are', 'was', 'were', 'using', 'with', 'for',
  'to', 'in', 'on', 'of', 'and', 'that', 'this', 'it', 'be', 'as', 'at',
  'by', 'from', 'or', 'not', 'but', 'have', 'has', 'had', 'do', 'does',
  'can', 'we', 'our', 'they', 'its', 'use', 'used', 'all', 'each',
]);

const SnippetSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  text: z.string().min(1),
  source: z.string().optional(),
});

// Either a bare array of snippets or { snippets: [...] }
const KnowledgeFileSchema = z.union([
  z.array(SnippetSchema),
  z.object({ snippets: z.array(SnippetSchema) }).transform((file) => file.snippets),
]);

export function tokenize(s: string): Set<string> {
  return new Set(
    s.toLowerCase()
      .replace(/[^a-z0-9\s]/g, ' ')
      .split(/\s+/)
      .filter((w) => w.length > 2 && !STOP_WORDS.has(w))
  );
}

interface IndexedSnippet {
  id: string;
  title?: string;
  text: string;
  source?: string;
  tokens: Set<string>;
}

/**
 * Small in-memory knowledge base ranked by token overlap. Scores are the
 * share of query tokens found in the snippet (title included).
 */
export class LocalKnowledgeBase implements KnowledgeRetriever {
  readonly name = 'local';
  private readonly snippets: IndexedSnippet[];

  constructor(snippets: Array<{ id?: string; title?: string; text: string; source?: string }>) {
    this.snippets = snippets.map((snippet, i) => ({
      id: snippet.id ?? `snippet-${i + 1}`,
      title: snippet.title,
      text: snippet.text,
      source: snippet.source,
      tokens: tokenize(`${snippet.title ?? ''} ${snippet.text}`),
    }));
  }

  static async fromFile(filePath: string): Promise<LocalKnowledgeBase> {
    const raw = await readJsonFile(filePath);
    if (raw === null) {
      throw new PersistenceError(`Knowledge file not found: ${filePath}`, filePath);
    }

    const parsed = KnowledgeFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Invalid knowledge file ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown'}`, filePath);
    }
    return new LocalKnowledgeBase(parsed.data);
  }

  get size(): number {
    return this.snippets.length;
  }

  async query(text: string, topK: number): Promise<KnowledgeSnippet[]> {
    const queryTokens = tokenize(text);
    if (queryTokens.size === 0 || topK <= 0) return [];

    const scored: KnowledgeSnippet[] = [];
    for (const snippet of this.snippets) {
      let hits = 0;
      for (const token of queryTokens) {
        if (snippet.tokens.has(token)) hits++;
      }
      if (hits === 0) continue;

      scored.push({
        id: snippet.id,
        title: snippet.title,
        text: snippet.text,
        source: snippet.source,
        score: hits / queryTokens.size,
      });
    }

    // Stable sort keeps file order among equal scores
    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }
}

import { CapabilityError } from '../adapters/types.js';
import { capabilityFetch, readJson } from '../adapters/http.js';

// Dimension of the hashing embedder
export const SIMPLE_EMBEDDING_DIM = 384;

// Embedding dimension for Ollama nomic-embed-text
export const OLLAMA_EMBEDDING_DIM = 768;

export interface Embedder {
  readonly dimensions: number;
  readonly name: string;
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
}

// Character-level hashing embedder. Deterministic and offline; good enough for
// tests and for small memory banks, not a substitute for a real model.
export class SimpleEmbedder implements Embedder {
  readonly dimensions = SIMPLE_EMBEDDING_DIM;
  readonly name = 'simple';

  async initialize(): Promise<void> {
    // No initialization needed
  }

  async embed(text: string): Promise<Float32Array> {
    return this.hashToEmbedding(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.hashToEmbedding(text));
  }

  private hashToEmbedding(text: string): Float32Array {
    const embedding = new Float32Array(this.dimensions);
    const normalized = text.toLowerCase().trim();

    for (let i = 0; i < this.dimensions; i++) {
      embedding[i] = Math.sin(i * 0.1 + normalized.length * 0.01) * 0.01;
    }

    // Character contributions
    for (let i = 0; i < normalized.length; i++) {
      const charCode = normalized.charCodeAt(i);
      const position = i % this.dimensions;

      embedding[position] += Math.sin(charCode * 0.1) * 0.1;
      embedding[(position + 1) % this.dimensions] += Math.cos(charCode * 0.1) * 0.1;
      embedding[charCode % this.dimensions] += 0.05;
    }

    // Word-level features carry most of the topical signal
    for (const word of normalized.split(/[^a-z0-9]+/)) {
      if (!word) continue;
      embedding[this.simpleHash(word) % this.dimensions] += 0.5;
    }

    let norm = 0;
    for (let i = 0; i < this.dimensions; i++) {
      norm += embedding[i] * embedding[i];
    }
    norm = Math.sqrt(norm);

    if (norm > 0) {
      for (let i = 0; i < this.dimensions; i++) {
        embedding[i] /= norm;
      }
    }

    return embedding;
  }

  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = ((hash << 5) - hash) + str.charCodeAt(i);
      hash = hash & hash; // Convert to 32bit integer
    }
    return Math.abs(hash);
  }
}

export class OllamaEmbedder implements Embedder {
  readonly dimensions = OLLAMA_EMBEDDING_DIM;
  readonly name = 'ollama';

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text'
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async initialize(): Promise<void> {
    const response = await capabilityFetch('embedding', 'Ollama', `${this.baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(5000),
    });
    const data = await readJson<{ models?: Array<{ name: string }> }>(response, 'embedding', 'Ollama');

    if (!data.models?.some((m) => m.name.includes(this.model))) {
      throw new CapabilityError(
        `Ollama model ${this.model} is not pulled. Run \`ollama pull ${this.model}\`.`,
        'embedding',
        'bad_response'
      );
    }
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new CapabilityError('Ollama returned no embedding', 'embedding', 'bad_response');
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await capabilityFetch('embedding', 'Ollama', `${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        input: texts,
      }),
    });

    const data = await readJson<{ embeddings: number[][] }>(response, 'embedding', 'Ollama');

    return data.embeddings.map((e) => new Float32Array(e));
  }
}

export class OpenAIEmbedder implements Embedder {
  readonly dimensions = 1536; // text-embedding-3-small
  readonly name = 'openai';

  constructor(
    private apiKey: string,
    private model: string = 'text-embedding-3-small',
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async initialize(): Promise<void> {
    // Key problems surface on the first embed call as an 'auth' CapabilityError
  }

  async embed(text: string): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) {
      throw new CapabilityError('OpenAI returned no embedding', 'embedding', 'bad_response');
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    const response = await capabilityFetch('embedding', 'OpenAI', `${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
      }),
    });

    const data = await readJson<{
      data: Array<{ embedding: number[]; index: number }>;
    }>(response, 'embedding', 'OpenAI');

    // Sort by index to maintain order
    const sorted = data.data.sort((a, b) => a.index - b.index);
    return sorted.map((d) => new Float32Array(d.embedding));
  }
}

export interface EmbedderConfig {
  provider: 'simple' | 'ollama' | 'openai';
  model?: string;
  baseUrl?: string;
  openaiApiKey?: string;
}

export async function createEmbedder(config: EmbedderConfig): Promise<Embedder> {
  let embedder: Embedder;

  switch (config.provider) {
    case 'simple':
      embedder = new SimpleEmbedder();
      break;

    case 'ollama':
      embedder = new OllamaEmbedder(
        config.baseUrl ?? 'http://127.0.0.1:11434',
        config.model ?? 'nomic-embed-text'
      );
      break;

    case 'openai':
      if (!config.openaiApiKey) {
        throw new Error('OpenAI API key required for OpenAI embeddings');
      }
      embedder = new OpenAIEmbedder(
        config.openaiApiKey,
        config.model ?? 'text-embedding-3-small',
        config.baseUrl
      );
      break;

    default:
      throw new Error(`Unknown embedder provider: ${String(config.provider)}`);
  }

  await embedder.initialize();
  return embedder;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

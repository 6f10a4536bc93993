import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { GenerateOptions, LanguageModel } from '../../src/adapters/types.js';
import type { Embedder } from '../../src/memory/embeddings.js';

export function tmpDir(prefix = 'fm-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

type Reply = string | Error | ((prompt: string, options: GenerateOptions) => Promise<string>);

/**
 * Language model that plays back scripted replies in order. The last reply
 * repeats once the script runs out.
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly name = 'scripted';
  readonly prompts: string[] = [];
  private replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) return '';
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(prompt, options);
    return reply;
  }
}

/**
 * Reply that never resolves until the call is aborted
 */
export function hangUntilAborted(_prompt: string, options: GenerateOptions): Promise<string> {
  return new Promise((_resolve, reject) => {
    options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

export function extractionReply(memories: Array<{ title: string; description?: string; content: string }>): string {
  return '```json\n' + JSON.stringify({ memories }) + '\n```';
}

/**
 * Embedder with one dimension per vocabulary word: the vector counts each
 * word's occurrences. Unknown words are ignored.
 */
export class KeywordEmbedder implements Embedder {
  readonly name = 'keyword';
  readonly dimensions: number;
  calls = 0;
  failWith: Error | null = null;

  constructor(private vocabulary: string[]) {
    this.dimensions = vocabulary.length;
  }

  async initialize(): Promise<void> {}

  async embed(text: string): Promise<Float32Array> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    const vector = new Float32Array(this.dimensions);
    for (const word of text.toLowerCase().split(/[^a-z0-9]+/)) {
      const index = this.vocabulary.indexOf(word);
      if (index !== -1) vector[index] += 1;
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return Promise.all(texts.map((text) => this.embed(text)));
  }
}

export function fixedClock(iso: string): () => Date {
  return () => new Date(iso);
}

/**
 * Clock that moves forward one second per call
 */
export function tickingClock(startIso: string): () => Date {
  let time = Date.parse(startIso);
  return () => {
    const now = new Date(time);
    time += 1000;
    return now;
  };
}

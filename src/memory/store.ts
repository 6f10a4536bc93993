import { z } from 'zod';
import type { Embedder } from './embeddings.js';
import { createEvictionPolicy } from './eviction.js';
import type { EvictionPolicy } from './eviction.js';
import type {
  MemoryItem,
  NewMemoryItem,
  MemoryPatch,
  MemoryListOptions,
  MemoryPage,
  ConsolidationOptions,
  ConsolidationReport,
  BackfillReport,
} from './types.js';
import { Mutex, TimestampSchema, atomicWriteJson, readJsonFile } from '../storage/index.js';
import {
  DuplicateTitleError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export const DEFAULT_MAX_ITEMS = 1000;
export const MAX_TITLE_LENGTH = 200;

// On-disk shape of the memory bank
const PersistedMemorySchema = z.object({
  title: z.string(),
  description: z.string(),
  content: z.string(),
  is_from_success: z.boolean(),
  source_task_id: z.string().nullable().default(null),
  created_at: TimestampSchema,
  embedding: z.array(z.number()).nullable().default(null),
  metadata: z.record(z.unknown()).default({}),
});

const PersistedBankSchema = z.object({
  memories: z.array(PersistedMemorySchema),
  max_items: z.number().int().positive().optional(),
});

type PersistedMemory = z.infer<typeof PersistedMemorySchema>;

export interface MemoryStoreOptions {
  maxItems?: number;
  embedder?: Embedder | null;
  evictionPolicy?: EvictionPolicy;
  persistPath?: string | null;
  autoSave?: boolean;
  logger?: Logger;
}

export interface AddOptions {
  computeEmbedding?: boolean;
}

export class MemoryStore {
  private items: MemoryItem[] = [];
  private readonly mutex = new Mutex();
  private readonly embedder: Embedder | null;
  private readonly evictionPolicy: EvictionPolicy;
  private readonly autoSave: boolean;
  private readonly logger: Logger;
  readonly maxItems: number;
  readonly persistPath: string | null;

  constructor(options: MemoryStoreOptions = {}) {
    const maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    if (!Number.isInteger(maxItems) || maxItems < 1) {
      throw new ValidationError(`maxItems must be a positive integer, got ${maxItems}`);
    }

    this.maxItems = maxItems;
    this.embedder = options.embedder ?? null;
    this.evictionPolicy = options.evictionPolicy ?? createEvictionPolicy('oldest');
    this.persistPath = options.persistPath ?? null;
    this.autoSave = options.autoSave ?? false;
    this.logger = (options.logger ?? silentLogger).child('memory');
  }

  /**
   * Load a memory bank from disk. A missing file gives an empty store bound to
   * that path; a malformed one is a PersistenceError.
   */
  static async load(filePath: string, options: Omit<MemoryStoreOptions, 'persistPath'> = {}): Promise<MemoryStore> {
    const raw = await readJsonFile(filePath);
    if (raw === null) {
      return new MemoryStore({ ...options, persistPath: filePath });
    }

    const parsed = PersistedBankSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(
        `Invalid memory bank ${filePath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        filePath
      );
    }

    const store = new MemoryStore({
      ...options,
      maxItems: options.maxItems ?? parsed.data.max_items,
      persistPath: filePath,
    });
    store.items = parsed.data.memories.map(fromPersisted);
    return store;
  }

  get size(): number {
    return this.items.length;
  }

  get hasEmbedder(): boolean {
    return this.embedder !== null;
  }

  get evictionPolicyName(): string {
    return this.evictionPolicy.name;
  }

  // ─────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────

  getAll(): MemoryItem[] {
    return [...this.items];
  }

  findByTitle(title: string): MemoryItem | null {
    return this.items.find((item) => item.title === title) ?? null;
  }

  getByTitle(title: string): MemoryItem {
    const item = this.findByTitle(title);
    if (!item) {
      throw new NotFoundError('memory', title);
    }
    return item;
  }

  findBySourceTaskId(sourceTaskId: string): MemoryItem[] {
    return this.items.filter((item) => item.sourceTaskId === sourceTaskId);
  }

  /**
   * Filtered page of memories, newest first.
   */
  list(options: MemoryListOptions = {}): MemoryPage {
    const { isFromSuccess, sourceTaskId, limit = 50, offset = 0 } = options;

    const matching = this.items
      .filter((item) => isFromSuccess === undefined || item.isFromSuccess === isFromSuccess)
      .filter((item) => sourceTaskId === undefined || item.sourceTaskId === sourceTaskId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    return {
      items: matching.slice(offset, offset + limit),
      total: matching.length,
    };
  }

  // ─────────────────────────────────────────────────────────────
  // Mutations
  // ─────────────────────────────────────────────────────────────

  async add(input: NewMemoryItem, options: AddOptions = {}): Promise<MemoryItem> {
    validateTitle(input.title);
    if (this.findByTitle(input.title)) {
      throw new DuplicateTitleError(input.title);
    }

    let embedding = input.embedding ?? null;
    if (options.computeEmbedding && !embedding) {
      embedding = await this.tryEmbed(input.title, input.description);
    }

    const item = toMemoryItem(input, embedding);

    return this.mutate(() => {
      if (this.findByTitle(item.title)) {
        throw new DuplicateTitleError(item.title);
      }
      this.items.push(item);
      this.evict(new Set([item.title]));
      return item;
    });
  }

  /**
   * Patch a memory in place. A changed description or content re-embeds it.
   */
  async update(title: string, patch: MemoryPatch): Promise<MemoryItem> {
    const current = this.getByTitle(title);

    const textChanged =
      (patch.description !== undefined && patch.description !== current.description) ||
      (patch.content !== undefined && patch.content !== current.content);

    const description = patch.description ?? current.description;
    // Changed text invalidates the old vector even when no embedder can replace it
    let embedding = current.embedding;
    if (textChanged) {
      embedding = this.embedder ? await this.tryEmbed(title, description) : null;
    }

    return this.mutate(() => {
      const index = this.indexOf(title);
      if (index === -1) {
        throw new NotFoundError('memory', title);
      }

      const existing = this.items[index];
      const updated: MemoryItem = {
        ...existing,
        description,
        content: patch.content ?? existing.content,
        isFromSuccess: patch.isFromSuccess ?? existing.isFromSuccess,
        metadata: patch.metadata ? { ...existing.metadata, ...patch.metadata } : existing.metadata,
        embedding,
      };
      this.items[index] = updated;
      return updated;
    });
  }

  async deleteByTitle(title: string): Promise<boolean> {
    if (this.indexOf(title) === -1) return false;

    return this.mutate(() => {
      const index = this.indexOf(title);
      if (index === -1) return false;
      this.items.splice(index, 1);
      return true;
    });
  }

  /**
   * Merge extracted candidates into the store.
   *
   * A candidate replaces the memory with the same title in place. Otherwise,
   * with `replaceBySource`, it takes over a not yet replaced memory learned
   * from the same source. Otherwise it is added. With `replaceBySource`, the
   * source's memories left over afterwards are deleted.
   */
  async consolidate(candidates: NewMemoryItem[], options: ConsolidationOptions): Promise<ConsolidationReport> {
    for (const candidate of candidates) {
      validateTitle(candidate.title);
    }

    // Embed before taking the lock
    const prepared: MemoryItem[] = [];
    for (const candidate of candidates) {
      const embedding = candidate.embedding ?? await this.tryEmbed(candidate.title, candidate.description);
      prepared.push(toMemoryItem({ ...candidate, sourceTaskId: options.sourceTaskId }, embedding));
    }

    return this.mutate(() => {
      const report: ConsolidationReport = { titles: [], added: 0, replaced: 0, deleted: 0, evicted: [] };

      const sourceQueue = options.replaceBySource
        ? this.items.filter((item) => item.sourceTaskId === options.sourceTaskId).map((item) => item.title)
        : [];
      const claimed = new Set<string>();

      for (const item of prepared) {
        const sameTitle = this.indexOf(item.title);
        if (sameTitle !== -1) {
          this.items[sameTitle] = item;
          claimed.add(item.title);
          report.replaced++;
        } else {
          const reusable = sourceQueue.find((title) => !claimed.has(title) && this.indexOf(title) !== -1);
          if (reusable !== undefined) {
            this.items[this.indexOf(reusable)] = item;
            claimed.add(reusable);
            claimed.add(item.title);
            report.replaced++;
          } else {
            this.items.push(item);
            claimed.add(item.title);
            report.added++;
          }
        }
        report.titles.push(item.title);
      }

      const keep = new Set(report.titles);
      for (const title of sourceQueue) {
        if (claimed.has(title) || keep.has(title)) continue;
        const index = this.indexOf(title);
        if (index !== -1) {
          this.items.splice(index, 1);
          report.deleted++;
        }
      }

      report.evicted = this.evict(keep);

      this.logger.debug('Consolidated memories', {
        source: options.sourceTaskId,
        added: report.added,
        replaced: report.replaced,
        deleted: report.deleted,
      });
      return report;
    });
  }

  /**
   * Compute embeddings for memories that have none (or, with `force`, for all).
   */
  async backfillEmbeddings(options: { force?: boolean } = {}): Promise<BackfillReport> {
    const embedder = this.embedder;
    if (!embedder) {
      throw new ValidationError('No embedding capability configured');
    }

    const report: BackfillReport = { updated: 0, failed: 0, skipped: 0 };
    const computed = new Map<string, Float64Array>();

    for (const item of this.items) {
      if (item.embedding && !options.force) {
        report.skipped++;
        continue;
      }
      try {
        computed.set(item.title, Float64Array.from(await embedder.embed(embeddingText(item.title, item.description))));
        report.updated++;
      } catch (error) {
        report.failed++;
        this.logger.warn('Embedding failed during backfill', { title: item.title, error: errorMessage(error) });
      }
    }

    if (computed.size === 0) return report;

    return this.mutate(() => {
      this.items = this.items.map((item) => {
        const embedding = computed.get(item.title);
        return embedding ? { ...item, embedding } : item;
      });
      return report;
    });
  }

  /**
   * Write the whole bank to `filePath` (default: the persist path) atomically.
   */
  async save(filePath?: string): Promise<void> {
    await this.mutex.runExclusive(() => this.writeTo(filePath));
  }

  // ─────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────

  /**
   * Run a mutation under the lock and flush it when autoSave is on. A failed
   * flush restores the previous in-memory state.
   */
  private async mutate<T>(fn: () => T): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const snapshot = [...this.items];
      const result = fn();

      if (this.autoSave && this.persistPath) {
        try {
          await this.writeTo(this.persistPath);
        } catch (error) {
          this.items = snapshot;
          throw error;
        }
      }
      return result;
    });
  }

  private async writeTo(filePath?: string): Promise<void> {
    const target = filePath ?? this.persistPath;
    if (!target) {
      throw new ValidationError('No path given to save the memory bank to');
    }

    await atomicWriteJson(target, {
      memories: this.items.map(toPersisted),
      max_items: this.maxItems,
    });
  }

  private evict(protectedTitles: ReadonlySet<string>): string[] {
    const overflow = this.items.length - this.maxItems;
    if (overflow <= 0) return [];

    const victims = new Set(
      this.evictionPolicy.selectVictims(this.items, overflow, protectedTitles).map((item) => item.title)
    );
    this.items = this.items.filter((item) => !victims.has(item.title));

    const evicted = [...victims];
    this.logger.info('Evicted memories over capacity', {
      policy: this.evictionPolicy.name,
      count: evicted.length,
      maxItems: this.maxItems,
    });
    return evicted;
  }

  private indexOf(title: string): number {
    return this.items.findIndex((item) => item.title === title);
  }

  private async tryEmbed(title: string, description: string): Promise<Float64Array | null> {
    if (!this.embedder) return null;

    try {
      return Float64Array.from(await this.embedder.embed(embeddingText(title, description)));
    } catch (error) {
      this.logger.warn('Embedding failed; storing memory without one', { title, error: errorMessage(error) });
      return null;
    }
  }
}

export function embeddingText(title: string, description: string): string {
  return `${title}. ${description}`;
}

function validateTitle(title: string): void {
  if (title.trim().length === 0 || title.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`Memory title must be 1-${MAX_TITLE_LENGTH} characters, got ${title.length}`);
  }
}

function toMemoryItem(input: NewMemoryItem, embedding: ArrayLike<number> | null): MemoryItem {
  return {
    title: input.title,
    description: input.description,
    content: input.content,
    isFromSuccess: input.isFromSuccess,
    sourceTaskId: input.sourceTaskId ?? null,
    createdAt: input.createdAt ?? new Date(),
    embedding: embedding ? Float64Array.from(embedding) : null,
    metadata: input.metadata ?? {},
  };
}

function toPersisted(item: MemoryItem): PersistedMemory {
  return {
    title: item.title,
    description: item.description,
    content: item.content,
    is_from_success: item.isFromSuccess,
    source_task_id: item.sourceTaskId,
    created_at: item.createdAt.toISOString(),
    embedding: item.embedding ? Array.from(item.embedding) : null,
    metadata: item.metadata,
  };
}

function fromPersisted(row: PersistedMemory): MemoryItem {
  return {
    title: row.title,
    description: row.description,
    content: row.content,
    isFromSuccess: row.is_from_success,
    sourceTaskId: row.source_task_id,
    createdAt: new Date(row.created_at),
    embedding: row.embedding ? Float64Array.from(row.embedding) : null,
    metadata: row.metadata,
  };
}

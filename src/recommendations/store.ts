import * as fs from 'fs/promises';
import * as path from 'path';
import { customAlphabet } from 'nanoid';
import { formulationSummary } from './performance.js';
import {
  PersistedIndexSchema,
  PersistedRecordSchema,
  indexEntryFromJson,
  indexEntryToJson,
  recordFromJson,
  recordToJson,
} from './schema.js';
import type {
  ExperimentResult,
  Formulation,
  IndexEntry,
  IndexListing,
  Recommendation,
  RecommendationExtras,
  RecommendationFilter,
  RecommendationListOptions,
  RecommendationStatus,
  StatusPatch,
  TaskDescriptor,
} from './types.js';
import { Mutex, atomicWriteJson, readJsonFile } from '../storage/index.js';
import {
  NotFoundError,
  PersistenceError,
  StateConflictError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export const INDEX_FILE = 'index.json';
export const RECORDS_DIR = 'records';

const TRANSITIONS: Record<RecommendationStatus, RecommendationStatus[]> = {
  PENDING: ['PROCESSING', 'CANCELLED'],
  PROCESSING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
};

const TERMINAL: ReadonlySet<RecommendationStatus> = new Set(['COMPLETED', 'FAILED', 'CANCELLED']);

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const randomSuffix = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 6);

export function isTerminal(status: RecommendationStatus): boolean {
  return TERMINAL.has(status);
}

export function canTransition(from: RecommendationStatus, to: RecommendationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * UTC timestamp as YYYYMMDD_HHMMSS, with _mmm appended when `millis` is set
 */
export function compactTimestamp(date: Date, millis = false): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  const stamp =
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return millis ? `${stamp}_${pad(date.getUTCMilliseconds(), 3)}` : stamp;
}

export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, 32)
    .replace(/_+$/, '');
  return slug || 'material';
}

export function projectEntry(rec: Recommendation): IndexEntry {
  return {
    status: rec.status,
    targetMaterial: rec.task.targetMaterial,
    formulationSummary: formulationSummary(rec.formulation),
    formulation: rec.formulation,
    confidence: rec.confidence,
    performanceScore: rec.performanceScore,
    createdAt: rec.createdAt.toISOString(),
    updatedAt: rec.updatedAt.toISOString(),
  };
}

function sortTime(value: string): number {
  const time = Date.parse(value);
  return Number.isNaN(time) ? 0 : time;
}

export interface RecommendationStoreOptions {
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Durable recommendation records plus the index used for listing.
 *
 * Layout under `dir`:
 *   index.json           id -> listing projection
 *   records/<id>.json    full record
 *
 * The record is written before the index; when the index write fails the
 * record is put back the way it was.
 */
export class RecommendationStore {
  private index = new Map<string, IndexEntry>();
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly clock: () => Date;

  private constructor(
    readonly dir: string,
    options: RecommendationStoreOptions
  ) {
    this.logger = (options.logger ?? silentLogger).child('recommendations');
    this.clock = options.clock ?? (() => new Date());
  }

  static async open(dir: string, options: RecommendationStoreOptions = {}): Promise<RecommendationStore> {
    const store = new RecommendationStore(dir, options);
    await store.reload();
    return store;
  }

  get indexPath(): string {
    return path.join(this.dir, INDEX_FILE);
  }

  recordPath(id: string): string {
    return path.join(this.dir, RECORDS_DIR, `${id}.json`);
  }

  /**
   * Re-read index.json, replacing the in-memory index
   */
  async reload(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.index = await this.readIndexFile();
    });
  }

  // ─────────────────────────────────────────────────────────────
  // Records
  // ─────────────────────────────────────────────────────────────

  async create(
    task: TaskDescriptor,
    formulation: Formulation,
    confidence: number,
    extras: RecommendationExtras = {}
  ): Promise<Recommendation> {
    validateNewRecommendation(task, confidence);

    const now = extras.createdAt ?? this.clock();
    const rec: Recommendation = {
      id: `rec_${compactTimestamp(now)}_${slugify(task.targetMaterial)}_${randomSuffix()}`,
      task,
      formulation,
      reasoning: extras.reasoning ?? null,
      confidence,
      status: 'PENDING',
      experimentResult: null,
      performanceScore: null,
      error: null,
      createdAt: now,
      updatedAt: now,
    };

    await this.mutex.runExclusive(async () => {
      if (this.index.has(rec.id)) {
        throw new StateConflictError(`Recommendation ${rec.id} already exists`, 'illegal_transition');
      }
      await this.commit(rec, null);
    });

    this.logger.info('Created recommendation', { id: rec.id, material: task.targetMaterial });
    return rec;
  }

  async find(id: string): Promise<Recommendation | null> {
    if (!ID_PATTERN.test(id) || !this.index.has(id)) return null;
    return this.readRecord(id);
  }

  async get(id: string): Promise<Recommendation> {
    const rec = await this.find(id);
    if (!rec) {
      throw new NotFoundError('recommendation', id);
    }
    return rec;
  }

  // ─────────────────────────────────────────────────────────────
  // State machine
  // ─────────────────────────────────────────────────────────────

  /**
   * Move to `status` if the state machine allows it from the current status
   */
  async updateStatus(id: string, status: RecommendationStatus, patch: StatusPatch = {}): Promise<Recommendation> {
    return this.change(id, (current) => {
      assertTransition(current, status);
      return applyPatch(current, status, patch, this.clock());
    });
  }

  /**
   * Compare-and-set: move to `to` only if the current status is one of `from`.
   * Used to claim a recommendation for processing.
   */
  async transition(
    id: string,
    from: RecommendationStatus[],
    to: RecommendationStatus,
    patch: StatusPatch = {}
  ): Promise<Recommendation> {
    return this.change(id, (current) => {
      if (!from.includes(current.status)) {
        throw conflictFor(current, to);
      }
      assertTransition(current, to);
      return applyPatch(current, to, patch, this.clock());
    });
  }

  /**
   * Record an experiment result and enter COMPLETED. On a COMPLETED
   * recommendation this refreshes the result in place.
   */
  async complete(id: string, result: ExperimentResult, score: number): Promise<Recommendation> {
    return this.change(id, (current) => {
      if (current.status !== 'COMPLETED') {
        assertTransition(current, 'COMPLETED');
      }
      return applyPatch(current, 'COMPLETED', {
        experimentResult: result,
        performanceScore: score,
        error: null,
      }, this.clock());
    });
  }

  async fail(id: string, message: string): Promise<Recommendation> {
    return this.updateStatus(id, 'FAILED', { error: message });
  }

  async cancel(id: string): Promise<Recommendation> {
    const rec = await this.transition(id, ['PENDING'], 'CANCELLED');
    this.logger.info('Cancelled recommendation', { id });
    return rec;
  }

  // ─────────────────────────────────────────────────────────────
  // Listing (index only)
  // ─────────────────────────────────────────────────────────────

  entries(): IndexListing[] {
    return [...this.index].map(([id, entry]) => ({ id, ...entry }));
  }

  entry(id: string): IndexEntry | null {
    return this.index.get(id) ?? null;
  }

  list(options: RecommendationListOptions = {}): { items: IndexListing[]; total: number } {
    const { limit = 50, offset = 0 } = options;
    if (limit < 0 || offset < 0) {
      throw new ValidationError('limit and offset must not be negative');
    }

    const matching = this.filtered(options).sort((a, b) =>
      sortTime(b.createdAt) - sortTime(a.createdAt) || (b.id < a.id ? -1 : b.id > a.id ? 1 : 0)
    );

    return {
      items: matching.slice(offset, offset + limit),
      total: matching.length,
    };
  }

  count(filter: RecommendationFilter = {}): number {
    return this.filtered(filter).length;
  }

  // ─────────────────────────────────────────────────────────────
  // Internals shared with the migration
  // ─────────────────────────────────────────────────────────────

  /**
   * Run `fn` under the store lock with direct access to the index.
   */
  async withIndex<T>(fn: (index: Map<string, IndexEntry>) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      this.index = await this.readIndexFile();
      try {
        return await fn(this.index);
      } catch (error) {
        // Whatever fn changed in memory did not reach the disk
        this.index = await this.readIndexFile();
        throw error;
      }
    });
  }

  async readRecord(id: string): Promise<Recommendation | null> {
    const filePath = this.recordPath(id);
    const raw = await readJsonFile(filePath);
    if (raw === null) return null;

    const parsed = PersistedRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Invalid recommendation record ${filePath}: ${parsed.error.issues[0]?.message ?? 'unknown'}`, filePath);
    }
    return recordFromJson(parsed.data);
  }

  async writeIndex(index: Map<string, IndexEntry>): Promise<void> {
    const json: Record<string, unknown> = {};
    for (const [id, entry] of index) {
      json[id] = indexEntryToJson(entry);
    }
    await atomicWriteJson(this.indexPath, json);
  }

  private filtered(filter: RecommendationFilter): IndexListing[] {
    const material = filter.targetMaterial?.toLowerCase();
    return this.entries().filter((entry) =>
      (filter.status === undefined || entry.status === filter.status) &&
      (material === undefined || entry.targetMaterial.toLowerCase() === material)
    );
  }

  private async change(id: string, fn: (current: Recommendation) => Recommendation): Promise<Recommendation> {
    return this.mutex.runExclusive(async () => {
      const current = this.index.has(id) && ID_PATTERN.test(id) ? await this.readRecord(id) : null;
      if (!current) {
        throw new NotFoundError('recommendation', id);
      }

      const next = fn(current);
      await this.commit(next, current);

      this.logger.debug('Recommendation updated', { id, from: current.status, to: next.status });
      return next;
    });
  }

  /**
   * Write record then index. `previous` is the record to put back if the
   * index write fails (null for a new record).
   */
  private async commit(next: Recommendation, previous: Recommendation | null): Promise<void> {
    await atomicWriteJson(this.recordPath(next.id), recordToJson(next));

    const priorEntry = this.index.get(next.id);
    this.index.set(next.id, projectEntry(next));

    try {
      await this.writeIndex(this.index);
    } catch (error) {
      if (priorEntry) {
        this.index.set(next.id, priorEntry);
      } else {
        this.index.delete(next.id);
      }
      await this.restoreRecord(next.id, previous);
      throw error;
    }
  }

  private async restoreRecord(id: string, previous: Recommendation | null): Promise<void> {
    try {
      if (previous) {
        await atomicWriteJson(this.recordPath(id), recordToJson(previous));
      } else {
        await fs.rm(this.recordPath(id), { force: true });
      }
    } catch (error) {
      this.logger.error('Could not roll back recommendation record', { id, error: errorMessage(error) });
    }
  }

  private async readIndexFile(): Promise<Map<string, IndexEntry>> {
    const raw = await readJsonFile(this.indexPath);
    if (raw === null) return new Map();

    const parsed = PersistedIndexSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PersistenceError(
        `Invalid recommendation index ${this.indexPath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`,
        this.indexPath
      );
    }

    return new Map(Object.entries(parsed.data).map(([id, row]) => [id, indexEntryFromJson(row)]));
  }
}

function validateNewRecommendation(task: TaskDescriptor, confidence: number): void {
  const issues: string[] = [];
  if (!task.description.trim()) issues.push('task.description must not be empty');
  if (!task.targetMaterial.trim()) issues.push('task.targetMaterial must not be empty');
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    issues.push(`confidence must be between 0 and 1, got ${confidence}`);
  }
  if (issues.length > 0) {
    throw new ValidationError(issues.join('; '), issues);
  }
}

function conflictFor(current: Recommendation, to: RecommendationStatus): StateConflictError {
  if (isTerminal(current.status)) {
    return new StateConflictError(
      `Recommendation ${current.id} is ${current.status} and cannot move to ${to}`,
      'terminal_state'
    );
  }
  return new StateConflictError(
    `Recommendation ${current.id} cannot move from ${current.status} to ${to}`,
    'illegal_transition'
  );
}

function assertTransition(current: Recommendation, to: RecommendationStatus): void {
  if (!canTransition(current.status, to)) {
    throw conflictFor(current, to);
  }
}

function applyPatch(current: Recommendation, status: RecommendationStatus, patch: StatusPatch, now: Date): Recommendation {
  return {
    ...current,
    status,
    // The experiment result only changes on entering or refreshing COMPLETED
    experimentResult: status === 'COMPLETED' && patch.experimentResult ? patch.experimentResult : current.experimentResult,
    performanceScore: status === 'COMPLETED' && patch.performanceScore !== undefined
      ? patch.performanceScore
      : current.performanceScore,
    error: patch.error !== undefined ? patch.error : current.error,
    updatedAt: now,
  };
}

// Memory items are distilled, reusable pieces of reasoning: strategies learned
// from agent trajectories and data-driven insights learned from experiments.

export type ExtractionMode = 'success' | 'failure' | 'experiment';

export interface MemoryItem {
  title: string;             // Unique within a store, 1-200 characters
  description: string;
  content: string;
  isFromSuccess: boolean;
  sourceTaskId: string | null;  // Recommendation (or trajectory task) it was learned from
  createdAt: Date;
  embedding: Float64Array | null;  // Double precision, as persisted
  metadata: Record<string, unknown>;
}

export interface NewMemoryItem {
  title: string;
  description: string;
  content: string;
  isFromSuccess: boolean;
  sourceTaskId?: string | null;
  createdAt?: Date;
  embedding?: ArrayLike<number> | null;
  metadata?: Record<string, unknown>;
}

export interface MemoryPatch {
  description?: string;
  content?: string;
  isFromSuccess?: boolean;
  metadata?: Record<string, unknown>;  // Merged into the existing metadata
}

export interface MemoryListOptions {
  isFromSuccess?: boolean;
  sourceTaskId?: string;
  limit?: number;
  offset?: number;
}

export interface MemoryPage {
  items: MemoryItem[];
  total: number;
}

export interface RetrievalResult {
  memory: MemoryItem;
  similarity: number;  // Raw cosine similarity
}

export interface RetrievalOptions {
  topK?: number;
  minSimilarity?: number;
  isFromSuccess?: boolean;
}

export interface ConsolidationOptions {
  sourceTaskId: string;
  // Replace memories previously learned from the same source instead of adding
  replaceBySource: boolean;
}

export interface ConsolidationReport {
  titles: string[];      // Titles of the memories now holding the candidates
  added: number;
  replaced: number;
  deleted: number;       // Leftover memories of the same source that were removed
  evicted: string[];
}

export interface BackfillReport {
  updated: number;
  failed: number;
  skipped: number;
}

export interface TrajectoryStep {
  action: string;
  reasoning?: string;
  tool?: string;
  observation?: string;
}

export interface Trajectory {
  taskId: string;
  query: string;
  steps: TrajectoryStep[];
  finalAnswer?: string;
}

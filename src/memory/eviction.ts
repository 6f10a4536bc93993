import type { MemoryItem } from './types.js';

export type EvictionPolicyName = 'oldest' | 'failures-first';

/**
 * Chooses which memories to drop when the store is over capacity.
 * `protectedTitles` are never chosen (the items being added).
 */
export interface EvictionPolicy {
  readonly name: EvictionPolicyName;
  selectVictims(items: MemoryItem[], count: number, protectedTitles: ReadonlySet<string>): MemoryItem[];
}

function byCreatedAtAscending(a: MemoryItem, b: MemoryItem): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

export class OldestFirstEviction implements EvictionPolicy {
  readonly name = 'oldest';

  selectVictims(items: MemoryItem[], count: number, protectedTitles: ReadonlySet<string>): MemoryItem[] {
    return items
      .filter((item) => !protectedTitles.has(item.title))
      .sort(byCreatedAtAscending)
      .slice(0, Math.max(0, count));
  }
}

// Failure-derived memories go first (oldest first), then success-derived ones
export class FailuresFirstEviction implements EvictionPolicy {
  readonly name = 'failures-first';

  selectVictims(items: MemoryItem[], count: number, protectedTitles: ReadonlySet<string>): MemoryItem[] {
    return items
      .filter((item) => !protectedTitles.has(item.title))
      .sort((a, b) => {
        if (a.isFromSuccess !== b.isFromSuccess) return a.isFromSuccess ? 1 : -1;
        return byCreatedAtAscending(a, b);
      })
      .slice(0, Math.max(0, count));
  }
}

export function createEvictionPolicy(name: EvictionPolicyName): EvictionPolicy {
  switch (name) {
    case 'oldest':
      return new OldestFirstEviction();
    case 'failures-first':
      return new FailuresFirstEviction();
  }
}

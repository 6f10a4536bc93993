import { InvalidArgumentError } from '@commander-js/extra-typings';
import { findProjectRoot } from '../config/index.js';
import { createRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { exitWithError } from './ui.js';

export function requireProjectRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    throw new Error('Not in a formulation-memory project. Run `fm init` first.');
  }
  return root;
}

/**
 * Open the project runtime, run `fn`, wait for background work and close.
 * Any error is printed and exits with status 1.
 */
export async function withRuntime(fn: (runtime: Runtime) => Promise<void>): Promise<void> {
  try {
    const runtime = await createRuntime({ projectRoot: requireProjectRoot() });
    try {
      await fn(runtime);
    } finally {
      await runtime.close();
    }
  } catch (error) {
    exitWithError(error);
  }
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

// Repeatable key=value option
export function collectPair(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError('Expected key=value.');
  }
  return { ...previous, [value.slice(0, eq).trim()]: value.slice(eq + 1).trim() };
}

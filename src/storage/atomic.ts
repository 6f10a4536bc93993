import * as fs from 'fs/promises';
import * as path from 'path';
import { nanoid } from 'nanoid';
import { PersistenceError, errorMessage } from '../errors.js';

/**
 * Write a file by writing a sibling temp file and renaming it over the target.
 * Readers see either the previous or the new complete content.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.tmp.${process.pid}.${nanoid(6)}`);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmpPath, data, { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw new PersistenceError(`Failed to write ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}

export async function atomicWriteJson(filePath: string, value: unknown): Promise<void> {
  await atomicWriteFile(filePath, serializeJson(value));
}

export function serializeJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

/**
 * Read and parse a JSON file. Returns null when the file does not exist;
 * any other failure (unreadable, malformed) is a PersistenceError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw new PersistenceError(`Failed to read ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new PersistenceError(`Malformed JSON in ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

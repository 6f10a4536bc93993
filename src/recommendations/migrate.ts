import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import { compactTimestamp, projectEntry } from './store.js';
import type { RecommendationStore } from './store.js';
import type { IndexEntry, MigrationReport } from './types.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { silentLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';

export interface MigrateOptions {
  logger?: Logger;
  clock?: () => Date;
}

// An entry written before the listing fields existed lacks at least one of these
export function needsMigration(entry: IndexEntry): boolean {
  return entry.formulationSummary === undefined ||
    entry.confidence === undefined ||
    entry.performanceScore === undefined;
}

/**
 * Copy index.json to index_backup_<stamp>.json beside it. The copy never
 * overwrites an existing backup.
 */
export async function backupIndex(indexPath: string, now: Date): Promise<string> {
  const dir = path.dirname(indexPath);
  const stamp = compactTimestamp(now, true);

  for (let attempt = 0; attempt < 1000; attempt++) {
    const name = attempt === 0 ? `index_backup_${stamp}.json` : `index_backup_${stamp}_${attempt}.json`;
    const target = path.join(dir, name);
    try {
      await fs.copyFile(indexPath, target, fsConstants.COPYFILE_EXCL);
      return target;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') continue;
      throw new PersistenceError(`Failed to back up ${indexPath}: ${errorMessage(error)}`, target, { cause: error });
    }
  }

  throw new PersistenceError(`No free backup name for ${indexPath}`, indexPath);
}

/**
 * Fill in the listing fields of legacy index entries from their full records.
 *
 * The index is backed up first. Entries that already carry the fields are
 * left alone, so a second run changes nothing. Entries whose record is
 * missing or unreadable are counted as errors and left as they are.
 */
export async function migrateIndex(store: RecommendationStore, options: MigrateOptions = {}): Promise<MigrationReport> {
  const logger = (options.logger ?? silentLogger).child('migrate');
  const clock = options.clock ?? (() => new Date());

  return store.withIndex(async (index) => {
    const report: MigrationReport = {
      total: index.size,
      migrated: 0,
      skipped: 0,
      errors: 0,
      failedIds: [],
      backupPath: null,
    };

    try {
      await fs.access(store.indexPath);
    } catch {
      logger.info('No index to migrate', { path: store.indexPath });
      return report;
    }

    report.backupPath = await backupIndex(store.indexPath, clock());
    logger.info('Created backup', { path: report.backupPath });

    for (const [id, entry] of index) {
      if (!needsMigration(entry)) {
        report.skipped++;
        continue;
      }

      try {
        const rec = await store.readRecord(id);
        if (!rec) {
          logger.warn('Could not load recommendation', { id });
          report.errors++;
          report.failedIds.push(id);
          continue;
        }

        index.set(id, { ...projectEntry(rec), createdAt: entry.createdAt });
        report.migrated++;
        logger.debug('Migrated', { id });
      } catch (error) {
        logger.error('Error migrating recommendation', { id, error: errorMessage(error) });
        report.errors++;
        report.failedIds.push(id);
      }
    }

    await store.writeIndex(index);
    logger.info('Migration finished', {
      total: report.total,
      migrated: report.migrated,
      skipped: report.skipped,
      errors: report.errors,
    });
    return report;
  });
}

import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { migrateIndex } from '../../recommendations/migrate.js';
import { withRuntime } from '../context.js';
import { keyValue, success, warning } from '../ui.js';

export const migrateCommand = new Command('migrate-index')
  .description('Upgrade legacy recommendation index entries (backs up the index first)')
  .action(async () => {
    await withRuntime(async ({ recommendations, logger }) => {
      const report = await migrateIndex(recommendations, { logger });

      if (report.backupPath === null) {
        console.log(chalk.gray('No index file yet; nothing to migrate.'));
        return;
      }

      console.log(keyValue('Backup', report.backupPath));
      console.log(keyValue('Entries', String(report.total)));
      console.log(keyValue('Migrated', String(report.migrated)));
      console.log(keyValue('Skipped', String(report.skipped)));

      if (report.errors > 0) {
        console.log(warning(`${report.errors} entries could not be migrated: ${report.failedIds.join(', ')}`));
        process.exitCode = 1;
        return;
      }
      console.log(success('Index migrated'));
    });
  });

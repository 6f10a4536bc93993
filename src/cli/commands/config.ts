import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
  initProject,
} from '../../config/index.js';
import { requireProjectRoot } from '../context.js';
import { exitWithError, success } from '../ui.js';

export const configCommand = new Command('config')
  .description('Manage project configuration');

// fm config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., memory.maxItems)')
  .description('Get configuration value(s)')
  .action((key) => {
    try {
      const root = requireProjectRoot();
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          throw new Error(`Unknown config key: ${key}`);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// fm config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., feedback.maxWorkers)')
  .argument('<value>', 'New value ("null" clears a nullable key)')
  .description('Set a configuration value')
  .action((key, value) => {
    try {
      const root = requireProjectRoot();
      setConfigValue(key, value, root);
      console.log(success(`Set ${key} = ${formatValue(getConfigValue(key, root))}`));
    } catch (error) {
      exitWithError(error);
    }
  });

// fm config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    try {
      printConfigTree(loadConfig(requireProjectRoot()), '');
    } catch (error) {
      exitWithError(error);
    }
  });

// fm config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults')
  .option('-y, --yes', 'Skip confirmation')
  .action((options) => {
    try {
      const root = requireProjectRoot();
      if (!options.yes) {
        console.log(chalk.yellow('This will reset all configuration to defaults.'));
        console.log(chalk.gray('Use --yes to skip this confirmation.'));
        return;
      }
      initProject(root, true);
      console.log(success('Configuration reset to defaults'));
    } catch (error) {
      exitWithError(error);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function printConfigTree(obj: Record<string, unknown>, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (isRecord(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}

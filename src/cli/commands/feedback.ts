import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import type { ExperimentResultInput } from '../../feedback/types.js';
import { collectPair, parseNumber, withRuntime } from '../context.js';
import { icons, keyValue, success, warning } from '../ui.js';

export const feedbackCommand = new Command('feedback')
  .description('Report experiment results for recommendations');

// Property values that look numeric are stored as numbers
function toProperties(pairs: Record<string, string>): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(pairs)) {
    const asNumber = Number(value);
    properties[key] = value.trim() !== '' && Number.isFinite(asNumber) ? asNumber : value;
  }
  return properties;
}

// fm feedback submit <id>
feedbackCommand
  .command('submit')
  .argument('<id>', 'Recommendation id')
  .option('-s, --solubility <value>', 'Measured solubility', parseNumber)
  .option('-u, --unit <unit>', 'Solubility unit (g/L, mg/mL, mg/L, g/mL)', 'g/L')
  .option('--not-liquid', 'No liquid formed')
  .option('-p, --property <key=value>', 'Other measured property (repeatable)', collectPair, {})
  .option('--notes <text>', 'Free-form notes')
  .option('--experimenter <name>', 'Who ran the experiment')
  .description('Submit an experiment result and learn from it')
  .action(async (id, options) => {
    await withRuntime(async ({ feedback }) => {
      const input: ExperimentResultInput = {
        isLiquidFormed: !options.notLiquid,
        solubility: options.solubility ?? null,
        solubilityUnit: options.unit,
        properties: toProperties(options.property),
        notes: options.notes,
        experimenter: options.experimenter,
      };

      console.log(chalk.gray(`${icons.brain} Extracting memories...`));
      const outcome = await feedback.submitFeedback(id, input, { async: false });

      if (outcome.status === 'failed') {
        console.error(chalk.red(`${icons.failure} Processing failed: ${outcome.error}`));
        process.exitCode = 1;
        return;
      }

      for (const note of outcome.warnings) {
        console.log(warning(note));
      }
      console.log(success(outcome.isUpdate ? `Updated ${chalk.cyan(id)}` : `Completed ${chalk.cyan(id)}`));
      console.log(keyValue('Score', outcome.performanceScore.toFixed(2)));
      console.log(keyValue('Memories', String(outcome.numMemories)));
      for (const title of outcome.memoriesExtracted) {
        console.log(`  ${icons.dot} ${title}`);
      }
      if (outcome.deletedMemories > 0) {
        console.log(keyValue('Replaced', `${outcome.deletedMemories} stale memories removed`));
      }
    });
  });

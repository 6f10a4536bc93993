import { Command, Option } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { FormulationSchema } from '../../recommendations/schema.js';
import { RECOMMENDATION_STATUSES } from '../../recommendations/types.js';
import type { Formulation, TaskDescriptor } from '../../recommendations/types.js';
import { ValidationError } from '../../errors.js';
import { collectPair, parseInteger, parseNumber, withRuntime } from '../context.js';
import { emptyState, formatListing, formatRecommendation, header, success } from '../ui.js';

export const recCommand = new Command('rec')
  .description('Create, list and inspect recommendations');

function buildFormulation(options: { hba?: string; hbd?: string; ratio?: string; formulation?: string }): Formulation {
  if (options.formulation) {
    let raw: unknown;
    try {
      raw = JSON.parse(options.formulation);
    } catch {
      throw new ValidationError('--formulation must be a JSON object');
    }
    const parsed = FormulationSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid formulation: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
  }

  if (!options.hba || !options.hbd) {
    throw new ValidationError('Give --hba and --hbd (with --ratio), or --formulation <json>');
  }
  return {
    HBA: options.hba,
    HBD: options.hbd,
    molar_ratio: options.ratio ?? '1:1',
  };
}

function buildTask(description: string, options: { material: string; temperature?: number; constraint: Record<string, string> }): TaskDescriptor {
  return {
    description,
    targetMaterial: options.material,
    targetTemperature: options.temperature,
    constraints: Object.keys(options.constraint).length > 0 ? options.constraint : undefined,
  };
}

// fm rec create <description>
recCommand
  .command('create')
  .argument('<description>', 'What the formulation should achieve')
  .requiredOption('-m, --material <name>', 'Target material to dissolve')
  .option('-t, --temperature <celsius>', 'Target temperature in °C', parseNumber)
  .option('--constraint <key=value>', 'Task constraint (repeatable)', collectPair, {})
  .option('--hba <name>', 'Hydrogen bond acceptor')
  .option('--hbd <name>', 'Hydrogen bond donor')
  .option('--ratio <ratio>', 'Molar ratio HBA:HBD, e.g. 1:2')
  .option('--formulation <json>', 'Full formulation as JSON instead of --hba/--hbd')
  .requiredOption('-c, --confidence <n>', 'Confidence between 0 and 1', parseNumber)
  .option('-r, --reasoning <text>', 'Why this formulation')
  .description('Record a new recommendation (PENDING)')
  .action(async (description, options) => {
    await withRuntime(async ({ recommendations }) => {
      const rec = await recommendations.create(
        buildTask(description, options),
        buildFormulation(options),
        options.confidence,
        { reasoning: options.reasoning }
      );
      console.log(success(`Created recommendation ${chalk.cyan(rec.id)}`));
    });
  });

// fm rec list
recCommand
  .command('list')
  .addOption(new Option('-s, --status <status>', 'Filter by status').choices(RECOMMENDATION_STATUSES))
  .option('-m, --material <name>', 'Filter by target material (case-insensitive)')
  .option('-n, --limit <n>', 'Limit number of results', parseInteger, 50)
  .option('--offset <n>', 'Skip this many results', parseInteger, 0)
  .description('List recommendations, newest first')
  .action(async (options) => {
    await withRuntime(async ({ recommendations }) => {
      const page = recommendations.list({
        status: options.status,
        targetMaterial: options.material,
        limit: options.limit,
        offset: options.offset,
      });

      if (page.items.length === 0) {
        emptyState('No recommendations found.', 'Create one with `fm rec create`.');
        return;
      }

      console.log(chalk.bold(`\nRecommendations (${page.items.length} of ${page.total}):\n`));
      for (const entry of page.items) {
        console.log(formatListing(entry));
      }
      console.log();
    });
  });

// fm rec show <id>
recCommand
  .command('show')
  .argument('<id>', 'Recommendation id')
  .description('Show a recommendation in full')
  .action(async (id) => {
    await withRuntime(async ({ recommendations }) => {
      console.log(formatRecommendation(await recommendations.get(id)));
    });
  });

// fm rec cancel <id>
recCommand
  .command('cancel')
  .argument('<id>', 'Recommendation id')
  .description('Cancel a PENDING recommendation')
  .action(async (id) => {
    await withRuntime(async ({ recommendations }) => {
      await recommendations.cancel(id);
      console.log(success(`Cancelled ${chalk.cyan(id)}`));
    });
  });

// fm rec context <description>
recCommand
  .command('context')
  .argument('<description>', 'Task description')
  .requiredOption('-m, --material <name>', 'Target material')
  .option('-t, --temperature <celsius>', 'Target temperature in °C', parseNumber)
  .option('--constraint <key=value>', 'Task constraint (repeatable)', collectPair, {})
  .description('Show the context a formulation agent would get for a task')
  .action(async (description, options) => {
    await withRuntime(async ({ contextBuilder }) => {
      const context = await contextBuilder.build(buildTask(description, options));

      for (const message of context.messages) {
        console.log(header(message.role));
        console.log(message.content);
      }
      console.log(chalk.gray(`\n~${context.tokenEstimate} tokens, ${context.memories.length} memories, ${context.snippets.length} snippets`));
    });
  });

import * as fs from 'fs';
import { Command, Option } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { learnFromTrajectory, TrajectorySchema } from '../../memory/learning.js';
import { ValidationError } from '../../errors.js';
import { parseInteger, parseNumber, withRuntime } from '../context.js';
import { emptyState, formatMemory, formatSearchResult, header, icons, success, warning } from '../ui.js';

export const memoryCommand = new Command('memory')
  .description('Manage the memory bank');

function originFilter(options: { success?: boolean; failure?: boolean }): boolean | undefined {
  if (options.success && options.failure) {
    throw new ValidationError('Use either --success or --failure, not both');
  }
  if (options.success) return true;
  if (options.failure) return false;
  return undefined;
}

// fm memory list
memoryCommand
  .command('list')
  .description('List memories, newest first')
  .option('--success', 'Only memories learned from successes')
  .option('--failure', 'Only memories learned from failures')
  .option('-s, --source <id>', 'Only memories learned from this recommendation or task')
  .option('-n, --limit <n>', 'Limit number of results', parseInteger, 20)
  .option('--offset <n>', 'Skip this many results', parseInteger, 0)
  .action(async (options) => {
    await withRuntime(async ({ memories }) => {
      const page = memories.list({
        isFromSuccess: originFilter(options),
        sourceTaskId: options.source,
        limit: options.limit,
        offset: options.offset,
      });

      if (page.items.length === 0) {
        emptyState('No memories found.', 'Memories are learned from feedback, or add one with `fm memory add`.');
        return;
      }

      console.log(chalk.bold(`\nMemories (${page.items.length} of ${page.total}):\n`));
      for (const memory of page.items) {
        console.log(formatMemory(memory));
        console.log();
      }
    });
  });

// fm memory show <title>
memoryCommand
  .command('show')
  .argument('<title>', 'Exact memory title')
  .description('Show one memory in full')
  .action(async (title) => {
    await withRuntime(async ({ memories }) => {
      const memory = memories.getByTitle(title);
      console.log(formatMemory(memory, { full: true }));
      if (Object.keys(memory.metadata).length > 0) {
        console.log(chalk.gray(JSON.stringify(memory.metadata, null, 2)));
      }
    });
  });

// fm memory add <title>
memoryCommand
  .command('add')
  .argument('<title>', 'Unique title')
  .requiredOption('-d, --description <text>', 'One-line summary')
  .requiredOption('-c, --content <text>', 'The lesson itself')
  .option('--failure', 'Learned from a failure')
  .option('-s, --source <id>', 'Recommendation or task it was learned from')
  .description('Add a memory by hand')
  .action(async (title, options) => {
    await withRuntime(async ({ memories }) => {
      const memory = await memories.add({
        title,
        description: options.description,
        content: options.content,
        isFromSuccess: !options.failure,
        sourceTaskId: options.source ?? null,
        metadata: { extraction_mode: 'manual' },
      }, { computeEmbedding: true });

      console.log(success(`Added memory "${memory.title}"`));
      if (!memory.embedding) {
        console.log(warning('Stored without an embedding; run `fm memory backfill` later.'));
      }
    });
  });

// fm memory update <title>
memoryCommand
  .command('update')
  .argument('<title>', 'Exact memory title')
  .option('-d, --description <text>', 'New summary')
  .option('-c, --content <text>', 'New content')
  .addOption(new Option('--origin <origin>', 'Mark as learned from').choices(['success', 'failure'] as const))
  .description('Update a memory in place')
  .action(async (title, options) => {
    await withRuntime(async ({ memories }) => {
      const memory = await memories.update(title, {
        description: options.description,
        content: options.content,
        isFromSuccess: options.origin === undefined ? undefined : options.origin === 'success',
      });
      console.log(success(`Updated memory "${memory.title}"`));
    });
  });

// fm memory delete <title>
memoryCommand
  .command('delete')
  .argument('<title>', 'Exact memory title')
  .description('Delete a memory')
  .action(async (title) => {
    await withRuntime(async ({ memories }) => {
      const deleted = await memories.deleteByTitle(title);
      if (!deleted) {
        throw new Error(`Memory with title '${title}' not found`);
      }
      console.log(success(`Deleted memory "${title}"`));
    });
  });

// fm memory search <query>
memoryCommand
  .command('search')
  .argument('<query...>', 'Search query')
  .option('-k, --top-k <n>', 'Number of results', parseInteger, 5)
  .option('--min-similarity <n>', 'Drop results below this cosine similarity', parseNumber)
  .description('Search memories semantically')
  .action(async (query, options) => {
    const fullQuery = query.join(' ');

    await withRuntime(async ({ retriever }) => {
      const results = await retriever.retrieve(fullQuery, {
        topK: options.topK,
        minSimilarity: options.minSimilarity,
      });

      if (results.length === 0) {
        emptyState(`No memories match "${fullQuery}".`);
        return;
      }

      console.log(header(`Results for "${fullQuery}"`, icons.search));
      for (const result of results) {
        console.log(formatSearchResult(result));
        console.log();
      }
    });
  });

// fm memory backfill
memoryCommand
  .command('backfill')
  .option('-f, --force', 'Recompute every embedding, not only missing ones')
  .description('Compute missing embeddings')
  .action(async (options) => {
    await withRuntime(async ({ memories }) => {
      const report = await memories.backfillEmbeddings({ force: options.force });
      console.log(success(`Embedded ${report.updated} memories (${report.skipped} already had one)`));
      if (report.failed > 0) {
        console.log(warning(`${report.failed} memories could not be embedded`));
        process.exitCode = 1;
      }
    });
  });

// fm memory learn <file>
memoryCommand
  .command('learn')
  .argument('<file>', 'Trajectory JSON file ({ taskId, query, steps, finalAnswer })')
  .addOption(new Option('-o, --outcome <outcome>', 'How the run ended').choices(['success', 'failure'] as const).makeOptionMandatory())
  .description('Learn memories from an agent trajectory')
  .action(async (file, options) => {
    await withRuntime(async ({ extractor, memories }) => {
      const parsed = TrajectorySchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf-8')));
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ValidationError(`Invalid trajectory file: ${issues.join('; ')}`, issues);
      }

      const report = await learnFromTrajectory({ extractor, store: memories }, parsed.data, options.outcome);

      console.log(success(`${icons.brain} Learned ${report.titles.length} memories from ${parsed.data.taskId}`));
      for (const title of report.titles) {
        console.log(chalk.gray(`   ${icons.dot} ${title}`));
      }
    });
  });

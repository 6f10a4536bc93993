import { Command } from '@commander-js/extra-typings';
import { initCommand } from './commands/init.js';
import { configCommand } from './commands/config.js';
import { memoryCommand } from './commands/memory.js';
import { recCommand } from './commands/rec.js';
import { feedbackCommand } from './commands/feedback.js';
import { migrateCommand } from './commands/migrate.js';
import { statsCommand } from './commands/stats.js';
import { mcpCommand } from './commands/mcp.js';

export const program = new Command()
  .name('fm')
  .description('formulation-memory - recommendations, experiment feedback and learned memories')
  .version('0.1.0');

// Initialize a new project
program
  .command('init')
  .description('Initialize formulation-memory in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(initCommand);

program.addCommand(configCommand);

// fm memory list|show|add|update|delete|search|backfill|learn
program.addCommand(memoryCommand);

// fm rec create|list|show|cancel|context
program.addCommand(recCommand);

// fm feedback submit
program.addCommand(feedbackCommand);

program.addCommand(migrateCommand);
program.addCommand(statsCommand);
program.addCommand(mcpCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});

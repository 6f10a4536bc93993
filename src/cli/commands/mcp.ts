import { Command } from '@commander-js/extra-typings';
import { runMcpServer } from '../../mcp/index.js';
import { requireProjectRoot } from '../context.js';
import { exitWithError } from '../ui.js';

export const mcpCommand = new Command('mcp')
  .description('Serve the project over the Model Context Protocol (stdio)')
  .action(async () => {
    try {
      await runMcpServer(requireProjectRoot());
    } catch (error) {
      exitWithError(error);
    }
  });

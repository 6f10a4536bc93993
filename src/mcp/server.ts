/**
 * formulation-memory MCP server
 *
 * Exposes recommendations, feedback and memory to a formulation-design agent
 * over the Model Context Protocol (stdio). Logs go to stderr so stdout stays
 * free for the protocol.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { errorMessage } from '../errors.js';
import { TOOLS, callTool } from './tools.js';

export const SERVER_NAME = 'formulation-memory';
export const SERVER_VERSION = '0.1.0';

/**
 * Build a server bound to a runtime, without connecting a transport
 */
export function createMcpServer(runtime: Runtime): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    runtime.logger.debug('Tool call', { tool: name });
    return callTool(runtime, name, args ?? {});
  });

  return server;
}

/**
 * Run the server on stdio for the project at `projectRoot`
 */
export async function runMcpServer(projectRoot: string): Promise<void> {
  const runtime = await createRuntime({ projectRoot });
  const server = createMcpServer(runtime);

  const shutdown = () => {
    runtime.logger.info('Shutting down; waiting for feedback jobs', { active: runtime.feedback.activeJobs });
    runtime.close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        runtime.logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  runtime.logger.info('MCP server ready', { tools: TOOLS.length });
}

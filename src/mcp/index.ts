/**
 * MCP server for formulation-memory
 *
 * Lets a formulation-design agent record recommendations, report experiments
 * and search learned memories via Model Context Protocol.
 */

export { createMcpServer, runMcpServer } from './server.js';
export { TOOLS, callTool } from './tools.js';
export type { ToolDefinition, ToolResult, ToolRuntime } from './tools.js';

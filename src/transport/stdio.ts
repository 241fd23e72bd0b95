/**
 * Stdio transport for the harvester MCP server
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../domain/logger.js';
import type { HarvesterConfig } from '../config/env.js';
import { createMcpServer, type ServerDeps } from '../server.js';

/**
 * Start the MCP server with stdio transport
 */
export async function startStdioServer(config: HarvesterConfig, deps: ServerDeps = {}): Promise<McpServer> {
  logger.info('Initializing MCP server with stdio transport');

  const server = createMcpServer(config, deps);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('MCP server connected via stdio transport');

  return server;
}

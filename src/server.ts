/**
 * Shared MCP server factory
 * Creates the MCP server with the address tools, for both stdio and HTTP transports
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { logger } from './domain/logger.js';
import type { HarvesterConfig } from './config/env.js';
import { HarvestStore } from './store/db.js';
import { wrapTool } from './domain/tool-wrapper.js';
import {
  AddressNormalizeInputSchema,
  AddressPenaltyInputSchema,
  PipelineStatusInputSchema,
} from './addresses/schemas.js';
import { handleAddressNormalize } from './tools/address-normalize.js';
import { handleAddressPenalty } from './tools/address-penalty.js';
import { handlePipelineStatus, type StatusStore } from './tools/pipeline-status.js';

export interface ServerDeps {
  /** Store behind pipeline_status; `null` disables the tool, `undefined` opens config.storePath */
  store?: StatusStore | null;
}

export function openStatusStore(config: HarvesterConfig): StatusStore | null {
  try {
    const store = new HarvestStore(config.storePath);
    logger.info('Harvest store opened for pipeline_status', { path: config.storePath });
    return store;
  } catch (error) {
    logger.warn('Harvest store not available - pipeline_status tool will be disabled', {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Create and configure the MCP server
 * Returns the configured server (not yet connected to any transport)
 */
export function createMcpServer(config: HarvesterConfig, deps: ServerDeps = {}): McpServer {
  logger.info('Creating MCP server', {
    serverName: config.serverName,
    serverVersion: config.serverVersion,
  });

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.registerTool(
    'address_normalize',
    {
      description:
        'Compute the order-independent fingerprint and the first section of an address string. Two spellings of the same address share a fingerprint when they use the same words.',
      inputSchema: AddressNormalizeInputSchema.shape,
    },
    wrapTool('address_normalize', async (args: unknown) => {
      const input = AddressNormalizeInputSchema.parse(args);
      return handleAddressNormalize(input);
    })
  );

  logger.debug('Registered address_normalize tool');

  server.registerTool(
    'address_penalty',
    {
      description:
        'Score a set of address variants for duplication. Returns a penalty between 0 and 1 with full-text and first-section duplicate counts.',
      inputSchema: AddressPenaltyInputSchema.shape,
    },
    wrapTool('address_penalty', async (args: unknown) => {
      const input = AddressPenaltyInputSchema.parse(args);
      return handleAddressPenalty(input);
    })
  );

  logger.debug('Registered address_penalty tool');

  const store = deps.store === undefined ? openStatusStore(config) : deps.store;

  if (store) {
    server.registerTool(
      'pipeline_status',
      {
        description:
          'Report harvest progress: batch counts by status, country states and the number of validated addresses, optionally for one country.',
        inputSchema: PipelineStatusInputSchema.shape,
      },
      wrapTool('pipeline_status', async (args: unknown) => {
        const input = PipelineStatusInputSchema.parse(args);
        return handlePipelineStatus(input, store);
      })
    );

    logger.debug('Registered pipeline_status tool');
  } else {
    logger.info('Skipping pipeline_status tool registration (store not available)');
  }

  logger.info('MCP server created successfully', {
    tools: store ? 3 : 2,
  });

  return server;
}

/**
 * HTTP transport for the harvester MCP server
 * Express + StreamableHTTPServerTransport in stateless mode
 */

import type { Server } from 'node:http';
import express from 'express';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { logger } from '../domain/logger.js';
import { metrics } from '../domain/metrics.js';
import type { HarvesterConfig } from '../config/env.js';
import { createMcpServer, type ServerDeps } from '../server.js';

/**
 * Build the Express app serving /mcp, /health and /metrics
 */
export function createHttpApp(config: HarvesterConfig, deps: ServerDeps): express.Express {
  const app = express();
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', transport: 'http' });
  });

  app.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4');
    res.send(metrics.exportPrometheus());
  });

  // One server and transport per request; JSON-RPC ids from different clients may collide
  app.post('/mcp', async (req, res) => {
    try {
      const server = createMcpServer(config, deps);
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logger.warn('Error closing MCP transport', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request', {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: {
            code: -32603,
            message: 'Internal server error',
          },
          id: null,
        });
      }
    }
  });

  return app;
}

/**
 * Start the MCP server with HTTP transport
 */
export function startHttpServer(config: HarvesterConfig, deps: ServerDeps = {}): Server {
  const port = config.harvesterPort;
  if (!port) {
    throw new Error('HARVESTER_PORT must be set for HTTP transport');
  }

  logger.info('Initializing MCP server with HTTP transport', { port });

  const app = createHttpApp(config, deps);

  return app
    .listen(port, () => {
      logger.info('MCP server listening on HTTP transport', {
        port,
        endpoint: `http://localhost:${port}/mcp`,
        health: `http://localhost:${port}/health`,
        metrics: `http://localhost:${port}/metrics`,
      });
    })
    .on('error', (error) => {
      logger.error('HTTP server error', { error: error.message });
      process.exit(1);
    });
}

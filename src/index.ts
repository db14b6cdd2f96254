#!/usr/bin/env node

import { Server } from 'node:http';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createApp } from './app.js';
import { loadConfig } from './services/config.js';
import { errorMessage } from './services/errors.js';
import { KnowledgeGraphManager } from './services/knowledgeGraphManager.js';
import { Logger } from './services/logger.js';
import { McpServerService } from './services/mcpServerService.js';
import { createRemoteFetcher } from './services/remoteFetchers.js';
import { SERVER_VERSION } from './services/utils/mcpUtils.js';

async function main(): Promise<void> {
  const config = loadConfig();
  // stdout carries the protocol in stdio mode
  const logger = new Logger({ level: config.logLevel, useStderr: config.transport === 'stdio' });
  const manager = await KnowledgeGraphManager.create(config, logger, entry => createRemoteFetcher(entry, {
    logger: logger.child('remote'),
    maxCost: config.defaultMaxCost,
  }));

  let httpServer: Server | undefined;
  let closeMcp: (() => Promise<void>) | undefined;

  if (config.transport === 'stdio') {
    const server = new McpServerService(manager, logger.child('mcp')).getServer();
    await server.connect(new StdioServerTransport());
    closeMcp = () => server.close();
    logger.info('Context Graph MCP Server listening on stdio', { version: SERVER_VERSION });
  } else {
    const app = createApp(manager, logger);
    httpServer = app.listen(config.port, config.host, () => {
      logger.info('Context Graph MCP Server started', {
        host: config.host,
        port: config.port,
        nodeEnv: config.nodeEnv,
        storage: config.storage.kind,
        version: SERVER_VERSION
      });
    });
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);

    try {
      if (httpServer) {
        const server = httpServer;
        await new Promise<void>((resolve, reject) => {
          server.close(error => (error ? reject(error) : resolve()));
          server.closeAllConnections();
        });
      }
      await closeMcp?.();
      await manager.close();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

main().catch((error: unknown) => {
  console.error(`[ERROR] ${new Date().toISOString()} - Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});

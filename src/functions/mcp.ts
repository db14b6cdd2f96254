import { Express, Request, Response } from 'express';
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { KnowledgeGraphManager } from '../services/knowledgeGraphManager.js';
import { Logger } from '../services/logger.js';
import { McpServerService } from '../services/mcpServerService.js';

function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).json({
    jsonrpc: "2.0",
    error: { code: -32000, message: "Method not allowed: this MCP endpoint is stateless and accepts POST only" },
    id: null
  });
}

/**
 * Stateless Streamable HTTP endpoint: a fresh server and transport per request
 */
export function registerMcpRoutes(app: Express, manager: KnowledgeGraphManager, logger: Logger): void {
  app.post('/mcp', async (req: Request, res: Response) => {
    const requestId = req.get('x-request-id');

    try {
      logger.debug('MCP request received', { requestId });

      const server = new McpServerService(manager, logger).getServer();
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

      res.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logger.warn('Failed to close MCP transport', error);
        });
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);

      logger.debug('MCP request completed', { requestId });
    } catch (error) {
      logger.error('Error handling MCP request', { requestId, error });

      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null
        });
      }
    }
  });

  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);
}

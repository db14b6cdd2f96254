import express, { Express, NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { registerGraphRoutes } from './functions/graph.js';
import { registerHealthRoute } from './functions/health.js';
import { registerMcpRoutes } from './functions/mcp.js';
import { registerReadyRoute } from './functions/ready.js';
import { KnowledgeGraphManager } from './services/knowledgeGraphManager.js';
import { Logger } from './services/logger.js';

/**
 * Express app with the MCP endpoint, health checks and visualization routes
 */
export function createApp(manager: KnowledgeGraphManager, logger: Logger): Express {
  const app = express();
  const httpLogger = logger.child('http');

  // Middleware
  app.use(express.json({ limit: '10mb' }));
  app.use((req: Request, _res: Response, next: NextFunction) => {
    const requestId = req.get('x-request-id') ?? randomUUID();
    req.headers['x-request-id'] = requestId;
    httpLogger.debug(`Request: ${req.method} ${req.path}`, { requestId, userAgent: req.get('User-Agent') });
    next();
  });

  registerHealthRoute(app, manager, httpLogger);
  registerReadyRoute(app);
  registerGraphRoutes(app, manager, httpLogger);
  registerMcpRoutes(app, manager, logger.child('mcp'));

  return app;
}

import { Express, Request, Response } from 'express';
import { KnowledgeGraphManager } from '../services/knowledgeGraphManager.js';
import { Logger } from '../services/logger.js';
import { SERVER_VERSION } from '../services/utils/mcpUtils.js';

export function registerHealthRoute(app: Express, manager: KnowledgeGraphManager, logger: Logger): void {
  app.get('/health', async (_req: Request, res: Response) => {
    try {
      const stats = await manager.getStats();
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: SERVER_VERSION,
        stats,
        environment: process.env.NODE_ENV || 'production'
      });
    } catch (error) {
      logger.error('Health check failed', error);
      res.status(500).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: 'Health check failed'
      });
    }
  });
}

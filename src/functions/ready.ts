import { Express, Request, Response } from 'express';
import { SERVER_VERSION } from '../services/utils/mcpUtils.js';

/**
 * Readiness check; routes are only registered once storage is initialized
 */
export function registerReadyRoute(app: Express): void {
  app.get('/ready', (_req: Request, res: Response) => {
    res.json({
      status: 'ready',
      timestamp: new Date().toISOString(),
      version: SERVER_VERSION
    });
  });
}

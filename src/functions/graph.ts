import { Express, Request, Response } from 'express';
import { z } from 'zod';
import { errorMessage, httpStatusFor, KnowledgeGraphError } from '../services/errors.js';
import { KnowledgeGraphManager } from '../services/knowledgeGraphManager.js';
import { Logger } from '../services/logger.js';
import { streamEvents } from './eventStream.js';

const navigateBodySchema = z.object({
  uri: z.string().min(1),
  maxCost: z.number().optional(),
});

function sendError(res: Response, logger: Logger, message: string, error: unknown): void {
  const status = httpStatusFor(error);
  if (status >= 500) {
    logger.error(message, error);
  }
  res.status(status).json({
    error: `${message}: ${errorMessage(error)}`,
    code: error instanceof KnowledgeGraphError ? error.code : 'INTERNAL_ERROR',
    details: error instanceof KnowledgeGraphError ? error.details : undefined
  });
}

/**
 * Read endpoints and change stream for the visualization client
 */
export function registerGraphRoutes(app: Express, manager: KnowledgeGraphManager, logger: Logger): void {
  // Active context snapshot
  app.get('/api/graph', async (_req: Request, res: Response) => {
    try {
      res.json(await manager.getActiveContext());
    } catch (error) {
      sendError(res, logger, 'Failed to read active context', error);
    }
  });

  // Traverse from a node the user clicked
  app.post('/api/navigate', async (req: Request, res: Response) => {
    const body = navigateBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        error: 'Invalid navigate request',
        code: 'INVALID_INPUT',
        details: { issues: body.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
      });
      return;
    }

    try {
      res.json(await manager.traverse(body.data.uri, { maxCost: body.data.maxCost }));
    } catch (error) {
      sendError(res, logger, 'Failed to navigate', error);
    }
  });

  // Server-Sent Events push channel
  app.get('/api/events', (req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
    });

    const close = streamEvents(res, manager, logger);
    logger.debug('Event stream opened');
    req.on('close', () => {
      close();
      logger.debug('Event stream closed');
    });
  });
}

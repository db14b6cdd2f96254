import { BaseMcpHandler, McpHandlerResult } from './baseMcpHandler.js';
import { createHandlerExport } from './handlerFactory.js';
import { EmptyArgs } from '../utils/mcpUtils.js';

// Get Stats Handler
class GetStatsHandler extends BaseMcpHandler<EmptyArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.getStats(),
      'Failed to get stats'
    );
  }
}

// Read Graph Handler
class ReadGraphHandler extends BaseMcpHandler<EmptyArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.readGraph(),
      'Failed to read graph'
    );
  }
}

export const getStats = createHandlerExport(GetStatsHandler);
export const readGraph = createHandlerExport(ReadGraphHandler);

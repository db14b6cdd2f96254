import { BaseMcpHandler, McpHandlerResult } from './baseMcpHandler.js';
import { createHandlerExport } from './handlerFactory.js';
import { EmptyArgs, NodeArgs } from '../utils/mcpUtils.js';

class GetActiveContextHandler extends BaseMcpHandler<EmptyArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.getActiveContext(),
      'Failed to get active context'
    );
  }
}

class AddToActiveContextHandler extends BaseMcpHandler<NodeArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.addToActiveContext(this.args.uri),
      'Failed to add to active context'
    );
  }
}

class ClearActiveContextHandler extends BaseMcpHandler<EmptyArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.clearActiveContext(),
      'Failed to clear active context'
    );
  }
}

export const getActiveContext = createHandlerExport(GetActiveContextHandler);
export const addToActiveContext = createHandlerExport(AddToActiveContextHandler);
export const clearActiveContext = createHandlerExport(ClearActiveContextHandler);

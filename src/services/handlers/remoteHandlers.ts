import { BaseMcpHandler, McpHandlerResult } from './baseMcpHandler.js';
import { createHandlerExport } from './handlerFactory.js';
import { EmptyArgs, NodeArgs, ResolveConflictArgs } from '../utils/mcpUtils.js';

class FetchRemoteSubgraphHandler extends BaseMcpHandler<NodeArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.fetchRemoteSubgraph(this.args.uri),
      'Failed to fetch remote subgraph'
    );
  }
}

class ListConflictsHandler extends BaseMcpHandler<EmptyArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.listConflicts(),
      'Failed to list conflicts'
    );
  }
}

class ResolveConflictHandler extends BaseMcpHandler<ResolveConflictArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.resolveConflict(this.args.uri, this.args.resolution),
      'Failed to resolve conflict'
    );
  }
}

export const fetchRemoteSubgraph = createHandlerExport(FetchRemoteSubgraphHandler);
export const listConflicts = createHandlerExport(ListConflictsHandler);
export const resolveConflict = createHandlerExport(ResolveConflictHandler);

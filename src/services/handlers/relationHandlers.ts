import { BaseMcpHandler, McpHandlerResult } from './baseMcpHandler.js';
import { createHandlerExport } from './handlerFactory.js';
import { LinkArgs, NodeArgs, UnlinkArgs } from '../utils/mcpUtils.js';

// Link Handler
class LinkHandler extends BaseMcpHandler<LinkArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(async () => {
      const { relation, created, warnings } = await this.manager.link(this.args);
      return { relation, created, warnings };
    }, 'Failed to link nodes');
  }
}

// Unlink Handler
class UnlinkHandler extends BaseMcpHandler<UnlinkArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.unlink(this.args),
      'Failed to unlink nodes'
    );
  }
}

// Get Relations Handler
class GetRelationsHandler extends BaseMcpHandler<NodeArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.getRelations(this.args.uri),
      'Failed to get relations'
    );
  }
}

export const link = createHandlerExport(LinkHandler);
export const unlink = createHandlerExport(UnlinkHandler);
export const getRelations = createHandlerExport(GetRelationsHandler);

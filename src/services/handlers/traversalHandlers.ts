import { BaseMcpHandler, McpHandlerResult } from './baseMcpHandler.js';
import { createHandlerExport } from './handlerFactory.js';
import { ExportSubgraphArgs, TraverseArgs } from '../utils/mcpUtils.js';

class TraverseHandler extends BaseMcpHandler<TraverseArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.traverse(this.args.seedUri, { maxCost: this.args.maxCost }),
      'Failed to traverse'
    );
  }
}

class ExportSubgraphHandler extends BaseMcpHandler<ExportSubgraphArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.exportSubgraph(this.args.seedUri, this.args.maxCost),
      'Failed to export subgraph'
    );
  }
}

export const traverse = createHandlerExport(TraverseHandler);
export const exportSubgraph = createHandlerExport(ExportSubgraphHandler);

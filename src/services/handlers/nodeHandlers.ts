import { BaseMcpHandler, McpHandlerResult } from './baseMcpHandler.js';
import { createHandlerExport } from './handlerFactory.js';
import {
  AddConceptArgs,
  MoveConceptArgs,
  NodeArgs,
  UpdateConceptArgs,
} from '../utils/mcpUtils.js';

class AddConceptHandler extends BaseMcpHandler<AddConceptArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.addConcept(this.args),
      'Failed to add concept'
    );
  }
}

class GetNodeHandler extends BaseMcpHandler<NodeArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.getNode(this.args.uri),
      'Failed to get node'
    );
  }
}

class UpdateConceptHandler extends BaseMcpHandler<UpdateConceptArgs> {
  async execute(): Promise<McpHandlerResult> {
    const { uri, ...changes } = this.args;
    return this.executeWithErrorHandling(
      () => this.manager.updateConcept(uri, changes),
      'Failed to update concept'
    );
  }
}

class MoveConceptHandler extends BaseMcpHandler<MoveConceptArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.moveConcept(this.args.oldUri, this.args.newUri),
      'Failed to move concept'
    );
  }
}

class DeleteNodeHandler extends BaseMcpHandler<NodeArgs> {
  async execute(): Promise<McpHandlerResult> {
    return this.executeWithErrorHandling(
      () => this.manager.deleteNode(this.args.uri),
      'Failed to delete node'
    );
  }
}

export const addConcept = createHandlerExport(AddConceptHandler);
export const getNode = createHandlerExport(GetNodeHandler);
export const updateConcept = createHandlerExport(UpdateConceptHandler);
export const moveConcept = createHandlerExport(MoveConceptHandler);
export const deleteNode = createHandlerExport(DeleteNodeHandler);

import { BaseMcpHandler, HandlerDeps, McpHandlerResult, executeMcpHandler } from './baseMcpHandler.js';

export type HandlerExport<TArgs> = (args: TArgs, deps: HandlerDeps) => Promise<McpHandlerResult>;

/**
 * Factory function for handler exports
 * Eliminates repetitive export function declarations
 */
export function createHandlerExport<TArgs>(
  HandlerClass: new (deps: HandlerDeps, args: TArgs) => BaseMcpHandler<TArgs>
): HandlerExport<TArgs> {
  return async function(args: TArgs, deps: HandlerDeps): Promise<McpHandlerResult> {
    return await executeMcpHandler(HandlerClass, deps, args);
  };
}

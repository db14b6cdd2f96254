import { KnowledgeGraphError } from '../errors.js';
import { KnowledgeGraphManager } from '../knowledgeGraphManager.js';
import { Logger } from '../logger.js';
import { formatErrorResponse, formatSuccessResponse } from '../utils/mcpUtils.js';

export interface HandlerDeps {
  manager: KnowledgeGraphManager;
  logger: Logger;
}

export interface McpHandlerResult {
  text: string;
  isError: boolean;
}

/**
 * Base class for MCP tool handlers
 * Arguments arrive already validated against the tool's input schema
 */
export abstract class BaseMcpHandler<TArgs> {
  protected readonly manager: KnowledgeGraphManager;
  protected readonly logger: Logger;
  protected readonly args: TArgs;

  constructor(deps: HandlerDeps, args: TArgs) {
    this.manager = deps.manager;
    this.logger = deps.logger;
    this.args = args;
  }

  /**
   * Standard success response
   */
  protected successResponse(data: unknown): McpHandlerResult {
    return { text: formatSuccessResponse(data), isError: false };
  }

  /**
   * Standard error response
   */
  protected errorResponse(message: string, error: unknown): McpHandlerResult {
    return { text: formatErrorResponse(message, error), isError: true };
  }

  /**
   * Execute handler with standard error handling
   */
  protected async executeWithErrorHandling<T>(
    operation: () => Promise<T> | T,
    errorMessage: string
  ): Promise<McpHandlerResult> {
    try {
      const result = await operation();
      return this.successResponse(result);
    } catch (error) {
      // Domain errors are the caller's to fix; anything else is ours
      if (error instanceof KnowledgeGraphError) {
        this.logger.warn(errorMessage, { code: error.code, message: error.message });
      } else {
        this.logger.error(errorMessage, error);
      }
      return this.errorResponse(errorMessage, error);
    }
  }

  /**
   * Abstract method that subclasses must implement
   */
  abstract execute(): Promise<McpHandlerResult>;
}

/**
 * Create and execute an MCP handler
 */
export async function executeMcpHandler<TArgs>(
  HandlerClass: new (deps: HandlerDeps, args: TArgs) => BaseMcpHandler<TArgs>,
  deps: HandlerDeps,
  args: TArgs
): Promise<McpHandlerResult> {
  const handler = new HandlerClass(deps, args);
  return await handler.execute();
}

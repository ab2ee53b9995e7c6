import { randomUUID } from 'node:crypto';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { type Logger } from 'pino';

import { isCallerFacingError } from '../../errors/retrieval-errors';
import { toolHandlers } from '../../mcp/tool-handlers';
import { RETRIEVAL_MCP_TOOLS } from '../../mcp/tools';
import { type McpTool } from '../../mcp/types';
import { type ToolHandlerContext } from '../../mcp/types/sdk-custom';
import {
  createToolErrorPayload,
  toToolErrorResult,
  toToolResult,
} from '../../mcp/utils/error-utils';
import { createZodRawShape } from '../../mcp/utils/schema-utils';
import { type RetrievalService } from '../../services/retrieval.service';
import { createPerformanceLogger, logError } from '../../utils/logger';

/**
 * Service responsible for registering MCP tools with a server
 * Handles tool registration, execution, and error reporting
 */
export class ToolRegistrationService {
  constructor(
    private readonly retrievalService: RetrievalService,
    private readonly logger: Logger,
    private readonly tools: McpTool[] = RETRIEVAL_MCP_TOOLS,
  ) {}

  /**
   * Register all MCP tools with the given server
   */
  registerTools(mcpServer: McpServer): void {
    for (const tool of this.tools) {
      this.logger.debug({ toolName: tool.name }, `Registering tool: ${tool.name}`);

      mcpServer.registerTool(
        tool.name,
        {
          title: tool.title,
          description: tool.description,
          inputSchema: createZodRawShape(tool),
          annotations: tool.annotations,
        },
        async (args: Record<string, unknown>): Promise<CallToolResult> =>
          this.executeTool(tool.name, args),
      );
    }

    this.logger.debug({ toolCount: this.tools.length }, `Registered ${this.tools.length} tools`);
  }

  /**
   * Execute a tool handler with proper error handling and context.
   * Failures never reject: they become MCP error results.
   */
  async executeTool(toolName: string, args: Record<string, unknown>): Promise<CallToolResult> {
    const toolPerfLogger = createPerformanceLogger(this.logger, `tool-${toolName}`);
    const context = this.createToolHandlerContext(toolName);

    context.logger.debug({ args }, `Executing tool: ${toolName}`);

    try {
      const handler = toolHandlers[toolName];
      if (!handler) {
        throw new Error(`No handler found for tool: ${toolName}`);
      }

      const result = await handler(args, context, this.retrievalService);
      toolPerfLogger.complete({ success: true });

      return toToolResult(result);
    } catch (error) {
      toolPerfLogger.fail(error);

      const payload = createToolErrorPayload(error, context.requestId);
      if (isCallerFacingError(error)) {
        context.logger.warn({ code: error.code, error: error.message }, 'Tool call rejected');
      } else {
        logError(context.logger, error, { operation: 'tool-execution', errorId: payload.errorId });
      }

      return toToolErrorResult(payload);
    }
  }

  /**
   * Create tool handler context
   */
  private createToolHandlerContext(toolName: string): ToolHandlerContext {
    const requestId = randomUUID();
    return {
      logger: this.logger.child({ tool: toolName, requestId }),
      requestId,
    };
  }

  /**
   * Get list of registered tools
   */
  getRegisteredTools(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  /**
   * Check if a tool is registered
   */
  isToolRegistered(toolName: string): boolean {
    return this.tools.some((tool) => tool.name === toolName);
  }
}

/**
 * MCP Tool Definitions - Type Definitions
 * Shapes used to declare tools to MCP clients
 * See: https://modelcontextprotocol.io
 */

/**
 * One tool parameter. Both tools take a single string argument.
 */
export interface McpToolProperty {
  type: 'string';
  description: string;
}

/**
 * MCP Tool Interface
 * Base interface for all MCP tools
 */
export interface McpTool {
  name: string;
  title: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, McpToolProperty>;
    required: string[];
  };
  annotations: {
    title: string;
    readOnlyHint: boolean;
    destructiveHint: boolean;
    idempotentHint: boolean;
    openWorldHint: boolean;
  };
}

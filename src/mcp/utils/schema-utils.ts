/**
 * Shared utility functions for MCP schema handling
 */

import { z } from 'zod';

import { type McpTool } from '../types';

/**
 * Creates a Zod raw shape object for a tool's parameters based on its JSON schema definition.
 *
 * This function converts JSON schema properties to Zod types for use with the MCP SDK's
 * registerTool() method. Emptiness is left to the retrieval service.
 */
export function createZodRawShape(tool: Pick<McpTool, 'parameters'>): Record<string, z.ZodTypeAny> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [propName, prop] of Object.entries(tool.parameters.properties)) {
    const zodType = z.string().describe(prop.description);
    shape[propName] = tool.parameters.required.includes(propName) ? zodType : zodType.optional();
  }

  return shape;
}

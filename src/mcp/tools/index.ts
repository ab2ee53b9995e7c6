/**
 * MCP Tools - Index File
 */

export { searchTool } from './search-tool';
export { fetchTool } from './fetch-tool';

import { fetchTool } from './fetch-tool';
import { searchTool } from './search-tool';

import { type McpTool } from '../types';

/**
 * Tools broadcast by every server instance
 */
export const RETRIEVAL_MCP_TOOLS: McpTool[] = [searchTool, fetchTool];

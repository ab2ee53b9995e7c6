import { type McpTool } from '../types';

/**
 * Fetch Tool
 * Retrieves the full content of a document returned by search
 */
export const fetchTool: McpTool = {
  name: 'fetch',
  title: 'Fetch document',
  description:
    'Retrieve the full text of a document by the id a search result returned, together with its title, url and metadata.',
  parameters: {
    type: 'object',
    properties: {
      id: {
        type: 'string',
        description: 'Document identifier from a search result',
      },
    },
    required: ['id'],
  },
  annotations: {
    title: 'Fetch',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};

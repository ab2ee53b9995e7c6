import { type McpTool } from '../types';

/**
 * Search Tool
 * Semantic search over the documents of the configured vector store
 */
export const searchTool: McpTool = {
  name: 'search',
  title: 'Search documents',
  description: `Search the document collection for passages relevant to a query.
Returns a ranked list of results, each with:
- id: document identifier, pass it to the fetch tool for the full text
- title: document title or file name
- text: excerpt supporting the match
- url: link to the document`,
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Natural-language search query',
      },
    },
    required: ['query'],
  },
  annotations: {
    title: 'Search',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: true,
  },
};

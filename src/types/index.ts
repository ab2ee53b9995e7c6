/**
 * Retrieval domain types returned to MCP clients
 */

/**
 * A ranked hit from the vector store, in backend order
 */
export interface SearchResult {
  id: string;
  title: string;
  /** Excerpt backing the hit */
  text: string;
  url: string;
}

export interface SearchResponse {
  results: SearchResult[];
}

/**
 * Full content of a vector store file
 */
export interface Document {
  id: string;
  title: string;
  text: string;
  url: string;
  metadata?: Record<string, string>;
}

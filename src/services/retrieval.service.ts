import { type Logger } from 'pino';

import { type AppConfig } from '../config/app-config';
import {
  extractCitations,
  fileObjectSchema,
  parseVendorPayload,
  toAssistantSearchResults,
  toDocument,
  toVectorStoreSearchResults,
  type FileObject,
} from '../backend/vendor-schema';
import { type VectorStoreGateway } from '../backend/vector-store-gateway.interface';
import { BackendError, InvalidInputError, NotFoundError } from '../errors/retrieval-errors';
import { type Document, type SearchResponse, type SearchResult } from '../types';
import { loggers } from '../utils/logger';

/**
 * Retrieval adapter between the MCP tools and the hosted vector store.
 *
 * Holds nothing but the immutable configuration and the gateway, so concurrent
 * tool calls never share mutable state.
 */
export class RetrievalService {
  private readonly logger: Logger;

  constructor(
    private readonly config: AppConfig,
    private readonly gateway: VectorStoreGateway,
    logger?: Logger,
  ) {
    this.logger = logger ?? loggers.retrieval();
  }

  /**
   * Search the vector store. An empty result list is a valid outcome; any
   * backend failure rejects with BackendError and no partial results.
   */
  async search(query: unknown): Promise<SearchResponse> {
    const text = requireNonEmpty(query, 'query');
    this.logger.info({ mode: this.config.searchMode, query: text }, 'Searching vector store');

    try {
      const results =
        this.config.searchMode === 'assistant'
          ? await this.searchWithAssistant(text)
          : toVectorStoreSearchResults(
              await this.gateway.searchVectorStore(text, this.config.maxSearchResults),
              { snippetLength: this.config.snippetLength },
            );

      this.logger.info({ resultCount: results.length }, 'Search completed');
      return { results };
    } catch (error) {
      if (error instanceof BackendError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Search failed: ${detail}`, { cause: error });
    }
  }

  /**
   * Fetch the full content of a file previously returned by search
   */
  async fetch(id: unknown): Promise<Document> {
    const fileId = requireNonEmpty(id, 'id');
    this.logger.info({ fileId }, 'Fetching document');

    try {
      // Membership check first so files outside the store read as NotFound
      const vectorStoreFile = await this.gateway.retrieveVectorStoreFile(fileId);
      const [file, content] = await Promise.all([
        this.gateway.retrieveFileMetadata(fileId),
        this.gateway.retrieveFileContent(fileId),
      ]);

      const document = toDocument(fileId, { file, vectorStoreFile, content });
      this.logger.info({ fileId, length: document.text.length }, 'Fetched document');
      return document;
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof BackendError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new BackendError(`Fetch failed: ${detail}`, { cause: error });
    }
  }

  private async searchWithAssistant(query: string): Promise<SearchResult[]> {
    const citations = extractCitations(await this.gateway.askAssistant(query));
    const fileIds = [...new Set(citations.map((citation) => citation.fileId))];

    const files = new Map<string, FileObject>();
    for (const fileId of fileIds) {
      const file = parseVendorPayload(
        fileObjectSchema,
        await this.gateway.retrieveFileMetadata(fileId),
        'file object',
      );
      files.set(fileId, file);
    }

    return toAssistantSearchResults(citations, files, {
      snippetLength: this.config.snippetLength,
    });
  }
}

function requireNonEmpty(value: unknown, name: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidInputError(`${name} must be a non-empty string`);
  }
  return value.trim();
}

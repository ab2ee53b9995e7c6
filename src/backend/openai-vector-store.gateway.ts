import OpenAI from 'openai';
import { type Logger } from 'pino';

import { type AppConfig } from '../config/app-config';
import { BackendError, NotFoundError, RetrievalError } from '../errors/retrieval-errors';
import { loggers } from '../utils/logger';
import { type VectorStoreGateway } from './vector-store-gateway.interface';

/**
 * Map a vendor failure onto the retrieval error taxonomy.
 * A 404 is only meaningful when the call was about a specific file.
 */
export function classifyVendorError(
  error: unknown,
  operation: string,
  fileId?: string,
): RetrievalError {
  if (error instanceof RetrievalError) {
    return error;
  }
  if (fileId !== undefined && error instanceof OpenAI.APIError && error.status === 404) {
    return new NotFoundError(fileId, { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new BackendError(`${operation} failed: ${detail}`, { cause: error });
}

/**
 * The slice of the OpenAI client the gateway calls. `OpenAI` satisfies it.
 */
export interface OpenAIVendorClient {
  beta: {
    threads: {
      create(body: {
        tool_resources: { file_search: { vector_store_ids: string[] } };
      }): PromiseLike<{ id: string }>;
      del(threadId: string): PromiseLike<unknown>;
      messages: {
        create(threadId: string, body: { role: 'user'; content: string }): PromiseLike<unknown>;
        list(threadId: string, query: { run_id: string; order: 'asc' }): PromiseLike<{ data: unknown }>;
      };
      runs: {
        createAndPoll(
          threadId: string,
          body: { assistant_id: string },
        ): PromiseLike<{ id: string; status: string; last_error: unknown }>;
      };
    };
  };
  vectorStores: {
    search(
      vectorStoreId: string,
      body: { query: string; max_num_results: number },
    ): PromiseLike<{ data: unknown }>;
    files: {
      retrieve(vectorStoreId: string, fileId: string): PromiseLike<unknown>;
      content(vectorStoreId: string, fileId: string): PromiseLike<{ data: unknown }>;
    };
  };
  files: {
    retrieve(fileId: string): PromiseLike<unknown>;
  };
}

/**
 * VectorStoreGateway backed by the OpenAI Assistants and Vector Stores APIs
 */
export class OpenAIVectorStoreGateway implements VectorStoreGateway {
  private readonly client: OpenAIVendorClient;
  private readonly logger: Logger;

  constructor(
    private readonly config: AppConfig,
    client?: OpenAIVendorClient,
  ) {
    // No retries: a failed vendor call fails the whole operation
    this.client = client ?? new OpenAI({ apiKey: config.openaiApiKey, maxRetries: 0 });
    this.logger = loggers.gateway();
  }

  async askAssistant(query: string): Promise<unknown> {
    const assistantId = this.config.assistantId;
    if (!assistantId) {
      throw new BackendError('Assistant search requested but no assistant is configured');
    }

    return this.callVendor('assistant search', async () => {
      const thread = await this.client.beta.threads.create({
        tool_resources: { file_search: { vector_store_ids: [this.config.vectorStoreId] } },
      });
      this.logger.debug({ threadId: thread.id }, 'Created search thread');

      try {
        await this.client.beta.threads.messages.create(thread.id, {
          role: 'user',
          content: query,
        });

        const run = await this.client.beta.threads.runs.createAndPoll(thread.id, {
          assistant_id: assistantId,
        });
        if (run.status !== 'completed') {
          throw new BackendError(`Assistant run ${run.id} ended with status '${run.status}'`, {
            cause: run.last_error ?? undefined,
          });
        }

        const messages = await this.client.beta.threads.messages.list(thread.id, {
          run_id: run.id,
          order: 'asc',
        });
        return messages.data;
      } finally {
        await this.deleteThread(thread.id);
      }
    });
  }

  async searchVectorStore(query: string, maxResults: number): Promise<unknown> {
    return this.callVendor('vector store search', async () => {
      const page = await this.client.vectorStores.search(this.config.vectorStoreId, {
        query,
        max_num_results: maxResults,
      });
      return page.data;
    });
  }

  async retrieveFileMetadata(fileId: string): Promise<unknown> {
    return this.callVendor('file lookup', () => this.client.files.retrieve(fileId), fileId);
  }

  async retrieveVectorStoreFile(fileId: string): Promise<unknown> {
    return this.callVendor(
      'vector store file lookup',
      () => this.client.vectorStores.files.retrieve(this.config.vectorStoreId, fileId),
      fileId,
    );
  }

  async retrieveFileContent(fileId: string): Promise<unknown> {
    return this.callVendor(
      'file content retrieval',
      async () => {
        const page = await this.client.vectorStores.files.content(this.config.vectorStoreId, fileId);
        return page.data;
      },
      fileId,
    );
  }

  private async callVendor<T>(
    operation: string,
    call: () => PromiseLike<T>,
    fileId?: string,
  ): Promise<T> {
    this.logger.debug({ operation, fileId }, `Calling vendor: ${operation}`);
    try {
      return await call();
    } catch (error) {
      throw classifyVendorError(error, operation, fileId);
    }
  }

  /**
   * Threads are throwaway; a failed delete must not fail the search
   */
  private async deleteThread(threadId: string): Promise<void> {
    try {
      await this.client.beta.threads.del(threadId);
    } catch (error) {
      this.logger.warn(
        { threadId, error: error instanceof Error ? error.message : String(error) },
        'Failed to delete search thread',
      );
    }
  }
}

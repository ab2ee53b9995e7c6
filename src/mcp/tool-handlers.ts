import { type RetrievalService } from '../services/retrieval.service';
import { type ToolHandlerContext } from './types/sdk-custom';

import { fetchHandler } from './services/handlers/retrieval/fetch-handler';
import { searchHandler } from './services/handlers/retrieval/search-handler';

// Handlers receive validated tool arguments and resolve to the JSON body of the result
export type SdkToolHandler<TParams = Record<string, unknown>, TResult = unknown> = (
  params: TParams,
  context: ToolHandlerContext,
  retrievalService: RetrievalService,
) => Promise<TResult>;

/**
 * Tool handlers mapping, keyed by tool name
 */
export const toolHandlers: Record<string, SdkToolHandler> = {
  search: searchHandler,
  fetch: fetchHandler,
};

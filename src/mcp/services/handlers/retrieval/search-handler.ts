import { type SdkToolHandler } from '../../../tool-handlers';
import { type SearchResponse } from '../../../../types';

/**
 * Search Handler
 * Forwards the query to the retrieval service; results keep backend order
 */
export const searchHandler: SdkToolHandler<Record<string, unknown>, SearchResponse> = async (
  params,
  context,
  retrievalService,
) => {
  context.logger.debug({ query: params.query }, 'Executing search');

  const response = await retrievalService.search(params.query);

  context.logger.info({ resultCount: response.results.length }, 'Search returned results');
  return response;
};

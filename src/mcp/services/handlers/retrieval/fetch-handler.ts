import { type SdkToolHandler } from '../../../tool-handlers';
import { type Document } from '../../../../types';

/**
 * Fetch Handler
 */
export const fetchHandler: SdkToolHandler<Record<string, unknown>, Document> = async (
  params,
  context,
  retrievalService,
) => {
  context.logger.debug({ id: params.id }, 'Executing fetch');
  return retrievalService.fetch(params.id);
};

import { type Logger } from 'pino';

/**
 * Per-call context handed to tool handlers by whichever transport runs them
 */
export interface ToolHandlerContext {
  logger: Logger;
  requestId: string;
}

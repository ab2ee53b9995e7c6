import { randomUUID } from 'node:crypto';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import {
  BackendError,
  isCallerFacingError,
  type RetrievalErrorCode,
} from '../../errors/retrieval-errors';

export const BACKEND_FAILURE_MESSAGE = 'The document search backend is unavailable.';
export const INTERNAL_FAILURE_MESSAGE = 'Internal error while executing tool.';

export interface ToolErrorPayload {
  success: false;
  code: RetrievalErrorCode | 'INTERNAL_ERROR';
  error: string;
  errorId: string;
}

/**
 * Build the error body returned to MCP clients.
 * Only invalid input and not-found messages reach the caller verbatim; backend
 * and unexpected failures are replaced by a generic message and an id that
 * correlates with the server log.
 */
export function createToolErrorPayload(
  error: unknown,
  errorId: string = randomUUID(),
): ToolErrorPayload {
  if (isCallerFacingError(error)) {
    return { success: false, code: error.code, error: error.message, errorId };
  }
  if (error instanceof BackendError) {
    return { success: false, code: error.code, error: BACKEND_FAILURE_MESSAGE, errorId };
  }
  return { success: false, code: 'INTERNAL_ERROR', error: INTERNAL_FAILURE_MESSAGE, errorId };
}

/**
 * Standardized MCP result for a failed tool call
 */
export function toToolErrorResult(payload: ToolErrorPayload): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload) }],
    isError: true,
  };
}

/**
 * Standardized MCP result for a successful tool call
 */
export function toToolResult(result: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

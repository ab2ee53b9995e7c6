/**
 * Error taxonomy for the retrieval adapter.
 *
 * InvalidInput and NotFound are reported back to MCP callers verbatim.
 * BackendError is logged with its cause and surfaced as a generic message.
 * ConfigError is only thrown during startup and aborts the process.
 */

export type RetrievalErrorCode = 'INVALID_INPUT' | 'NOT_FOUND' | 'BACKEND_ERROR' | 'CONFIG_ERROR';

export abstract class RetrievalError extends Error {
  abstract readonly code: RetrievalErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends RetrievalError {
  readonly code = 'INVALID_INPUT';
}

export class NotFoundError extends RetrievalError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly documentId: string,
    options?: { cause?: unknown },
  ) {
    super(`No document found with id '${documentId}'`, options);
  }
}

export class BackendError extends RetrievalError {
  readonly code = 'BACKEND_ERROR';
}

export class ConfigError extends RetrievalError {
  readonly code = 'CONFIG_ERROR';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/**
 * Errors whose message is safe to hand back to an MCP client
 */
export function isCallerFacingError(error: unknown): error is InvalidInputError | NotFoundError {
  return error instanceof InvalidInputError || error instanceof NotFoundError;
}

import { type IncomingMessage, type ServerResponse } from 'node:http';
import { type Logger } from 'pino';

import { BaseHttpStreamServer } from '../base/base-httpstream-server';

/**
 * JSON-RPC error body used for transport-level failures
 */
export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  error: {
    code: number;
    message: string;
    data?: string;
  };
  id: null;
}

export class PayloadTooLargeError extends Error {
  constructor(
    readonly size: number,
    readonly maxSize: number,
  ) {
    super(`Request size ${size} bytes exceeds maximum allowed size ${maxSize} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidJsonError extends Error {
  constructor(cause: unknown) {
    super('Request body is not valid JSON', { cause });
    this.name = 'InvalidJsonError';
  }
}

export function createJsonRpcError(
  code: number,
  message: string,
  data?: string,
): JsonRpcErrorResponse {
  return {
    jsonrpc: '2.0',
    error: data === undefined ? { code, message } : { code, message, data },
    id: null,
  };
}

/**
 * Write a JSON body unless the response has already started
 */
export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  if (res.headersSent) {
    return;
  }
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Middleware responsible for request security and size limiting
 * Provides protection against oversized requests and implements timeout handling
 */
export class RequestSecurityMiddleware extends BaseHttpStreamServer {
  /**
   * Read and parse a JSON request body while enforcing the size limit.
   *
   * The Content-Length header is checked first for a fast failure, then the
   * cumulative size of the streamed chunks is tracked, since the header can be
   * omitted or wrong.
   */
  async readJsonBody(req: IncomingMessage, requestLogger: Logger): Promise<unknown> {
    const maxRequestSize = this.config.maxRequestSize;

    const contentLength = req.headers['content-length'];
    if (contentLength) {
      const declaredSize = parseInt(contentLength, 10);
      if (isNaN(declaredSize)) {
        requestLogger.warn({ contentLength }, 'Invalid Content-Length header');
      } else if (declaredSize > maxRequestSize) {
        requestLogger.error(
          { contentLength: declaredSize, maxSize: maxRequestSize },
          'Request size exceeds maximum allowed size (Content-Length check)',
        );
        throw new PayloadTooLargeError(declaredSize, maxRequestSize);
      }
    }

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let cumulativeSize = 0;
      let sizeLimitExceeded = false;

      req.on('data', (chunk: Buffer | string) => {
        if (sizeLimitExceeded) {
          return; // Drain the rest of the body without buffering it
        }

        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, 'utf8');
        cumulativeSize += buffer.length;

        if (cumulativeSize > maxRequestSize) {
          sizeLimitExceeded = true;
          requestLogger.error(
            { cumulativeSize, maxSize: maxRequestSize },
            'Request size limit exceeded during streaming',
          );
          reject(new PayloadTooLargeError(cumulativeSize, maxRequestSize));
          return;
        }

        chunks.push(buffer);
      });

      req.on('end', () => {
        if (sizeLimitExceeded) {
          return;
        }
        try {
          resolve(JSON.parse(Buffer.concat(chunks).toString('utf8')));
        } catch (error) {
          reject(new InvalidJsonError(error));
        }
      });

      req.on('error', reject);
    });
  }

  /**
   * Answer 408 if the request body has not arrived within the timeout.
   * Callers clear it once the body is read.
   */
  applyTimeoutProtection(res: ServerResponse, requestLogger: Logger): { cleanup: () => void } {
    let requestCompleted = false;

    const requestTimeout = setTimeout(() => {
      if (!requestCompleted && !res.headersSent) {
        requestLogger.warn('Request timeout - closing connection');
        sendJson(res, 408, createJsonRpcError(-32000, 'Request timeout'));
      }
    }, this.config.requestTimeout);

    const complete = (): void => {
      requestCompleted = true;
      clearTimeout(requestTimeout);
    };

    res.on('finish', complete);
    res.on('close', complete);

    return { cleanup: complete };
  }

  /**
   * Create error response for size limit violations
   */
  createSizeLimitErrorResponse(error: PayloadTooLargeError): JsonRpcErrorResponse {
    return createJsonRpcError(-32000, 'Payload Too Large', error.message);
  }

  /**
   * Create error response for unparseable bodies
   */
  createParseErrorResponse(): JsonRpcErrorResponse {
    return createJsonRpcError(-32700, 'Parse error');
  }

  /**
   * Create error response for general errors
   */
  createGeneralErrorResponse(): JsonRpcErrorResponse {
    return createJsonRpcError(-32603, 'Internal error');
  }

  /**
   * Validate request headers for security
   */
  validateRequestHeaders(req: IncomingMessage, requestLogger: Logger): boolean {
    if (req.method === 'POST') {
      const contentType = req.headers['content-type'];
      if (!contentType || !contentType.includes('application/json')) {
        requestLogger.warn(
          { contentType },
          'Invalid or missing Content-Type header for POST request',
        );
        return false;
      }
    }

    for (const header of ['x-forwarded-for', 'x-real-ip']) {
      if (req.headers[header]) {
        requestLogger.debug({ header, value: req.headers[header] }, 'Proxy header detected');
      }
    }

    return true;
  }

  /**
   * Apply CORS headers for browser-based MCP clients
   */
  applyCorsHeaders(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader(
      'Access-Control-Allow-Headers',
      'Content-Type, Accept, mcp-session-id, mcp-protocol-version',
    );
    res.setHeader('Access-Control-Expose-Headers', 'mcp-session-id');
  }

  /**
   * Handle OPTIONS requests for CORS preflight
   */
  handleOptionsRequest(res: ServerResponse): void {
    this.applyCorsHeaders(res);
    res.writeHead(204);
    res.end();
  }

  async start(): Promise<void> {
    this.logger.info('Request security middleware initialized');
  }

  async stop(): Promise<void> {
    this.logger.info('Request security middleware stopped');
  }
}

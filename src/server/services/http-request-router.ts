import { randomUUID } from 'node:crypto';
import { type IncomingMessage, type ServerResponse } from 'node:http';
import { type Logger } from 'pino';

import {
  BaseHttpStreamServer,
  FETCH_PATH,
  HEALTH_PATH,
  SEARCH_PATH,
  SERVER_NAME,
  SERVER_VERSION,
  createMcpServer,
  type ServerConfig,
} from '../base/base-httpstream-server';
import {
  InvalidJsonError,
  PayloadTooLargeError,
  RequestSecurityMiddleware,
  createJsonRpcError,
  sendJson,
} from '../middleware/request-security.middleware';
import { type SessionTransportManager } from './session-transport-manager';
import { type ToolRegistrationService } from './tool-registration.service';
import { isCallerFacingError } from '../../errors/retrieval-errors';
import { createToolErrorPayload } from '../../mcp/utils/error-utils';
import { type RetrievalService } from '../../services/retrieval.service';
import { logError } from '../../utils/logger';

/**
 * Supplies the body of the health endpoint
 */
export type HealthReporter = () => object;

function readField(body: unknown, field: string): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return undefined;
  }
  return Object.entries(body).find(([key]) => key === field)?.[1];
}

/**
 * Service responsible for routing HTTP requests to appropriate handlers
 * Serves the health and info endpoints and the MCP endpoint (POST, GET, DELETE)
 */
export class HttpRequestRouter extends BaseHttpStreamServer {
  private securityMiddleware: RequestSecurityMiddleware;

  constructor(
    config: ServerConfig,
    private readonly sessionManager: SessionTransportManager,
    private readonly toolRegistration: ToolRegistrationService,
    private readonly retrievalService: RetrievalService,
    private readonly healthReporter: HealthReporter,
    logger?: Logger,
  ) {
    super(config, logger);
    this.securityMiddleware = new RequestSecurityMiddleware(config, logger);
  }

  /**
   * Route incoming HTTP requests to appropriate handlers
   */
  async routeRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestLogger = this.createRequestLogger(req);

    try {
      requestLogger.debug({ headers: req.headers }, `HTTP ${req.method} ${req.url}`);

      this.securityMiddleware.applyCorsHeaders(res);

      if (req.method === 'OPTIONS') {
        this.securityMiddleware.handleOptionsRequest(res);
        return;
      }

      const pathname = this.resolvePathname(req);

      if (pathname === HEALTH_PATH) {
        this.handleHealthRequest(req, res);
        return;
      }
      if (pathname === '/') {
        this.handleInfoRequest(req, res);
        return;
      }
      if (pathname === SEARCH_PATH || pathname === FETCH_PATH) {
        await this.handleDirectToolRequest(pathname, req, res, requestLogger);
        return;
      }
      if (pathname !== this.config.mcpPath) {
        sendJson(res, 404, { error: 'Not Found', path: pathname });
        return;
      }

      // Validate request headers
      if (!this.securityMiddleware.validateRequestHeaders(req, requestLogger)) {
        sendJson(res, 400, createJsonRpcError(-32000, 'Invalid request headers'));
        return;
      }

      switch (req.method) {
        case 'POST':
          await this.handlePostRequest(req, res, requestLogger);
          break;
        case 'GET':
          await this.handleGetRequest(req, res);
          break;
        case 'DELETE':
          await this.handleDeleteRequest(req, res, requestLogger);
          break;
        default:
          this.sendMethodNotAllowed(res);
      }
    } catch (error) {
      logError(requestLogger, error, {
        method: req.method,
        url: req.url,
        operation: 'http-request-handling',
      });
      sendJson(res, 500, this.securityMiddleware.createGeneralErrorResponse());
    }
  }

  /**
   * Report process status and which settings are present
   */
  private handleHealthRequest(req: IncomingMessage, res: ServerResponse): void {
    if (req.method !== 'GET') {
      this.sendMethodNotAllowed(res);
      return;
    }
    sendJson(res, 200, this.healthReporter());
  }

  private handleInfoRequest(req: IncomingMessage, res: ServerResponse): void {
    if (req.method !== 'GET') {
      this.sendMethodNotAllowed(res);
      return;
    }
    sendJson(res, 200, {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      status: 'running',
      endpoints: {
        health: HEALTH_PATH,
        mcp: this.config.mcpPath,
        search: SEARCH_PATH,
        fetch: FETCH_PATH,
      },
      tools: this.toolRegistration.getRegisteredTools(),
    });
  }

  /**
   * Plain JSON endpoints that run search and fetch without an MCP session.
   * Failures use the same payload as MCP tool errors.
   */
  private async handleDirectToolRequest(
    pathname: string,
    req: IncomingMessage,
    res: ServerResponse,
    requestLogger: Logger,
  ): Promise<void> {
    if (req.method !== 'POST') {
      this.sendMethodNotAllowed(res);
      return;
    }
    if (!this.securityMiddleware.validateRequestHeaders(req, requestLogger)) {
      sendJson(res, 400, createJsonRpcError(-32000, 'Invalid request headers'));
      return;
    }

    const parsed = await this.readBody(req, res, requestLogger);
    if (parsed === undefined) {
      return;
    }

    try {
      const result =
        pathname === SEARCH_PATH
          ? await this.retrievalService.search(readField(parsed.value, 'query'))
          : await this.retrievalService.fetch(readField(parsed.value, 'id'));
      sendJson(res, 200, result);
    } catch (error) {
      const payload = createToolErrorPayload(error);
      if (isCallerFacingError(error)) {
        requestLogger.warn({ code: error.code, error: error.message }, 'Direct tool request rejected');
        sendJson(res, error.code === 'NOT_FOUND' ? 404 : 400, payload);
        return;
      }
      logError(requestLogger, error, { operation: `direct-${pathname.slice(1)}`, errorId: payload.errorId });
      sendJson(res, 500, payload);
    }
  }

  /**
   * Read a JSON body under the size limit and the body-read timeout.
   * Resolves undefined once an error response has been sent.
   */
  private async readBody(
    req: IncomingMessage,
    res: ServerResponse,
    requestLogger: Logger,
  ): Promise<{ value: unknown } | undefined> {
    const { cleanup } = this.securityMiddleware.applyTimeoutProtection(res, requestLogger);

    try {
      return { value: await this.securityMiddleware.readJsonBody(req, requestLogger) };
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendJson(res, 413, this.securityMiddleware.createSizeLimitErrorResponse(error));
        return undefined;
      }
      if (error instanceof InvalidJsonError) {
        sendJson(res, 400, this.securityMiddleware.createParseErrorResponse());
        return undefined;
      }
      throw error;
    } finally {
      // The timeout only guards reading the body; tool calls run as long as the backend takes
      cleanup();
    }
  }

  /**
   * Handle POST requests (for MCP tool calls and initialization)
   */
  private async handlePostRequest(
    req: IncomingMessage,
    res: ServerResponse,
    requestLogger: Logger,
  ): Promise<void> {
    const sessionId = this.getSessionId(req);

    const parsed = await this.readBody(req, res, requestLogger);
    if (parsed === undefined) {
      return;
    }
    const body = parsed.value;

    if (sessionId) {
      const transport = this.sessionManager.getTransport(sessionId);
      if (!transport) {
        sendJson(res, 404, createJsonRpcError(-32001, 'Session not found'));
        return;
      }

      requestLogger.debug({ sessionId }, 'Reusing existing transport');
      this.sessionManager.updateSessionActivity(sessionId);
      await transport.handleRequest(req, res, body);
      return;
    }

    // No session yet: this must be an initialization request
    const mcpServer = createMcpServer();
    this.toolRegistration.registerTools(mcpServer);

    const transport = this.sessionManager.createTransport(mcpServer, () => randomUUID());

    try {
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, body);
    } catch (error) {
      requestLogger.error({ error }, 'Error handling request with new transport');
      await mcpServer.close();
      throw error;
    }
  }

  /**
   * Handle GET requests (for SSE streams)
   */
  private async handleGetRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = this.getSessionId(req);
    const transport = sessionId ? this.sessionManager.getTransport(sessionId) : undefined;

    if (!sessionId || !transport) {
      sendJson(res, 400, createJsonRpcError(-32000, 'Bad Request: Invalid or missing session ID'));
      return;
    }

    this.sessionManager.updateSessionActivity(sessionId);
    await transport.handleRequest(req, res);
  }

  /**
   * Handle DELETE requests (for session termination)
   */
  private async handleDeleteRequest(
    req: IncomingMessage,
    res: ServerResponse,
    requestLogger: Logger,
  ): Promise<void> {
    const sessionId = this.getSessionId(req);

    if (!sessionId || !this.sessionManager.isSessionActive(sessionId)) {
      sendJson(res, 400, createJsonRpcError(-32000, 'Bad Request: Invalid or missing session ID'));
      return;
    }

    await this.sessionManager.cleanupSession(sessionId);
    requestLogger.debug({ sessionId }, 'Session terminated');

    sendJson(res, 200, { jsonrpc: '2.0', result: { success: true }, id: null });
  }

  private sendMethodNotAllowed(res: ServerResponse): void {
    sendJson(res, 405, createJsonRpcError(-32000, 'Method not allowed'));
  }

  private getSessionId(req: IncomingMessage): string | undefined {
    const header = req.headers['mcp-session-id'];
    return Array.isArray(header) ? header[0] : header;
  }

  /**
   * Request path without query string or trailing slash
   */
  private resolvePathname(req: IncomingMessage): string {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    return pathname.length > 1 && pathname.endsWith('/') ? pathname.slice(0, -1) : pathname;
  }

  async start(): Promise<void> {
    await this.securityMiddleware.start();
    this.logger.info({ mcpPath: this.config.mcpPath }, 'HTTP request router initialized');
  }

  async stop(): Promise<void> {
    await this.securityMiddleware.stop();
    this.logger.info('HTTP request router stopped');
  }
}

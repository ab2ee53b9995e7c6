import { randomUUID } from 'node:crypto';
import { type IncomingMessage } from 'node:http';
import { type Logger } from 'pino';

// Official MCP SDK imports
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { type AppConfig } from '../../config/app-config';
import { loggers } from '../../utils/logger';

// Server identity advertised during MCP initialization
export const SERVER_NAME = 'vector-store-mcp';
export const SERVER_VERSION = '1.0.0';

// Server configuration constants
export const MAX_REQUEST_SIZE = 10 * 1024 * 1024; // 10MB
export const REQUEST_TIMEOUT = 30000; // 30 seconds
export const SHUTDOWN_TIMEOUT = 30000; // 30 seconds

export const HEALTH_PATH = '/health';
export const SEARCH_PATH = '/search';
export const FETCH_PATH = '/fetch';

// Server configuration interface
export interface ServerConfig {
  port: number;
  host: string;
  mcpPath: string;
  maxRequestSize: number;
  requestTimeout: number;
  shutdownTimeout: number;
}

/**
 * Derive the HTTP server settings from the application configuration
 */
export function createServerConfig(
  appConfig: AppConfig,
  overrides: Partial<ServerConfig> = {},
): ServerConfig {
  return {
    port: appConfig.port,
    host: appConfig.host,
    mcpPath: appConfig.mcpPath,
    maxRequestSize: MAX_REQUEST_SIZE,
    requestTimeout: REQUEST_TIMEOUT,
    shutdownTimeout: SHUTDOWN_TIMEOUT,
    ...overrides,
  };
}

/**
 * Create an MCP server instance with tool capabilities.
 * Every HTTP session and the stdio transport get their own instance.
 */
export function createMcpServer(): McpServer {
  return new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        tools: { listChanged: true },
      },
    },
  );
}

/**
 * Base class for HTTP stream server services
 * Provides common configuration, logging and lifecycle contract
 */
export abstract class BaseHttpStreamServer {
  protected config: ServerConfig;
  protected logger: Logger;

  constructor(config: ServerConfig, logger?: Logger) {
    this.config = { ...config };
    this.logger = logger ?? loggers.mcpHttp();
  }

  /**
   * Get logger instance
   */
  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Create request logger with context
   */
  createRequestLogger(req: IncomingMessage): Logger {
    return this.logger.child({
      requestId: randomUUID(),
      method: req.method,
      url: req.url,
    });
  }

  /**
   * Abstract methods to be implemented by concrete classes
   */
  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
}

import { createServer, type Server } from 'node:http';
import { type Logger } from 'pino';

import {
  BaseHttpStreamServer,
  SERVER_NAME,
  SERVER_VERSION,
  createServerConfig,
  type ServerConfig,
} from '../base/base-httpstream-server';
import { ToolRegistrationService } from './tool-registration.service';
import { HttpRequestRouter } from './http-request-router';
import { SessionTransportManager, type SessionStatistics } from './session-transport-manager';
import { type AppConfig, type ConfigSummary, summarizeConfig } from '../../config/app-config';
import { OpenAIVectorStoreGateway } from '../../backend/openai-vector-store.gateway';
import { type VectorStoreGateway } from '../../backend/vector-store-gateway.interface';
import { RetrievalService } from '../../services/retrieval.service';
import { logError, setLogLevel } from '../../utils/logger';

export interface ServerStatus {
  status: 'healthy';
  service: string;
  version: string;
  isRunning: boolean;
  address: { host: string; port: number } | null;
  uptime: number;
  sessions: SessionStatistics & { active: number };
  config: ConfigSummary;
}

export interface LifecycleOptions {
  gateway?: VectorStoreGateway;
  server?: Partial<ServerConfig>;
  logger?: Logger;
}

/**
 * Service responsible for server lifecycle management
 * Handles server startup, shutdown, and process signal handling
 */
export class ServerLifecycleManager extends BaseHttpStreamServer {
  private readonly toolRegistration: ToolRegistrationService;
  private readonly requestRouter: HttpRequestRouter;
  private readonly sessionManager: SessionTransportManager;
  private server?: Server;
  private cleanupInterval?: NodeJS.Timeout;
  private readonly startedAt = Date.now();

  constructor(
    private readonly appConfig: AppConfig,
    options: LifecycleOptions = {},
  ) {
    const serverConfig = createServerConfig(appConfig, options.server);
    super(serverConfig, options.logger);

    if (appConfig.logLevel) {
      setLogLevel(appConfig.logLevel);
    }

    const gateway = options.gateway ?? new OpenAIVectorStoreGateway(appConfig);
    const retrievalService = new RetrievalService(appConfig, gateway);

    this.toolRegistration = new ToolRegistrationService(retrievalService, this.logger);
    this.sessionManager = new SessionTransportManager(serverConfig, this.logger);
    this.requestRouter = new HttpRequestRouter(
      serverConfig,
      this.sessionManager,
      this.toolRegistration,
      retrievalService,
      () => this.getServerStatus(),
      this.logger,
    );
  }

  /**
   * Start the HTTP stream server
   */
  async start(): Promise<void> {
    this.logger.info('Starting MCP HTTP Stream server...');

    try {
      await this.requestRouter.start();
      await this.sessionManager.start();

      const server = this.createHttpServer();
      this.server = server;
      this.setupServerEventHandlers(server);

      await this.startListening(server);

      this.cleanupInterval = this.sessionManager.startPeriodicCleanup();

      this.logger.info(
        { tools: this.toolRegistration.getRegisteredTools() },
        'MCP HTTP Stream server started successfully',
      );
    } catch (error) {
      logError(this.logger, error, { operation: 'server-start' });
      throw error;
    }
  }

  /**
   * Stop the HTTP stream server
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping MCP HTTP Stream server...');

    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
    }

    await this.sessionManager.stop();
    await this.requestRouter.stop();
    await this.closeServer();

    this.logger.info('MCP HTTP Stream server stopped successfully');
  }

  /**
   * Node HTTP server that hands every request to the router
   */
  createHttpServer(): Server {
    return createServer((req, res) => {
      void this.requestRouter.routeRequest(req, res);
    });
  }

  /**
   * Perform graceful shutdown
   */
  async gracefulShutdown(signal: string): Promise<void> {
    this.logger.info({ signal }, `Received ${signal}, starting graceful shutdown`);

    // Keep the process from hanging on a stuck connection
    const shutdownTimer = setTimeout(() => {
      this.logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, this.config.shutdownTimeout);

    try {
      await this.stop();
      clearTimeout(shutdownTimer);
      process.exit(0);
    } catch (error) {
      logError(this.logger, error, { operation: 'graceful-shutdown' });
      clearTimeout(shutdownTimer);
      process.exit(1);
    }
  }

  private setupServerEventHandlers(server: Server): void {
    server.on('close', () => {
      this.logger.info('HTTP server closed');
    });

    server.on('connection', (socket) => {
      this.logger.debug('New connection established');

      socket.on('error', (err) => {
        this.logger.debug({ error: err.message }, 'Socket error');
      });
    });
  }

  private async startListening(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(err);
      };
      server.once('error', onError);

      server.listen(this.config.port, this.config.host, () => {
        server.off('error', onError);
        server.on('error', (err: Error) => {
          logError(this.logger, err, { operation: 'http-server-error' });
        });

        const address = this.getAddressInfo();
        this.logger.info(
          { host: address?.host ?? this.config.host, port: address?.port ?? this.config.port },
          `MCP HTTP stream server listening at http://${this.config.host}:${address?.port ?? this.config.port}${this.config.mcpPath}`,
        );
        resolve();
      });
    });
  }

  private async closeServer(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server || !server.listening) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Set up process signal handlers
   */
  setupProcessSignalHandlers(): void {
    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      process.on(signal, () => {
        this.gracefulShutdown(signal).catch((error: unknown) => {
          logError(this.logger, error, { operation: `${signal}-handler` });
          process.exit(1);
        });
      });
    }

    process.on('uncaughtException', (error) => {
      logError(this.logger, error, { operation: 'uncaught-exception' });
      this.gracefulShutdown('uncaughtException').catch(() => {
        process.exit(1);
      });
    });

    process.on('unhandledRejection', (reason) => {
      logError(this.logger, reason, { operation: 'unhandled-rejection' });
      this.gracefulShutdown('unhandledRejection').catch(() => {
        process.exit(1);
      });
    });
  }

  /**
   * Bound address, once listening
   */
  getAddressInfo(): { host: string; port: number } | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    return { host: address.address, port: address.port };
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /**
   * Health report served at /health. Never includes secret values.
   */
  getServerStatus(): ServerStatus {
    const sessionStats = this.sessionManager.getSessionStatistics();

    return {
      status: 'healthy',
      service: SERVER_NAME,
      version: SERVER_VERSION,
      isRunning: this.isRunning(),
      address: this.getAddressInfo(),
      uptime: Date.now() - this.startedAt,
      sessions: { ...sessionStats, active: sessionStats.totalSessions },
      config: summarizeConfig(this.appConfig),
    };
  }

  getSessionManagerService(): SessionTransportManager {
    return this.sessionManager;
  }
}

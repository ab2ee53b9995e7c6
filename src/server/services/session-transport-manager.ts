import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import { BaseHttpStreamServer } from '../base/base-httpstream-server';
import { logError } from '../../utils/logger';

// Session management interface
export interface SessionInfo {
  sessionId: string;
  transport: StreamableHTTPServerTransport;
  server: McpServer;
  createdAt: Date;
  lastActivity: Date;
}

export interface SessionStatistics {
  totalSessions: number;
  averageDuration: number;
  oldestSession: Date | null;
  newestSession: Date | null;
}

export const DEFAULT_INACTIVITY_TIMEOUT = 30 * 60 * 1000;
export const DEFAULT_CLEANUP_INTERVAL = 10 * 60 * 1000;

/**
 * Service responsible for managing session transports
 * Handles transport lifecycle, cleanup, and session management
 */
export class SessionTransportManager extends BaseHttpStreamServer {
  private sessions = new Map<string, SessionInfo>();

  /**
   * Create a transport whose session is registered once the client's
   * initialize request has been accepted
   */
  createTransport(
    server: McpServer,
    sessionIdGenerator: () => string,
    onSessionInitialized?: (sessionId: string) => void,
  ): StreamableHTTPServerTransport {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator,
      enableJsonResponse: true,
      onsessioninitialized: (newSessionId: string) => {
        const now = new Date();
        this.sessions.set(newSessionId, {
          sessionId: newSessionId,
          transport,
          server,
          createdAt: now,
          lastActivity: now,
        });

        this.logger.debug({ sessionId: newSessionId }, 'New session initialized');
        onSessionInitialized?.(newSessionId);
      },
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        this.forgetSession(transport.sessionId);
      }
    };

    return transport;
  }

  /**
   * Get all active session IDs
   */
  getActiveSessionIds(): string[] {
    return [...this.sessions.keys()];
  }

  /**
   * Check if session exists and is active
   */
  isSessionActive(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Update session activity timestamp
   */
  updateSessionActivity(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastActivity = new Date();
    }
  }

  /**
   * Close a session's server and transport.
   * The session is forgotten before closing so the transport's onclose
   * callback does not re-enter this method.
   */
  async cleanupSession(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    this.forgetSession(sessionId);

    if (session) {
      try {
        await session.server.close();
        this.logger.debug({ sessionId }, 'Session server closed');
      } catch (error) {
        logError(this.logger, error, { sessionId, operation: 'session-close' });
      }
    }
  }

  /**
   * Clean up all active sessions
   */
  async cleanupAllSessions(): Promise<void> {
    const sessionIds = this.getActiveSessionIds();
    this.logger.info({ sessionCount: sessionIds.length }, 'Cleaning up all active sessions');

    await Promise.allSettled(sessionIds.map((sessionId) => this.cleanupSession(sessionId)));
  }

  /**
   * Clean up inactive sessions based on timeout
   */
  async cleanupInactiveSessions(
    inactivityTimeoutMs: number = DEFAULT_INACTIVITY_TIMEOUT,
  ): Promise<string[]> {
    const now = Date.now();
    const inactiveSessions = [...this.sessions.values()]
      .filter((session) => now - session.lastActivity.getTime() > inactivityTimeoutMs)
      .map((session) => session.sessionId);

    if (inactiveSessions.length > 0) {
      this.logger.info(
        { inactiveSessionCount: inactiveSessions.length, inactivityTimeoutMs },
        'Cleaning up inactive sessions',
      );
      await Promise.allSettled(inactiveSessions.map((sessionId) => this.cleanupSession(sessionId)));
    }

    return inactiveSessions;
  }

  /**
   * Get session statistics
   */
  getSessionStatistics(): SessionStatistics {
    const sessions = [...this.sessions.values()];

    if (sessions.length === 0) {
      return {
        totalSessions: 0,
        averageDuration: 0,
        oldestSession: null,
        newestSession: null,
      };
    }

    const now = Date.now();
    const totalDuration = sessions.reduce(
      (sum, session) => sum + (now - session.createdAt.getTime()),
      0,
    );
    const byCreation = sessions.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());

    return {
      totalSessions: sessions.length,
      averageDuration: totalDuration / sessions.length,
      oldestSession: byCreation[0].createdAt,
      newestSession: byCreation[byCreation.length - 1].createdAt,
    };
  }

  /**
   * Start periodic cleanup of inactive sessions
   */
  startPeriodicCleanup(intervalMs: number = DEFAULT_CLEANUP_INTERVAL): NodeJS.Timeout {
    this.logger.info({ intervalMs }, 'Starting periodic session cleanup');

    const timer = setInterval(() => {
      this.cleanupInactiveSessions().catch((error: unknown) => {
        logError(this.logger, error, { operation: 'periodic-cleanup' });
      });
    }, intervalMs);
    timer.unref();
    return timer;
  }

  private forgetSession(sessionId: string): void {
    if (this.sessions.delete(sessionId)) {
      this.logger.debug({ sessionId }, 'Session cleaned up');
    }
  }

  async start(): Promise<void> {
    this.logger.info('Session transport manager initialized');
  }

  async stop(): Promise<void> {
    await this.cleanupAllSessions();
    this.logger.info('Session transport manager stopped');
  }
}

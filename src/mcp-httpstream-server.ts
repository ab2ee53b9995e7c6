/**
 * MCP HTTP Streaming Server
 *
 * Entry point that wires configuration into the specialized services:
 * - ServerLifecycleManager: startup, shutdown and signal handling
 * - ToolRegistrationService: search and fetch tool registration
 * - HttpRequestRouter: health, info and MCP endpoint routing
 * - SessionTransportManager: per-session transports
 * - RequestSecurityMiddleware: request size limits, timeouts and CORS
 */

// Loaded before anything creates a logger so LOG_LEVEL from .env applies
import 'dotenv/config';

import { ConfigError } from './errors/retrieval-errors';
import { loadConfig } from './config/app-config';
import { ServerLifecycleManager } from './server/services/server-lifecycle-manager';
import { logError, loggers } from './utils/logger';

const httpStreamLogger = loggers.mcpHttp();

/**
 * Load configuration and start listening. Configuration errors are fatal.
 */
export async function startServer(
  env: NodeJS.ProcessEnv = process.env,
): Promise<ServerLifecycleManager> {
  const config = loadConfig(env);
  const serverManager = new ServerLifecycleManager(config);

  await serverManager.start();
  return serverManager;
}

// Start the server only if this script is executed directly
if (require.main === module) {
  startServer()
    .then((serverManager) => {
      serverManager.setupProcessSignalHandlers();
    })
    .catch((error: unknown) => {
      if (error instanceof ConfigError) {
        httpStreamLogger.error({ issues: error.issues }, error.message);
      } else {
        logError(httpStreamLogger, error, { operation: 'server-start' });
      }
      process.exit(1);
    });
}

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { OpenAIVectorStoreGateway } from './backend/openai-vector-store.gateway';
import { loadConfig } from './config/app-config';
import { ConfigError } from './errors/retrieval-errors';
import { createMcpServer } from './server/base/base-httpstream-server';
import { ToolRegistrationService } from './server/services/tool-registration.service';
import { RetrievalService } from './services/retrieval.service';
import { enforceStdioCompliance, logError, loggers, setLogLevel } from './utils/logger';

// stdout carries the protocol; nothing else may write to it
enforceStdioCompliance();

const mcpStdioLogger = loggers.mcpStdio();

// Re-entrancy guard against concurrent shutdown signals
let isShuttingDown = false;

async function gracefulShutdown(signal: string, close: () => Promise<void>): Promise<void> {
  if (isShuttingDown) {
    mcpStdioLogger.debug({ signal }, 'Shutdown already in progress, ignoring subsequent signal.');
    return;
  }
  isShuttingDown = true;

  mcpStdioLogger.info({ signal }, `Received ${signal}, starting graceful shutdown`);

  const timeout = setTimeout(() => {
    mcpStdioLogger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 10000);

  try {
    await close();
    clearTimeout(timeout);
    mcpStdioLogger.info('Graceful shutdown completed successfully.');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logError(mcpStdioLogger, error, { operation: 'graceful-shutdown-failure' });
    process.exit(1);
  }
}

/**
 * Initializes the MCP server over stdio with the same tools as the HTTP server
 */
async function main(): Promise<void> {
  mcpStdioLogger.info('MCP Stdio Server initializing...');

  const config = loadConfig();
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  const retrievalService = new RetrievalService(config, new OpenAIVectorStoreGateway(config));
  const toolRegistration = new ToolRegistrationService(retrievalService, mcpStdioLogger);

  const mcpServer = createMcpServer();
  toolRegistration.registerTools(mcpServer);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      gracefulShutdown(signal, () => mcpServer.close()).catch((error: unknown) => {
        logError(mcpStdioLogger, error, { operation: 'unhandled-shutdown-error' });
        process.exit(1);
      });
    });
  }

  mcpStdioLogger.info(
    { tools: toolRegistration.getRegisteredTools(), searchMode: config.searchMode },
    'MCP Server (stdio) initialized and listening',
  );
}

// Start the server only if the script is executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigError) {
      mcpStdioLogger.error({ issues: error.issues }, error.message);
    } else {
      logError(mcpStdioLogger, error, { operation: 'main-execution-error' });
    }
    process.exit(1);
  });
}

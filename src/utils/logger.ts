import pino, { type Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured logging context shared by all component loggers
 */
export interface LogContext {
  component?: string;
  operation?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Root logger configuration.
 * Logs always go to stderr so the stdio transport keeps stdout to itself.
 */
function createRootLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
  const level = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

  return pino(
    {
      level,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      redact: [
        'password',
        'token',
        'secret',
        'apiKey',
        'openaiApiKey',
        'authorization',
        'headers.authorization',
      ],
    },
    process.stderr,
  );
}

let rootLogger: Logger | undefined;

// Component loggers follow later level changes on the root
const componentLoggers = new Set<Logger>();

/**
 * Get or create the root logger
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Create a child logger with component-specific context
 */
export function createLogger(componentName: string, baseContext: LogContext = {}): Logger {
  const logger = getRootLogger().child({ component: componentName, ...baseContext });
  componentLoggers.add(logger);
  return logger;
}

/**
 * Apply the configured level to the root logger and every component logger
 */
export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
  for (const logger of componentLoggers) {
    logger.level = level;
  }
}

/**
 * Component-specific logger factories
 */
export const loggers = {
  mcpHttp: () => createLogger('MCP-HTTP'),
  mcpStdio: () => createLogger('MCP-Stdio'),
  retrieval: () => createLogger('Retrieval'),
  gateway: () => createLogger('OpenAI-Gateway'),
} as const;

/**
 * Times a single operation and logs its outcome
 */
export class PerformanceLogger {
  private readonly startTime = Date.now();

  constructor(
    private readonly logger: Logger,
    private readonly operation: string,
  ) {}

  complete(context: Record<string, unknown> = {}): void {
    const duration = Date.now() - this.startTime;
    this.logger.info({ operation: this.operation, duration, ...context }, 'Operation completed');
  }

  fail(error: unknown, context: Record<string, unknown> = {}): void {
    const duration = Date.now() - this.startTime;
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      { operation: this.operation, duration, error: message, ...context },
      'Operation failed',
    );
  }
}

export function createPerformanceLogger(logger: Logger, operation: string): PerformanceLogger {
  return new PerformanceLogger(logger, operation);
}

/**
 * Log an error with its stack and, when present, its cause
 */
export function logError(
  logger: Logger,
  error: unknown,
  context: Record<string, unknown> = {},
): void {
  if (!(error instanceof Error)) {
    logger.error({ error: String(error), ...context }, 'Error occurred');
    return;
  }
  const cause = error.cause instanceof Error ? error.cause.message : error.cause;
  logger.error(
    { error: error.message, stack: error.stack, ...(cause !== undefined && { cause }), ...context },
    'Error occurred',
  );
}

/**
 * Redirect console.log to stderr for MCP stdio compliance.
 * Must run before anything else can write to stdout.
 */
export function enforceStdioCompliance(): void {
  console.log = (...args: unknown[]): void => {
    console.error(...args);
  };
}

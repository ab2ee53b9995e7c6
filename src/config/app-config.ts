import { z } from 'zod';

import { ConfigError } from '../errors/retrieval-errors';
import { LOG_LEVELS, type LogLevel } from '../utils/logger';

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_MCP_PATH = '/mcp';
export const DEFAULT_MAX_SEARCH_RESULTS = 10;
export const DEFAULT_SNIPPET_LENGTH = 500;

export type SearchMode = 'assistant' | 'vector-store';

/**
 * Immutable process configuration, built once at startup
 */
export interface AppConfig {
  readonly openaiApiKey: string;
  readonly vectorStoreId: string;
  readonly assistantId?: string;
  readonly port: number;
  readonly host: string;
  readonly mcpPath: string;
  readonly searchMode: SearchMode;
  readonly maxSearchResults: number;
  readonly snippetLength: number;
  // Unset keeps the logger's own default
  readonly logLevel?: LogLevel;
}

// Blank strings count as unset, the way an empty `KEY=` line in .env reads
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const integerFromEnv = (name: string, fallback: number, min: number, max: number) =>
  optionalString.pipe(
    z
      .string()
      .regex(/^\d+$/, `${name} must be an integer`)
      .transform(Number)
      .pipe(
        z
          .number()
          .min(min, `${name} must be at least ${min}`)
          .max(max, `${name} must be at most ${max}`),
      )
      .optional()
      .transform((value) => value ?? fallback),
  );

const envSchema = z
  .object({
    OPENAI_API_KEY: requiredString('OPENAI_API_KEY'),
    VECTOR_STORE_ID: requiredString('VECTOR_STORE_ID'),
    ASSISTANT_ID: optionalString,
    PORT: integerFromEnv('PORT', DEFAULT_PORT, 0, 65535),
    HOST: optionalString.transform((value) => value ?? DEFAULT_HOST),
    MCP_PATH: optionalString
      .transform((value) => value ?? DEFAULT_MCP_PATH)
      .refine((value) => value.startsWith('/'), 'MCP_PATH must start with "/"'),
    SEARCH_MODE: optionalString
      .transform((value) => value ?? 'assistant')
      .pipe(z.enum(['assistant', 'vector-store'])),
    MAX_SEARCH_RESULTS: integerFromEnv('MAX_SEARCH_RESULTS', DEFAULT_MAX_SEARCH_RESULTS, 1, 50),
    SNIPPET_LENGTH: integerFromEnv('SNIPPET_LENGTH', DEFAULT_SNIPPET_LENGTH, 20, 100000),
    LOG_LEVEL: optionalString.pipe(z.enum(LOG_LEVELS).optional()),
  })
  .superRefine((env, ctx) => {
    if (env.SEARCH_MODE === 'assistant' && !env.ASSISTANT_ID) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ASSISTANT_ID'],
        message: 'ASSISTANT_ID is required when SEARCH_MODE is "assistant"',
      });
    }
  });

/**
 * Build the configuration from environment variables.
 * Every missing or malformed variable is reported in a single ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const variable = issue.path.join('.');
      return issue.message.includes(variable) ? issue.message : `${variable}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  const values = parsed.data;
  return Object.freeze({
    openaiApiKey: values.OPENAI_API_KEY,
    vectorStoreId: values.VECTOR_STORE_ID,
    assistantId: values.ASSISTANT_ID,
    port: values.PORT,
    host: values.HOST,
    mcpPath: values.MCP_PATH,
    searchMode: values.SEARCH_MODE,
    maxSearchResults: values.MAX_SEARCH_RESULTS,
    snippetLength: values.SNIPPET_LENGTH,
    logLevel: values.LOG_LEVEL,
  });
}

export interface ConfigSummary {
  openaiApiKey: boolean;
  vectorStoreId: boolean;
  assistantId: boolean;
  port: number;
  mcpPath: string;
  searchMode: SearchMode;
}

/**
 * Report which settings are present without exposing their values
 */
export function summarizeConfig(config: AppConfig): ConfigSummary {
  return {
    openaiApiKey: config.openaiApiKey.length > 0,
    vectorStoreId: config.vectorStoreId.length > 0,
    assistantId: Boolean(config.assistantId),
    port: config.port,
    mcpPath: config.mcpPath,
    searchMode: config.searchMode,
  };
}

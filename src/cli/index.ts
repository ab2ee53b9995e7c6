#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import OpenAI from 'openai';

import { OpenAIVectorStoreGateway } from '../backend/openai-vector-store.gateway';
import { type AppConfig, loadConfig, summarizeConfig } from '../config/app-config';
import { ConfigError, RetrievalError } from '../errors/retrieval-errors';
import { SERVER_NAME, SERVER_VERSION } from '../server/base/base-httpstream-server';
import { RetrievalService } from '../services/retrieval.service';
import { setLogLevel } from '../utils/logger';
import {
  DEFAULT_ASSISTANT_MODEL,
  DEFAULT_ASSISTANT_NAME,
  DEFAULT_VECTOR_STORE_NAME,
  type AssistantOptions,
  createFileSearchAssistant,
  createVectorStore,
  formatEnvLines,
} from './setup';

const program = new Command();

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function fail(prefix: string, error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`❌ ${prefix}: invalid configuration`);
    for (const issue of error.issues) {
      console.error(`   - ${issue}`);
    }
  } else if (error instanceof RetrievalError) {
    console.error(`❌ ${prefix} (${error.code}): ${error.message}`);
  } else {
    console.error(`❌ ${prefix}:`, error instanceof Error ? error.message : error);
  }
  process.exit(1);
}

function createRetrievalService(config: AppConfig): RetrievalService {
  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  return new RetrievalService(config, new OpenAIVectorStoreGateway(config));
}

/**
 * Setup commands run before an assistant exists, so the assistant id is not demanded
 */
function loadSetupConfig(): AppConfig {
  return loadConfig({ ...process.env, SEARCH_MODE: 'vector-store' });
}

function requireApiKey(): string {
  const apiKey = process.env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError(['OPENAI_API_KEY is required']);
  }
  return apiKey;
}

program
  .name(SERVER_NAME)
  .description('Operator commands for the vector store MCP server')
  .version(SERVER_VERSION)
  .option('-e, --env-file <path>', 'Load environment variables from this file', '.env');

program.hook('preAction', () => {
  const { envFile } = program.opts<{ envFile: string }>();
  dotenv.config({ path: envFile });
});

program
  .command('check-config')
  .description('Validate configuration and report which values are present')
  .action(() => {
    try {
      const config = loadConfig();
      printJson(summarizeConfig(config));
      console.log('✅ Configuration is valid');
    } catch (error) {
      fail('Configuration check failed', error);
    }
  });

program
  .command('search')
  .description('Search the configured vector store and print the results')
  .argument('<query>', 'Natural-language search query')
  .action(async (query: string) => {
    try {
      const service = createRetrievalService(loadConfig());
      printJson(await service.search(query));
    } catch (error) {
      fail('Search failed', error);
    }
  });

program
  .command('fetch')
  .description('Fetch the full text and metadata of a document')
  .argument('<id>', 'File id returned by search')
  .action(async (id: string) => {
    try {
      const service = createRetrievalService(loadConfig());
      printJson(await service.fetch(id));
    } catch (error) {
      fail('Fetch failed', error);
    }
  });

program
  .command('list-vector-stores')
  .description('List the vector stores visible to the API key')
  .action(async () => {
    try {
      const client = new OpenAI({ apiKey: requireApiKey() });

      console.log('📁 Available vector stores:');
      for await (const store of client.vectorStores.list()) {
        console.log(`  ID: ${store.id}`);
        console.log(`  Name: ${store.name}`);
        console.log(`  Status: ${store.status}`);
        console.log(`  Files: ${store.file_counts.total}`);
        console.log(`  Created: ${new Date(store.created_at * 1000).toISOString()}`);
        console.log('  ---');
      }
    } catch (error) {
      fail('Failed to list vector stores', error);
    }
  });

program
  .command('create-assistant')
  .description('Create a file-search assistant bound to the configured vector store')
  .option('-m, --model <model>', 'Model the assistant runs on', DEFAULT_ASSISTANT_MODEL)
  .option('-n, --name <name>', 'Assistant name', DEFAULT_ASSISTANT_NAME)
  .action(async (options: AssistantOptions) => {
    try {
      const config = loadSetupConfig();
      const client = new OpenAI({ apiKey: config.openaiApiKey });

      const assistantId = await createFileSearchAssistant(client, config.vectorStoreId, options);

      console.log(`✅ Assistant created for vector store ${config.vectorStoreId}`);
      console.log('Add this to your .env file:');
      console.log(`ASSISTANT_ID=${assistantId}`);
    } catch (error) {
      fail('Failed to create assistant', error);
    }
  });

program
  .command('create-vector-store')
  .description('Create an empty vector store, optionally with an assistant bound to it')
  .option('-n, --name <name>', 'Vector store name', DEFAULT_VECTOR_STORE_NAME)
  .option('-a, --with-assistant', 'Also create a file-search assistant for the new store')
  .option('-m, --model <model>', 'Model for the assistant', DEFAULT_ASSISTANT_MODEL)
  .option('--assistant-name <name>', 'Assistant name', DEFAULT_ASSISTANT_NAME)
  .action(
    async (options: { name: string; withAssistant?: boolean; model: string; assistantName: string }) => {
      try {
        const client = new OpenAI({ apiKey: requireApiKey() });

        console.log('📁 Creating vector store...');
        const setup = await createVectorStore(
          client,
          options.name,
          options.withAssistant ? { model: options.model, name: options.assistantName } : undefined,
        );
        console.log(`✅ Vector store created: ${setup.vectorStoreId}`);
        if (setup.assistantId) {
          console.log(`✅ Assistant created: ${setup.assistantId}`);
        }

        console.log('Add this to your .env file:');
        for (const line of formatEnvLines(setup)) {
          console.log(line);
        }
        console.log(
          `Upload documents at https://platform.openai.com/storage/vector_stores/${setup.vectorStoreId}`,
        );
      } catch (error) {
        fail('Failed to create vector store', error);
      }
    },
  );

if (process.argv.length <= 2) {
  program.help();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  fail('Command failed', error);
});

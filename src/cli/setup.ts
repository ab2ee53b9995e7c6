export const DEFAULT_ASSISTANT_MODEL = 'gpt-4o-mini';
export const DEFAULT_ASSISTANT_NAME = 'Vector Store Search Assistant';
export const DEFAULT_VECTOR_STORE_NAME = 'MCP Server Document Store';

const ASSISTANT_INSTRUCTIONS =
  'You are a helpful assistant that searches through documents in a vector store to answer questions. ' +
  'Search the available documents and answer from the content found, citing the files you used.';

/**
 * The slice of the OpenAI client the setup commands call. `OpenAI` satisfies it.
 */
export interface SetupClient {
  vectorStores: {
    create(body: { name: string }): PromiseLike<{ id: string }>;
  };
  beta: {
    assistants: {
      create(body: {
        name: string;
        model: string;
        instructions: string;
        tools: Array<{ type: 'file_search' }>;
        tool_resources: { file_search: { vector_store_ids: string[] } };
      }): PromiseLike<{ id: string }>;
    };
  };
}

export interface AssistantOptions {
  model: string;
  name: string;
}

export interface VectorStoreSetup {
  vectorStoreId: string;
  assistantId?: string;
}

/**
 * Create a file-search assistant bound to one vector store
 */
export async function createFileSearchAssistant(
  client: SetupClient,
  vectorStoreId: string,
  options: AssistantOptions,
): Promise<string> {
  const assistant = await client.beta.assistants.create({
    name: options.name,
    model: options.model,
    instructions: ASSISTANT_INSTRUCTIONS,
    tools: [{ type: 'file_search' }],
    tool_resources: {
      file_search: { vector_store_ids: [vectorStoreId] },
    },
  });
  return assistant.id;
}

/**
 * Create an empty vector store and, when asked, an assistant that searches it
 */
export async function createVectorStore(
  client: SetupClient,
  name: string,
  assistant?: AssistantOptions,
): Promise<VectorStoreSetup> {
  const vectorStore = await client.vectorStores.create({ name });
  if (!assistant) {
    return { vectorStoreId: vectorStore.id };
  }
  const assistantId = await createFileSearchAssistant(client, vectorStore.id, assistant);
  return { vectorStoreId: vectorStore.id, assistantId };
}

/**
 * The .env lines an operator copies after setup
 */
export function formatEnvLines(setup: VectorStoreSetup): string[] {
  const lines = [`VECTOR_STORE_ID=${setup.vectorStoreId}`];
  if (setup.assistantId) {
    lines.push(`ASSISTANT_ID=${setup.assistantId}`);
  }
  return lines;
}

import {
  DEFAULT_ASSISTANT_MODEL,
  type SetupClient,
  createVectorStore,
  formatEnvLines,
} from '../../../cli/setup';

function createSetupClient() {
  const createStore = jest.fn(async () => ({ id: 'vs_new' }));
  const createAssistant = jest.fn(async () => ({ id: 'asst_new' }));
  const client: SetupClient = {
    vectorStores: { create: createStore },
    beta: { assistants: { create: createAssistant } },
  };
  return { client, createStore, createAssistant };
}

describe('createVectorStore', () => {
  it('creates only the vector store by default', async () => {
    const { client, createStore, createAssistant } = createSetupClient();

    const setup = await createVectorStore(client, 'Team documents');

    expect(setup).toEqual({ vectorStoreId: 'vs_new' });
    expect(createStore).toHaveBeenCalledWith({ name: 'Team documents' });
    expect(createAssistant).not.toHaveBeenCalled();
  });

  it('binds a new file-search assistant to the new store', async () => {
    const { client, createAssistant } = createSetupClient();

    const setup = await createVectorStore(client, 'Team documents', {
      model: DEFAULT_ASSISTANT_MODEL,
      name: 'Docs assistant',
    });

    expect(setup).toEqual({ vectorStoreId: 'vs_new', assistantId: 'asst_new' });
    expect(createAssistant).toHaveBeenCalledWith(
      expect.objectContaining({
        name: 'Docs assistant',
        model: 'gpt-4o-mini',
        tools: [{ type: 'file_search' }],
        tool_resources: { file_search: { vector_store_ids: ['vs_new'] } },
      }),
    );
  });

  it('does not create an assistant when the store cannot be created', async () => {
    const { client, createStore, createAssistant } = createSetupClient();
    createStore.mockRejectedValueOnce(new Error('quota exceeded'));

    await expect(
      createVectorStore(client, 'Team documents', { model: 'gpt-4o-mini', name: 'Docs assistant' }),
    ).rejects.toThrow('quota exceeded');
    expect(createAssistant).not.toHaveBeenCalled();
  });
});

describe('formatEnvLines', () => {
  it('prints the ids an operator copies into .env', () => {
    expect(formatEnvLines({ vectorStoreId: 'vs_new' })).toEqual(['VECTOR_STORE_ID=vs_new']);
    expect(formatEnvLines({ vectorStoreId: 'vs_new', assistantId: 'asst_new' })).toEqual([
      'VECTOR_STORE_ID=vs_new',
      'ASSISTANT_ID=asst_new',
    ]);
  });
});

import {
  BackendError,
  InvalidInputError,
  NotFoundError,
} from '../../../errors/retrieval-errors';
import { RetrievalService } from '../../../services/retrieval.service';
import {
  CAT_FILE_ID,
  FakeVectorStoreGateway,
  createCatStore,
} from '../../utils/fake-vector-store-gateway';
import { createTestConfig } from '../../utils/test-config';

const CAT_FILE_URL = `https://platform.openai.com/storage/files/${CAT_FILE_ID}`;

describe('RetrievalService', () => {
  let gateway: FakeVectorStoreGateway;
  let service: RetrievalService;

  beforeEach(() => {
    gateway = createCatStore();
    service = new RetrievalService(createTestConfig(), gateway);
  });

  describe('input validation', () => {
    it.each([[''], ['   '], [undefined], [42]])('rejects query %p without calling the backend', async (query) => {
      await expect(service.search(query)).rejects.toThrow(InvalidInputError);
      expect(gateway.calls).toEqual([]);
    });

    it.each([[''], ['\t'], [null]])('rejects id %p without calling the backend', async (id) => {
      await expect(service.fetch(id)).rejects.toThrow('id must be a non-empty string');
      expect(gateway.calls).toEqual([]);
    });
  });

  describe('search in assistant mode', () => {
    it('returns one result per citation with the cited excerpt', async () => {
      const response = await service.search('cats behavior');

      expect(response).toEqual({
        results: [
          {
            id: CAT_FILE_ID,
            title: 'feline_ethology.pdf',
            text: 'Cats knead soft surfaces when content.',
            url: CAT_FILE_URL,
          },
          {
            id: CAT_FILE_ID,
            title: 'feline_ethology.pdf',
            text: 'They also groom each other to bond.',
            url: CAT_FILE_URL,
          },
        ],
      });
    });

    it('looks up each cited file once', async () => {
      await service.search('  cats behavior  ');

      expect(gateway.calls).toEqual([
        'askAssistant:cats behavior',
        `retrieveFileMetadata:${CAT_FILE_ID}`,
      ]);
    });

    it('returns an empty list when the answer cites nothing', async () => {
      gateway.assistantMessages = [
        {
          role: 'assistant',
          content: [{ type: 'text', text: { value: 'I found nothing.', annotations: [] } }],
        },
      ];

      await expect(service.search('dragons')).resolves.toEqual({ results: [] });
    });

    it('surfaces backend failures as BackendError', async () => {
      gateway.failure = new BackendError('assistant search failed: 503 overloaded');

      await expect(service.search('cats behavior')).rejects.toThrow(
        'assistant search failed: 503 overloaded',
      );
    });

    it('rejects malformed assistant output', async () => {
      gateway.assistantMessages = { object: 'list' };

      await expect(service.search('cats behavior')).rejects.toThrow(
        'Malformed vendor payload: assistant messages',
      );
    });

    it('fails the whole search when a cited file cannot be resolved', async () => {
      gateway.files.clear();

      const failure = service.search('cats behavior');

      await expect(failure).rejects.toThrow(BackendError);
      await expect(failure).rejects.toThrow(
        "Search failed: No document found with id 'file-cats01'",
      );
    });
  });

  describe('search in vector-store mode', () => {
    beforeEach(() => {
      service = new RetrievalService(
        createTestConfig({ SEARCH_MODE: 'vector-store', MAX_SEARCH_RESULTS: '3', SNIPPET_LENGTH: '20' }),
        gateway,
      );
    });

    it('passes the result limit and truncates snippets', async () => {
      gateway.searchHits = [
        {
          file_id: CAT_FILE_ID,
          filename: 'feline_ethology.pdf',
          score: 0.82,
          attributes: {},
          content: [{ type: 'text', text: 'Cats sleep up to sixteen hours a day.' }],
        },
      ];

      const response = await service.search('cat sleep');

      expect(gateway.lastMaxResults).toBe(3);
      expect(response.results).toEqual([
        {
          id: CAT_FILE_ID,
          title: 'feline_ethology.pdf',
          text: 'Cats sleep up to six...',
          url: CAT_FILE_URL,
        },
      ]);
    });

    it('returns an empty list for zero hits', async () => {
      await expect(service.search('dragons')).resolves.toEqual({ results: [] });
    });
  });

  describe('fetch', () => {
    it('returns the full text and metadata of a cited file', async () => {
      const document = await service.fetch(CAT_FILE_ID);

      expect(document).toEqual({
        id: CAT_FILE_ID,
        title: 'feline_ethology.pdf',
        text: 'Chapter 1. Kneading.\n\nChapter 2. Grooming.',
        url: CAT_FILE_URL,
        metadata: {
          filename: 'feline_ethology.pdf',
          purpose: 'assistants',
          bytes: '2048',
          created_at: '2023-11-14T22:13:20.000Z',
          author: 'J. Doe',
          year: '2021',
        },
      });
    });

    it('checks vector store membership before reading the file', async () => {
      await service.fetch(` ${CAT_FILE_ID} `);

      expect(gateway.calls[0]).toBe(`retrieveVectorStoreFile:${CAT_FILE_ID}`);
      expect(gateway.calls).toHaveLength(3);
    });

    it('rejects unknown ids with NotFoundError', async () => {
      const failure = service.fetch('file-unknown');

      await expect(failure).rejects.toThrow(NotFoundError);
      await expect(failure).rejects.not.toThrow(BackendError);
      expect(gateway.calls).toEqual(['retrieveVectorStoreFile:file-unknown']);
    });

    it('resolves every id returned by search', async () => {
      const { results } = await service.search('cats behavior');

      for (const result of results) {
        const document = await service.fetch(result.id);
        expect(document.id).toBe(result.id);
      }
    });

    it('wraps unexpected failures in BackendError', async () => {
      gateway.failure = new TypeError('fetch is not a function');

      await expect(service.fetch(CAT_FILE_ID)).rejects.toThrow(
        'Fetch failed: fetch is not a function',
      );
    });
  });
});

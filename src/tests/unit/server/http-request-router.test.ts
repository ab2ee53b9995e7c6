import { createServer, type Server } from 'node:http';
import request from 'supertest';

import { RequestSecurityMiddleware } from '../../../server/middleware/request-security.middleware';
import { createServerConfig } from '../../../server/base/base-httpstream-server';
import { ServerLifecycleManager } from '../../../server/services/server-lifecycle-manager';
import { BackendError } from '../../../errors/retrieval-errors';
import { BACKEND_FAILURE_MESSAGE } from '../../../mcp/utils/error-utils';
import { createLogger } from '../../../utils/logger';
import {
  CAT_FILE_ID,
  type FakeVectorStoreGateway,
  createCatStore,
} from '../../utils/fake-vector-store-gateway';
import { createTestConfig } from '../../utils/test-config';

const MCP_ACCEPT = 'application/json, text/event-stream';

const initializeRequest = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

describe('HttpRequestRouter', () => {
  let manager: ServerLifecycleManager;
  let server: Server;
  let gateway: FakeVectorStoreGateway;

  beforeEach(async () => {
    gateway = createCatStore();
    manager = new ServerLifecycleManager(createTestConfig(), {
      gateway,
      server: { maxRequestSize: 1024 },
    });
    server = manager.createHttpServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  });

  afterEach(async () => {
    await manager.getSessionManagerService().cleanupAllSessions();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  describe('health and info', () => {
    it('reports health without secret values', async () => {
      const response = await request(server).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual(
        expect.objectContaining({
          status: 'healthy',
          service: 'vector-store-mcp',
          version: '1.0.0',
          config: {
            openaiApiKey: true,
            vectorStoreId: true,
            assistantId: true,
            port: 8000,
            mcpPath: '/mcp',
            searchMode: 'assistant',
          },
        }),
      );
      expect(response.body.sessions.totalSessions).toBe(0);
      expect(response.text.includes('test-key')).toBe(false);
    });

    it('describes the service at the root path', async () => {
      const response = await request(server).get('/');

      expect(response.status).toBe(200);
      expect(response.body.endpoints).toEqual({
        health: '/health',
        mcp: '/mcp',
        search: '/search',
        fetch: '/fetch',
      });
      expect(response.body.tools).toEqual(['search', 'fetch']);
    });

    it('rejects other methods on the health endpoint', async () => {
      const response = await request(server).post('/health').send({});

      expect(response.status).toBe(405);
    });
  });

  describe('routing', () => {
    it('returns 404 for unknown paths', async () => {
      const response = await request(server).get('/sse');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Not Found', path: '/sse' });
    });

    it('answers CORS preflight requests', async () => {
      const response = await request(server).options('/mcp');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-expose-headers']).toBe('mcp-session-id');
    });

    it('returns 405 for unsupported methods on the MCP endpoint', async () => {
      const response = await request(server).put('/mcp').send({});

      expect(response.status).toBe(405);
      expect(response.body.error.message).toBe('Method not allowed');
    });
  });

  describe('POST validation', () => {
    it('requires a JSON content type', async () => {
      const response = await request(server)
        .post('/mcp')
        .set('Content-Type', 'text/plain')
        .send('hello');

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Invalid request headers');
    });

    it('rejects bodies that are not JSON', async () => {
      const response = await request(server)
        .post('/mcp')
        .set('Content-Type', 'application/json')
        .send('{"jsonrpc":');

      expect(response.status).toBe(400);
      expect(response.body.error).toEqual({ code: -32700, message: 'Parse error' });
    });

    it('rejects bodies over the size limit', async () => {
      const response = await request(server)
        .post('/mcp')
        .set('Content-Type', 'application/json')
        .send({ jsonrpc: '2.0', id: 1, method: 'ping', params: { padding: 'x'.repeat(2048) } });

      expect(response.status).toBe(413);
      expect(response.body.error.message).toBe('Payload Too Large');
    });

    it('rejects unknown session ids', async () => {
      const response = await request(server)
        .post('/mcp')
        .set('Content-Type', 'application/json')
        .set('Accept', MCP_ACCEPT)
        .set('mcp-session-id', 'session-unknown')
        .send({ jsonrpc: '2.0', id: 2, method: 'tools/list' });

      expect(response.status).toBe(404);
      expect(response.body.error).toEqual({ code: -32001, message: 'Session not found' });
    });

    it('rejects GET and DELETE without a session', async () => {
      expect((await request(server).get('/mcp')).status).toBe(400);
      expect((await request(server).delete('/mcp')).status).toBe(400);
    });
  });

  describe('direct search and fetch endpoints', () => {
    it('returns search results without an MCP session', async () => {
      const response = await request(server).post('/search').send({ query: 'cats behavior' });

      expect(response.status).toBe(200);
      expect(response.body.results.map((result: { id: string }) => result.id)).toEqual([
        CAT_FILE_ID,
        CAT_FILE_ID,
      ]);
      expect(gateway.calls[0]).toBe('askAssistant:cats behavior');
    });

    it('returns a fetched document', async () => {
      const response = await request(server).post('/fetch').send({ id: CAT_FILE_ID });

      expect(response.status).toBe(200);
      expect(response.body.title).toBe('feline_ethology.pdf');
      expect(response.body.text).toBe('Chapter 1. Kneading.\n\nChapter 2. Grooming.');
    });

    it('answers 400 with the tool error payload for a missing query', async () => {
      const response = await request(server).post('/search').send({});

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        code: 'INVALID_INPUT',
        error: 'query must be a non-empty string',
        errorId: expect.any(String),
      });
      expect(gateway.calls).toEqual([]);
    });

    it('answers 404 for an unknown document', async () => {
      const response = await request(server).post('/fetch').send({ id: 'file-unknown' });

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('NOT_FOUND');
      expect(response.body.error).toBe("No document found with id 'file-unknown'");
    });

    it('answers 500 without backend details when the backend fails', async () => {
      gateway.failure = new BackendError('assistant search failed: 401 Incorrect API key provided');

      const response = await request(server).post('/search').send({ query: 'cats behavior' });

      expect(response.status).toBe(500);
      expect(response.body.code).toBe('BACKEND_ERROR');
      expect(response.body.error).toBe(BACKEND_FAILURE_MESSAGE);
    });

    it('accepts only POST', async () => {
      expect((await request(server).get('/search')).status).toBe(405);
    });
  });

  describe('sessions', () => {
    async function initialize(): Promise<string> {
      const response = await request(server)
        .post('/mcp')
        .set('Content-Type', 'application/json')
        .set('Accept', MCP_ACCEPT)
        .send(initializeRequest);

      expect(response.status).toBe(200);
      expect(response.body.result.serverInfo).toEqual({ name: 'vector-store-mcp', version: '1.0.0' });

      const sessionId = response.headers['mcp-session-id'];
      if (typeof sessionId !== 'string') {
        throw new Error('expected an mcp-session-id header');
      }
      return sessionId;
    }

    it('creates a session on initialize and tracks it', async () => {
      const sessionId = await initialize();
      const sessions = manager.getSessionManagerService();

      expect(sessions.isSessionActive(sessionId)).toBe(true);
      expect(manager.getServerStatus().sessions.active).toBe(1);
    });

    it('ends a session on DELETE', async () => {
      const sessionId = await initialize();

      const response = await request(server).delete('/mcp').set('mcp-session-id', sessionId);

      expect(response.status).toBe(200);
      expect(manager.getSessionManagerService().isSessionActive(sessionId)).toBe(false);
    });

    it('drops sessions idle for longer than the timeout', async () => {
      const sessionId = await initialize();

      const removed = await manager.getSessionManagerService().cleanupInactiveSessions(-1);

      expect(removed).toEqual([sessionId]);
      expect(manager.getSessionManagerService().getSessionStatistics().totalSessions).toBe(0);
    });
  });
});

describe('HttpRequestRouter with a short request timeout', () => {
  let manager: ServerLifecycleManager;
  let server: Server;

  beforeEach(async () => {
    const gateway = createCatStore();
    const answer = gateway.assistantMessages;
    jest.spyOn(gateway, 'askAssistant').mockImplementation(async () => {
      await new Promise((resolve) => setTimeout(resolve, 150));
      return answer;
    });

    manager = new ServerLifecycleManager(createTestConfig(), {
      gateway,
      server: { requestTimeout: 50 },
    });
    server = manager.createHttpServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  });

  afterEach(async () => {
    await manager.getSessionManagerService().cleanupAllSessions();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('lets a tool call run past the timeout once the body is read', async () => {
    const initialized = await request(server)
      .post('/mcp')
      .set('Content-Type', 'application/json')
      .set('Accept', MCP_ACCEPT)
      .send(initializeRequest);
    const sessionId = initialized.headers['mcp-session-id'];
    if (typeof sessionId !== 'string') {
      throw new Error('expected an mcp-session-id header');
    }

    const response = await request(server)
      .post('/mcp')
      .set('Content-Type', 'application/json')
      .set('Accept', MCP_ACCEPT)
      .set('mcp-session-id', sessionId)
      .send({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'search', arguments: { query: 'cats behavior' } },
      });

    expect(response.status).toBe(200);
    expect(response.body.result.isError).toBeFalsy();
    expect(response.body.result.content[0].type).toBe('text');
  });
});

describe('RequestSecurityMiddleware timeout protection', () => {
  it('answers 408 when a request outlives the timeout', async () => {
    const config = createServerConfig(createTestConfig(), { requestTimeout: 50 });
    const middleware = new RequestSecurityMiddleware(config, createLogger('SecurityTest'));
    const logger = createLogger('SecurityTest');

    // Never responds on its own
    const server = createServer((_req, res) => {
      middleware.applyTimeoutProtection(res, logger);
    });

    const response = await request(server).get('/slow');

    expect(response.status).toBe(408);
    expect(response.body.error.message).toBe('Request timeout');
  });
});

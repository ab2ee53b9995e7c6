import { createMcpServer, createServerConfig } from '../../../server/base/base-httpstream-server';
import { SessionTransportManager } from '../../../server/services/session-transport-manager';
import { createTestConfig } from '../../utils/test-config';

describe('SessionTransportManager', () => {
  let manager: SessionTransportManager;

  beforeEach(() => {
    manager = new SessionTransportManager(createServerConfig(createTestConfig()));
  });

  it('starts without sessions', () => {
    expect(manager.getActiveSessionIds()).toEqual([]);
    expect(manager.getSessionStatistics()).toEqual({
      totalSessions: 0,
      averageDuration: 0,
      oldestSession: null,
      newestSession: null,
    });
  });

  it('does not register a session before initialization', () => {
    const transport = manager.createTransport(createMcpServer(), () => 'session-1');

    expect(transport.sessionId).toBeUndefined();
    expect(manager.isSessionActive('session-1')).toBe(false);
    expect(manager.getTransport('session-1')).toBeUndefined();
  });

  it('ignores cleanup of unknown sessions', async () => {
    await expect(manager.cleanupSession('session-missing')).resolves.toBeUndefined();
    await expect(manager.cleanupInactiveSessions(0)).resolves.toEqual([]);
  });

  it('unreferences the periodic cleanup timer', () => {
    const timer = manager.startPeriodicCleanup(60000);

    expect(timer.hasRef()).toBe(false);
    clearInterval(timer);
  });
});

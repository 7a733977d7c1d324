import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ConnectionError,
  InvalidStateError,
  SessionLostError,
  type AgentError,
} from '@brokerline/types';
import { MemoryTransport } from '@brokerline/transport';
import { ConnectionManager, type ConnectionManagerOptions } from './connection-manager.js';
import { Session } from './session.js';

describe('ConnectionManager', () => {
  let transport: MemoryTransport;
  let session: Session;
  let manager: ConnectionManager;

  function createManager(overrides: Partial<ConnectionManagerOptions> = {}): ConnectionManager {
    return new ConnectionManager({
      transport,
      session,
      connectOptions: { endpoint: 'memory://test', clientId: 'agent-1' },
      backoff: { baseMs: 1000, maxMs: 8000, jitter: 0 },
      keepaliveIntervalMs: 0,
      keepaliveTimeoutMs: 1000,
      connectTimeoutMs: 2000,
      ...overrides,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    transport = new MemoryTransport();
    session = new Session('agent-1');
    manager = createManager();
  });

  afterEach(async () => {
    await manager.shutdown();
    vi.useRealTimers();
  });

  describe('start', () => {
    it('should connect and emit connected', async () => {
      const connected = vi.fn();
      manager.events.on('connected', connected);

      await manager.start();

      expect(session.state).toBe('connected');
      expect(transport.isConnected()).toBe(true);
      expect(connected).toHaveBeenCalledWith({ clientId: 'agent-1', at: Date.now() });
    });

    it('should pass the connect options to the transport', async () => {
      await manager.start();

      expect(transport.lastConnectOptions).toEqual({
        endpoint: 'memory://test',
        clientId: 'agent-1',
      });
    });

    it('should be a no-op when already connected', async () => {
      await manager.start();
      await manager.start();

      expect(transport.connectAttempts).toBe(1);
    });

    it('should run connected hooks in order before emitting connected', async () => {
      const order: string[] = [];
      manager.onConnected(() => {
        order.push('first');
      });
      manager.onConnected(async () => {
        order.push('second');
      });
      manager.events.on('connected', () => order.push('event'));

      await manager.start();

      expect(order).toEqual(['first', 'second', 'event']);
    });

    it('should keep going when a hook throws', async () => {
      manager.onConnected(() => {
        throw new Error('hook failed');
      });

      await manager.start();

      expect(session.state).toBe('connected');
    });
  });

  describe('reconnect', () => {
    it('should reject with ConnectionError and retry in the background', async () => {
      transport.failNextConnect(new Error('Not authorized'));
      const failures: Array<{ attempt: number; retryInMs: number }> = [];
      manager.events.on('connection_failed', ({ attempt, retryInMs }) =>
        failures.push({ attempt, retryInMs })
      );

      await expect(manager.start()).rejects.toThrow(
        'Failed to connect to memory://test: Not authorized'
      );
      expect(session.state).toBe('reconnecting');
      expect(failures).toEqual([{ attempt: 1, retryInMs: 1000 }]);

      await vi.advanceTimersByTimeAsync(1000);

      expect(session.state).toBe('connected');
      expect(transport.connectAttempts).toBe(2);
    });

    it('should double the delay after each failure and reset it on success', async () => {
      transport.failNextConnect();
      transport.failNextConnect();
      transport.failNextConnect();
      const delays: number[] = [];
      manager.events.on('connection_failed', ({ retryInMs }) => delays.push(retryInMs));

      await expect(manager.start()).rejects.toThrow(ConnectionError);
      await vi.advanceTimersByTimeAsync(1000);
      await vi.advanceTimersByTimeAsync(2000);
      await vi.advanceTimersByTimeAsync(4000);

      expect(delays).toEqual([1000, 2000, 4000]);
      expect(session.state).toBe('connected');
      expect(session.backoffAttempt).toBe(0);
    });

    it('should time out a handshake that never completes', async () => {
      vi.spyOn(transport, 'connect').mockImplementation(() => new Promise<void>(() => undefined));

      const result = manager.start();
      const assertion = expect(result).rejects.toThrow(
        'Failed to connect to memory://test: Handshake timed out after 2000ms'
      );
      await vi.advanceTimersByTimeAsync(2000);
      await assertion;

      expect(session.state).toBe('reconnecting');
    });

    it('should enter reconnecting on an unsolicited disconnect', async () => {
      const lost: SessionLostError[] = [];
      manager.events.on('session_lost', ({ error }) => lost.push(error));
      await manager.start();

      transport.dropConnection(new Error('Network down'));

      expect(session.state).toBe('reconnecting');
      expect(lost).toHaveLength(1);
      expect(lost[0]).toBeInstanceOf(SessionLostError);
      expect(lost[0]?.message).toBe('Session lost: Network down');

      await vi.advanceTimersByTimeAsync(1000);

      expect(session.state).toBe('connected');
      expect(transport.connectAttempts).toBe(2);
    });
  });

  describe('keepalive', () => {
    beforeEach(() => {
      manager = createManager({ keepaliveIntervalMs: 5000, keepaliveTimeoutMs: 1000 });
    });

    it('should keep pinging while pings succeed', async () => {
      const ping = vi.spyOn(transport, 'ping');
      await manager.start();

      await vi.advanceTimersByTimeAsync(15000);

      expect(ping).toHaveBeenCalledTimes(3);
      expect(session.state).toBe('connected');
    });

    it('should treat an unanswered ping as a lost session', async () => {
      const lost: AgentError[] = [];
      manager.events.on('session_lost', ({ error }) => lost.push(error));
      await manager.start();
      transport.pingBehavior = 'hang';

      await vi.advanceTimersByTimeAsync(5000);
      expect(session.state).toBe('connected');

      await vi.advanceTimersByTimeAsync(1000);

      expect(session.state).toBe('reconnecting');
      expect(transport.isConnected()).toBe(false);
      expect(lost.map((error) => error.message)).toEqual([
        'Session lost: Keepalive not acknowledged within 1000ms',
      ]);
    });

    it('should treat a failed ping as a lost session', async () => {
      await manager.start();
      transport.pingBehavior = 'fail';

      await vi.advanceTimersByTimeAsync(5000);

      expect(session.state).toBe('reconnecting');
    });
  });

  describe('shutdown', () => {
    it('should close the transport and enter closed', async () => {
      const closed = vi.fn();
      manager.events.on('closed', closed);
      await manager.start();

      await manager.shutdown();

      expect(session.state).toBe('closed');
      expect(transport.isConnected()).toBe(false);
      expect(closed).toHaveBeenCalledTimes(1);
    });

    it('should stop reconnecting', async () => {
      transport.failNextConnect();
      await expect(manager.start()).rejects.toThrow(ConnectionError);

      await manager.shutdown();
      await vi.advanceTimersByTimeAsync(60000);

      expect(transport.connectAttempts).toBe(1);
      expect(session.state).toBe('closed');
    });

    it('should refuse to start again', async () => {
      await manager.shutdown();

      await expect(manager.start()).rejects.toThrow(InvalidStateError);
    });

    it('should not report the solicited close as a lost session', async () => {
      const lost = vi.fn();
      manager.events.on('session_lost', lost);
      await manager.start();

      await manager.shutdown();

      expect(lost).not.toHaveBeenCalled();
    });
  });
});

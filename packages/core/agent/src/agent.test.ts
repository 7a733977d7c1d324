import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AgentErrorCodes,
  BackpressureError,
  ConnectionError,
  DeliveryFailureError,
  InvalidStateError,
  SessionLostError,
  TimeoutError,
} from '@brokerline/types';
import { MemoryTransport } from '@brokerline/transport';
import { decodeJson, decodeText, silentLogger } from '@brokerline/utils';
import { Agent, createAgent, type AgentOptions } from './agent.js';

function replyTopic(payload: Uint8Array): string {
  const envelope = decodeJson(payload);
  if (
    typeof envelope === 'object' &&
    envelope !== null &&
    'replyTo' in envelope &&
    typeof envelope.replyTo === 'string'
  ) {
    return envelope.replyTo;
  }
  throw new Error('Request envelope has no replyTo');
}

describe('Agent', () => {
  let transport: MemoryTransport;
  let agent: Agent;

  function createTestAgent(overrides: Partial<AgentOptions> = {}): Agent {
    return createAgent({
      clientId: 'pump-7',
      endpoint: 'memory://test',
      transport,
      keepaliveIntervalMs: 0,
      backoff: { baseMs: 1000, maxMs: 8000, jitter: 0 },
      logger: silentLogger,
      ...overrides,
    });
  }

  beforeEach(() => {
    transport = new MemoryTransport();
    agent = createTestAgent();
  });

  afterEach(async () => {
    await agent.disconnect();
    vi.useRealTimers();
  });

  describe('constructor', () => {
    it('should require a client id', () => {
      expect(() => createTestAgent({ clientId: '' })).toThrow(InvalidStateError);
    });

    it.each([
      ['mqtts://broker.test:8883', 'mqtt'],
      ['nats://localhost:4222', 'nats'],
      ['memory://local', 'memory'],
    ])('should pick the transport for %s when none is given', (endpoint, kind) => {
      const standalone = createAgent({ clientId: 'pump-7', endpoint, logger: silentLogger });

      expect(standalone.getHealth().transport).toBe(kind);
    });

    it('should prefer an injected transport over the endpoint scheme', () => {
      const injected = createTestAgent({ endpoint: 'mqtt://localhost:1883' });

      expect(injected.getHealth().transport).toBe('memory');
    });
  });

  describe('connect', () => {
    it('should connect with the configured credentials', async () => {
      agent = createTestAgent({ username: 'pump-7', password: 'test-secret' });

      await agent.connect();

      expect(agent.isConnected()).toBe(true);
      expect(transport.lastConnectOptions).toMatchObject({
        endpoint: 'memory://test',
        clientId: 'pump-7',
        username: 'pump-7',
        password: 'test-secret',
        cleanSession: true,
      });
    });

    it('should share one attempt and one response subscription between concurrent connects', async () => {
      await Promise.all([agent.connect(), agent.connect()]);

      expect(agent.isConnected()).toBe(true);
      expect(transport.connectAttempts).toBe(1);
      expect(agent.getHealth().subscriptions).toBe(1);
    });

    it('should derive the protocol keepalive from the ping interval', async () => {
      agent = createTestAgent({ keepaliveIntervalMs: 15_500 });

      await agent.connect();

      expect(transport.lastConnectOptions?.keepaliveSeconds).toBe(16);
    });

    it('should report state changes', async () => {
      const states: string[] = [];
      agent.on('state', ({ from, to }) => states.push(`${from}>${to}`));

      await agent.connect();

      expect(states).toEqual(['disconnected>connecting', 'connecting>connected']);
    });

    it('should reject the first failed handshake and keep retrying', async () => {
      vi.useFakeTimers();
      transport.failNextConnect(new Error('Not authorized'));

      await expect(agent.connect()).rejects.toThrow(ConnectionError);
      expect(agent.state).toBe('reconnecting');

      await vi.advanceTimersByTimeAsync(1000);

      expect(agent.state).toBe('connected');
    });
  });

  describe('subscribe', () => {
    it('should deliver an inbound message exactly once', async () => {
      await agent.connect();
      const received: string[] = [];

      await agent.subscribe('sensors/1', (message) => {
        received.push(decodeText(message.payload));
      });
      transport.inject('sensors/1', '{"t":21}');
      await agent.whenIdle();

      expect(received).toEqual(['{"t":21}']);
    });

    it('should activate subscriptions registered before connecting', async () => {
      const handler = vi.fn();
      await agent.subscribe('sensors/+', handler, { qos: 1 });

      await agent.connect();
      transport.inject('sensors/9', 'x');
      await agent.whenIdle();

      expect(handler).toHaveBeenCalledTimes(1);
      expect(transport.subscriptionQos('sensors/+')).toBe(1);
    });

    it('should stop delivery after the handle unsubscribes', async () => {
      await agent.connect();
      const handler = vi.fn();
      const handle = await agent.subscribe('sensors/1', handler);

      expect(await handle.unsubscribe()).toBe(true);
      expect(await agent.unsubscribe(handle)).toBe(false);
      expect(transport.inject('sensors/1', 'x')).toBe(false);
    });

    it('should send handler failures to the error sink and the error event', async () => {
      const onError = vi.fn();
      const errorEvent = vi.fn();
      agent = createTestAgent({ onError });
      agent.on('error', errorEvent);
      await agent.connect();
      await agent.subscribe('sensors/1', () => {
        throw new Error('boom');
      });

      transport.inject('sensors/1', 'x');
      await agent.whenIdle();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[1]).toEqual({
        source: 'handler',
        topic: 'sensors/1',
        pattern: 'sensors/1',
      });
      expect(errorEvent).toHaveBeenCalledTimes(1);
    });
  });

  describe('publish', () => {
    it('should encode payloads and default to QoS 1', async () => {
      await agent.connect();

      await agent.publish('telemetry/pump-7', { rpm: 1200 });
      await agent.publish('telemetry/pump-7', 'plain text', { qos: 0 });
      await agent.publish('telemetry/pump-7', new Uint8Array([1, 2, 3]), { waitForDelivery: true });

      expect(transport.published.map((message) => message.qos)).toEqual([1, 0, 1]);
      expect(decodeText(transport.published[0]?.payload ?? new Uint8Array())).toBe('{"rpm":1200}');
      expect(decodeText(transport.published[1]?.payload ?? new Uint8Array())).toBe('plain text');
      expect(transport.published[2]?.payload).toEqual(new Uint8Array([1, 2, 3]));
    });

    it('should reject the publish past queue capacity with BackpressureError', async () => {
      agent = createTestAgent({ queueCapacity: 100 });

      for (let i = 0; i < 100; i++) {
        await agent.publish('telemetry/pump-7', { i });
      }

      await expect(agent.publish('telemetry/pump-7', { i: 100 })).rejects.toThrow(
        BackpressureError
      );
      expect(agent.getHealth().queuedJobs).toBe(100);
    });

    it('should replay queued jobs in order after the session is lost', async () => {
      vi.useFakeTimers();
      transport.autoAck = false;
      await agent.connect();

      await agent.publish('telemetry/pump-7', '1');
      await agent.publish('telemetry/pump-7', '2');
      await agent.publish('telemetry/pump-7', '3');
      expect(transport.published).toHaveLength(1);

      transport.dropConnection();

      expect(agent.state).toBe('reconnecting');
      expect(agent.getHealth().queuedJobs).toBe(3);

      transport.autoAck = true;
      await vi.advanceTimersByTimeAsync(1000);

      expect(agent.state).toBe('connected');
      expect(transport.published.slice(1).map((message) => decodeText(message.payload))).toEqual([
        '1',
        '2',
        '3',
      ]);
      expect(agent.getHealth().queuedJobs).toBe(0);
    });

    it('should report dropped jobs through delivery_failed', async () => {
      const failed = vi.fn();
      const onError = vi.fn();
      agent = createTestAgent({ maxRetries: 0, onError });
      agent.on('delivery_failed', failed);
      await agent.connect();
      transport.failNextPublish();

      await expect(
        agent.publish('telemetry/pump-7', 'x', { waitForDelivery: true })
      ).rejects.toThrow(DeliveryFailureError);

      expect(failed).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[1]).toEqual({ source: 'publisher', topic: 'telemetry/pump-7' });
    });
  });

  describe('call', () => {
    it('should resolve with the correlated response', async () => {
      await agent.connect();

      const result = agent.callJson('cmd/status', { verbose: true });
      const request = transport.published[0];
      expect(request?.topic).toBe('cmd/status');
      expect(request && replyTopic(request.payload)).toMatch(/^iot\/rpc\/response\/pump-7\/.+/);

      transport.inject(replyTopic(request?.payload ?? new Uint8Array()), '{"state":"running"}');

      await expect(result).resolves.toEqual({ state: 'running' });
    });

    it('should time out when no response arrives', async () => {
      vi.useFakeTimers();
      await agent.connect();

      const result = agent.call('cmd/reboot', {}, { timeoutMs: 2000 });
      const assertion = expect(result).rejects.toThrow(TimeoutError);
      await vi.advanceTimersByTimeAsync(2000);

      await assertion;
      expect(agent.getHealth().pendingCalls).toBe(0);
    });

    it('should fail fast while not connected', async () => {
      await expect(agent.call('cmd/reboot', {})).rejects.toThrow(SessionLostError);
    });

    it('should fail pending calls when the session is lost', async () => {
      const lost = vi.fn();
      agent.on('session_lost', lost);
      await agent.connect();

      const result = agent.call('cmd/reboot', {});
      transport.dropConnection(new Error('Network down'));

      await expect(result).rejects.toThrow('Session lost: Network down (call to cmd/reboot)');
      expect(lost).toHaveBeenCalledTimes(1);
    });

    it('should cancel a call by correlation id', async () => {
      await agent.connect();

      const result = agent.call('cmd/reboot', {});
      const request = transport.published[0];
      const correlationId = replyTopic(request?.payload ?? new Uint8Array()).split('/').pop() ?? '';

      expect(agent.cancelCall(correlationId)).toBe(true);
      await expect(result).rejects.toMatchObject({ code: AgentErrorCodes.CANCELLED });
    });
  });

  describe('disconnect', () => {
    it('should flush queued telemetry before closing', async () => {
      transport.autoAck = false;
      await agent.connect();
      await agent.publish('telemetry/pump-7', '1');

      const closing = agent.disconnect();
      transport.ackAll();
      await closing;

      expect(agent.state).toBe('closed');
      expect(transport.isConnected()).toBe(false);
      expect(agent.getHealth().queuedJobs).toBe(0);
    });

    it('should fail undelivered jobs once the drain timeout passes', async () => {
      vi.useFakeTimers();
      transport.autoAck = false;
      agent = createTestAgent({ drainTimeoutMs: 100 });
      await agent.connect();
      const delivery = agent.publish('telemetry/pump-7', '1', { waitForDelivery: true });
      const assertion = expect(delivery).rejects.toThrow(
        'Publish to telemetry/pump-7 abandoned: agent disconnected'
      );

      const closing = agent.disconnect();
      await vi.advanceTimersByTimeAsync(100);
      await closing;

      await assertion;
    });

    it('should fail pending calls and emit closed', async () => {
      const closed = vi.fn();
      agent.on('closed', closed);
      await agent.connect();
      const result = agent.call('cmd/reboot', {});

      await agent.disconnect();

      await expect(result).rejects.toThrow('Agent disconnected (call to cmd/reboot)');
      expect(closed).toHaveBeenCalledTimes(1);
    });

    it('should refuse further use once closed', async () => {
      await agent.connect();
      await agent.disconnect();

      await expect(agent.connect()).rejects.toThrow(InvalidStateError);
      await expect(agent.publish('telemetry/pump-7', 'x')).rejects.toThrow(InvalidStateError);
      await expect(agent.subscribe('sensors/1', vi.fn())).rejects.toThrow(InvalidStateError);
    });
  });

  describe('getHealth', () => {
    it('should report unhealthy before connecting', () => {
      expect(agent.getHealth()).toEqual({
        status: 'unhealthy',
        clientId: 'pump-7',
        transport: 'memory',
        state: 'disconnected',
        uptime: 0,
        pendingCalls: 0,
        queuedJobs: 0,
        subscriptions: 0,
        checks: { connection: 'error' },
      });
    });

    it('should report uptime while connected', async () => {
      vi.useFakeTimers();
      await agent.connect();
      await agent.subscribe('sensors/1', vi.fn());

      vi.advanceTimersByTime(5000);
      const health = agent.getHealth();

      expect(health.status).toBe('healthy');
      expect(health.uptime).toBe(5);
      expect(health.subscriptions).toBe(2);
      expect(health.checks.connection).toBe('ok');
    });

    it('should report degraded while reconnecting', async () => {
      await agent.connect();

      transport.dropConnection();

      expect(agent.getHealth().status).toBe('degraded');
    });
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AgentError, InvalidMessageError } from '@brokerline/types';
import type { BrokerlineConfig } from '@brokerline/config';
import { createAgent, type Agent } from '@brokerline/agent';
import { MemoryTransport } from '@brokerline/transport';
import { decodeJson, silentLogger } from '@brokerline/utils';
import { PlatformClient, createPlatformClient } from './client.js';
import type { CommandMessage } from './models.js';

const COMMAND_TOPIC = 'iot/cmd/agent/1/fmt/json';

describe('PlatformClient', () => {
  let transport: MemoryTransport;
  let onError: ReturnType<typeof vi.fn>;
  let agent: Agent;
  let client: PlatformClient;

  beforeEach(async () => {
    transport = new MemoryTransport();
    onError = vi.fn();
    agent = createAgent({
      clientId: '100_1',
      endpoint: 'memory://test',
      transport,
      keepaliveIntervalMs: 0,
      logger: silentLogger,
      onError,
    });
    client = new PlatformClient({ agent, agentId: 1 });
    await client.start();
  });

  afterEach(async () => {
    await client.stop();
  });

  it('should subscribe to the agent command topic at QoS 1', () => {
    expect(transport.subscriptionQos(COMMAND_TOPIC)).toBe(1);
  });

  describe('outbound', () => {
    it('should publish events at QoS 1', async () => {
      await client.sendEvent({ tags: [{ id: 1, value: 21.5, timestamp: new Date(1000) }] });

      const [message] = transport.published;
      expect(message?.topic).toBe('iot/event/fmt/json');
      expect(message?.qos).toBe(1);
      expect(message && decodeJson(message.payload)).toEqual({
        tags: [{ id: 1, value: 21.5, timestamp: 1_000_000 }],
      });
    });

    it('should publish logs', async () => {
      await client.sendLogs([{ level: 4, message: 'disk full' }]);

      expect(transport.published[0]?.topic).toBe('iot/log/fmt/json');
    });

    it('should publish command status to the agent and device topics', async () => {
      const status = { id: 'cmd-1', status: 'done' as const, timestamp: new Date(0) };

      await client.sendAgentCommandStatus(status);
      await client.sendDeviceCommandStatus(100, status, { waitForDelivery: true });

      expect(transport.published.map((message) => message.topic)).toEqual([
        'iot/cmd/agent/1/status/fmt/json',
        'iot/cmd/device/100/status/fmt/json',
      ]);
    });
  });

  describe('commands', () => {
    const command = JSON.stringify({
      command: { id: 'reboot', tags: [{ id: 1, value: true }], timestamp: 1_000_000 },
      devices: [],
    });

    it('should hand decoded commands to every handler', async () => {
      const received: CommandMessage[] = [];
      const second = vi.fn();
      client.onCommands((message) => {
        received.push(message);
      });
      client.onCommands(second);

      transport.inject(COMMAND_TOPIC, command);
      await agent.whenIdle();

      expect(received).toEqual([
        {
          command: { id: 'reboot', tags: [{ id: 1, value: true }], timestamp: new Date(1000) },
          devices: [],
        },
      ]);
      expect(second).toHaveBeenCalledTimes(1);
    });

    it('should stop calling a removed handler', async () => {
      const handler = vi.fn();
      const remove = client.onCommands(handler);

      remove();
      transport.inject(COMMAND_TOPIC, command);
      await agent.whenIdle();

      expect(handler).not.toHaveBeenCalled();
    });

    it('should keep calling handlers after one throws', async () => {
      const second = vi.fn();
      client.onCommands(() => {
        throw new Error('boom');
      });
      client.onCommands(second);

      transport.inject(COMMAND_TOPIC, command);
      await agent.whenIdle();

      expect(second).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toMatchObject({ message: 'boom' });
      expect(onError.mock.calls[0]?.[1]).toEqual({
        source: 'handler',
        topic: COMMAND_TOPIC,
        pattern: COMMAND_TOPIC,
      });
    });

    it('should report every failing handler together', async () => {
      client.onCommands(() => {
        throw new Error('first');
      });
      client.onCommands(async () => {
        throw new Error('second');
      });

      transport.inject(COMMAND_TOPIC, command);
      await agent.whenIdle();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toMatchObject({
        message: '2 command handlers failed',
      });
    });

    it('should report malformed commands and keep processing', async () => {
      const handler = vi.fn();
      client.onCommands(handler);

      transport.inject(COMMAND_TOPIC, '{"devices": "nope"}');
      transport.inject(COMMAND_TOPIC, command);
      await agent.whenIdle();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toBeInstanceOf(InvalidMessageError);
      expect(onError.mock.calls[0]?.[1]).toEqual({
        source: 'handler',
        topic: COMMAND_TOPIC,
        pattern: COMMAND_TOPIC,
      });
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  it('should close the agent on stop', async () => {
    await client.stop();

    expect(agent.state).toBe('closed');
    expect(transport.isConnected()).toBe(false);
  });
});

describe('createPlatformClient', () => {
  const config: BrokerlineConfig = {
    agent: { client_id: 'agent-1' },
    broker: { endpoint: 'memory://test' },
    platform: { client_id: 100, agent_id: 1, token: 'test-secret' },
  };

  it('should log in as <client_id>_<agent_id> with the agent token', async () => {
    const transport = new MemoryTransport();
    const client = createPlatformClient(config, {
      transport,
      keepaliveIntervalMs: 0,
      logger: silentLogger,
    });

    await client.start();
    await client.stop();

    expect(client.agentId).toBe(1);
    expect(transport.lastConnectOptions).toMatchObject({
      clientId: 'agent-1',
      username: '100_1',
      password: 'test-secret',
    });
  });

  it('should require a platform section', () => {
    const withoutPlatform: BrokerlineConfig = { agent: config.agent, broker: config.broker };

    expect(() => createPlatformClient(withoutPlatform)).toThrow(
      'Missing [platform] section in configuration'
    );
    expect(() => createPlatformClient(withoutPlatform)).toThrow(AgentError);
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SubscriptionError } from '@brokerline/types';
import { MemoryTransport } from './memory-transport.js';

const options = { endpoint: 'memory://test', clientId: 'agent-1' };

describe('MemoryTransport', () => {
  let transport: MemoryTransport;

  beforeEach(() => {
    transport = new MemoryTransport();
  });

  describe('connect', () => {
    it('should connect and count attempts', async () => {
      await transport.connect(options);

      expect(transport.isConnected()).toBe(true);
      expect(transport.connectAttempts).toBe(1);
      expect(transport.lastConnectOptions).toEqual(options);
    });

    it('should fail the next connect when scripted', async () => {
      transport.failNextConnect(new Error('Not authorized'));

      await expect(transport.connect(options)).rejects.toThrow('Not authorized');
      expect(transport.isConnected()).toBe(false);

      await transport.connect(options);
      expect(transport.isConnected()).toBe(true);
      expect(transport.connectAttempts).toBe(2);
    });
  });

  describe('subscriptions', () => {
    beforeEach(async () => {
      await transport.connect(options);
    });

    it('should deliver injected messages to matching subscriptions', async () => {
      const received: Array<[string, string]> = [];
      transport.onMessage((topic, payload) => {
        received.push([topic, new TextDecoder().decode(payload)]);
      });

      await transport.subscribe('sensors/+', 1);

      expect(transport.inject('sensors/1', '{"t":21}')).toBe(true);
      expect(transport.inject('actuators/1', 'x')).toBe(false);
      expect(received).toEqual([['sensors/1', '{"t":21}']]);
    });

    it('should stop delivering after unsubscribe', async () => {
      await transport.subscribe('sensors/1', 0);
      await transport.unsubscribe('sensors/1');

      expect(transport.inject('sensors/1', 'x')).toBe(false);
      expect(transport.subscribedPatterns).toEqual([]);
    });

    it('should refuse scripted patterns', async () => {
      transport.refuseSubscription('$SYS/#');

      await expect(transport.subscribe('$SYS/#', 0)).rejects.toThrow(SubscriptionError);
    });

    it('should forget subscriptions when the connection drops', async () => {
      await transport.subscribe('sensors/1', 1);
      transport.dropConnection();
      await transport.connect(options);

      expect(transport.subscribedPatterns).toEqual([]);
    });
  });

  describe('publish', () => {
    beforeEach(async () => {
      await transport.connect(options);
    });

    it('should record published messages', async () => {
      const payload = new Uint8Array([1, 2, 3]);
      await transport.publish('telemetry/1', payload, 1);

      expect(transport.published).toEqual([{ topic: 'telemetry/1', payload, qos: 1 }]);
    });

    it('should hold acknowledgments until released when autoAck is off', async () => {
      transport.autoAck = false;
      const settled = vi.fn();

      const first = transport.publish('t', new Uint8Array([1]), 1).then(settled);
      const second = transport.publish('t', new Uint8Array([2]), 1).then(settled);
      await Promise.resolve();

      expect(settled).not.toHaveBeenCalled();
      expect(transport.pendingAckCount).toBe(2);

      expect(transport.ackNext()).toBe(true);
      await first;
      expect(settled).toHaveBeenCalledTimes(1);

      expect(transport.ackAll()).toBe(1);
      await second;
      expect(settled).toHaveBeenCalledTimes(2);
    });

    it('should acknowledge QoS 0 immediately', async () => {
      transport.autoAck = false;

      await transport.publish('t', new Uint8Array([1]), 0);
      expect(transport.pendingAckCount).toBe(0);
    });

    it('should reject outstanding acknowledgments on connection loss', async () => {
      transport.autoAck = false;
      const pending = transport.publish('t', new Uint8Array([1]), 1);

      transport.dropConnection(new Error('link down'));

      await expect(pending).rejects.toThrow('link down');
    });

    it('should fail the next publish when scripted', async () => {
      transport.failNextPublish();

      await expect(transport.publish('t', new Uint8Array([1]), 1)).rejects.toThrow('Publish failed');
      expect(transport.published).toEqual([]);
    });

    it('should reject publish while disconnected', async () => {
      await transport.disconnect();

      await expect(transport.publish('t', new Uint8Array([1]), 1)).rejects.toThrow(
        'Memory transport is not connected'
      );
    });
  });

  describe('disconnect callbacks', () => {
    it('should fire on dropped connections only', async () => {
      const onDisconnect = vi.fn();
      transport.onDisconnect(onDisconnect);
      await transport.connect(options);

      await transport.disconnect();
      expect(onDisconnect).not.toHaveBeenCalled();

      await transport.connect(options);
      const error = new Error('broker went away');
      transport.dropConnection(error);
      expect(onDisconnect).toHaveBeenCalledWith(error);
    });
  });

  describe('ping', () => {
    beforeEach(async () => {
      await transport.connect(options);
    });

    it('should resolve by default', async () => {
      await expect(transport.ping()).resolves.toBeUndefined();
    });

    it('should fail when scripted', async () => {
      transport.pingBehavior = 'fail';

      await expect(transport.ping()).rejects.toThrow('Ping failed');
    });
  });
});

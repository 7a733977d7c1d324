/**
 * MQTT transport backed by mqtt.js
 *
 * mqtt.js handles framing, QoS handshakes and PINGREQ/PINGRESP. Its own
 * reconnect loop is disabled: reconnection belongs to the connection manager.
 */

import { connectAsync, type IClientOptions, type MqttClient } from 'mqtt';
import { SubscriptionError, type QoS } from '@brokerline/types';
import { silentLogger, type Logger } from '@brokerline/utils';
import type {
  DisconnectCallback,
  InboundCallback,
  TransportAdapter,
  TransportConnectOptions,
} from './types.js';

/** SUBACK return code for a refused subscription */
const SUBACK_FAILURE = 0x80;

const DEFAULT_KEEPALIVE_SECONDS = 60;

export interface MqttTransportOptions {
  logger?: Logger;
}

export class MqttTransport implements TransportAdapter {
  readonly kind = 'mqtt';

  private client: MqttClient | null = null;
  private readonly logger: Logger;
  private readonly messageCallbacks: InboundCallback[] = [];
  private readonly disconnectCallbacks: DisconnectCallback[] = [];

  constructor(options: MqttTransportOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async connect(options: TransportConnectOptions): Promise<void> {
    if (this.client) {
      await this.disconnect();
    }

    const clientOptions: IClientOptions = {
      clientId: options.clientId,
      username: options.username,
      password: options.password,
      keepalive: options.keepaliveSeconds ?? DEFAULT_KEEPALIVE_SECONDS,
      clean: options.cleanSession ?? true,
      connectTimeout: options.connectTimeoutMs,
      reconnectPeriod: 0,
      ca: options.tls?.ca,
      cert: options.tls?.cert,
      key: options.tls?.key,
    };

    const client = await connectAsync(options.endpoint, clientOptions, false);
    if (!client.connected) {
      await client.endAsync(true);
      throw new Error(`Connection to ${options.endpoint} ended before the handshake completed`);
    }

    this.client = client;

    client.on('message', (topic, payload) => {
      for (const callback of this.messageCallbacks) {
        callback(topic, payload);
      }
    });

    client.on('error', (error) => {
      this.logger.warn(`MQTT client error: ${error.message}`);
    });

    client.on('close', () => {
      // disconnect() clears this.client first, so only unsolicited closes get here
      if (this.client !== client) return;
      this.client = null;
      for (const callback of this.disconnectCallbacks) {
        callback(new Error('MQTT connection closed'));
      }
    });
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.endAsync();
  }

  isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  async subscribe(pattern: string, qos: QoS): Promise<void> {
    const client = this.requireClient();
    const granted = await client.subscribeAsync(pattern, { qos });

    const refused = granted.find((grant) => grant.qos === SUBACK_FAILURE);
    if (refused) {
      throw new SubscriptionError(`Broker refused subscription to ${pattern}`, {
        details: { pattern, qos },
      });
    }
  }

  async unsubscribe(pattern: string): Promise<void> {
    await this.requireClient().unsubscribeAsync(pattern);
  }

  async publish(topic: string, payload: Uint8Array, qos: QoS): Promise<void> {
    const client = this.requireClient();
    const buffer = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
    await client.publishAsync(topic, buffer, { qos });
  }

  /**
   * mqtt.js owns PINGREQ/PINGRESP and closes the stream when the broker
   * stops answering, so this only confirms the client is still connected.
   */
  async ping(): Promise<void> {
    this.requireClient();
  }

  onMessage(callback: InboundCallback): void {
    this.messageCallbacks.push(callback);
  }

  onDisconnect(callback: DisconnectCallback): void {
    this.disconnectCallbacks.push(callback);
  }

  private requireClient(): MqttClient {
    if (!this.client || !this.client.connected) {
      throw new Error('MQTT client is not connected');
    }
    return this.client;
  }
}

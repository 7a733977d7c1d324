/**
 * NATS transport
 *
 * Topics are translated to subjects (`/` → `.`, `+` → `*`, `#` → `>`).
 * NATS has no per-message acknowledgment for core publish, so QoS 1 and 2
 * wait for a flush round trip, which confirms the server processed
 * everything sent before it.
 */

import { connect } from 'nats';
import type { ConnectionOptions, NatsConnection, Subscription } from 'nats';
import type { QoS } from '@brokerline/types';
import { silentLogger, type Logger } from '@brokerline/utils';
import { fromNatsSubject, toNatsSubject } from './topics.js';
import type {
  DisconnectCallback,
  InboundCallback,
  TransportAdapter,
  TransportConnectOptions,
} from './types.js';

export interface NatsTransportOptions {
  logger?: Logger;
}

export class NatsTransport implements TransportAdapter {
  readonly kind = 'nats';

  private connection: NatsConnection | null = null;
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly logger: Logger;
  private readonly messageCallbacks: InboundCallback[] = [];
  private readonly disconnectCallbacks: DisconnectCallback[] = [];

  constructor(options: NatsTransportOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async connect(options: TransportConnectOptions): Promise<void> {
    if (this.connection) {
      await this.disconnect();
    }

    const connectionOptions: ConnectionOptions = {
      servers: options.endpoint,
      name: options.clientId,
      user: options.username,
      pass: options.password,
      timeout: options.connectTimeoutMs,
      reconnect: false,
    };
    if (options.tls) {
      connectionOptions.tls = { ...options.tls };
    }

    const connection = await connect(connectionOptions);
    this.connection = connection;
    this.monitorConnection(connection);
  }

  /**
   * Report the connection closing unless disconnect() closed it
   */
  private monitorConnection(connection: NatsConnection): void {
    connection
      .closed()
      .then((error) => {
        if (this.connection !== connection) return;
        this.connection = null;
        this.subscriptions.clear();
        const reason = error instanceof Error ? error : new Error('NATS connection closed');
        for (const callback of this.disconnectCallbacks) {
          callback(reason);
        }
      })
      .catch((error: unknown) => {
        this.logger.error('Error while monitoring NATS connection:', error);
      });
  }

  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    this.subscriptions.clear();
    if (!connection.isClosed()) {
      await connection.drain();
    }
  }

  isConnected(): boolean {
    return this.connection !== null && !this.connection.isClosed();
  }

  async subscribe(pattern: string, _qos: QoS): Promise<void> {
    const connection = this.requireConnection();
    if (this.subscriptions.has(pattern)) return;

    const subscription = connection.subscribe(toNatsSubject(pattern));
    this.subscriptions.set(pattern, subscription);
    this.processSubscription(subscription).catch((error: unknown) => {
      this.logger.error(`Subscription to ${pattern} ended with an error:`, error);
    });
  }

  /**
   * Forward every message of a subscription to the inbound callbacks
   */
  private async processSubscription(subscription: Subscription): Promise<void> {
    for await (const msg of subscription) {
      const topic = fromNatsSubject(msg.subject);
      for (const callback of this.messageCallbacks) {
        callback(topic, msg.data);
      }
    }
  }

  async unsubscribe(pattern: string): Promise<void> {
    const subscription = this.subscriptions.get(pattern);
    if (!subscription) return;
    this.subscriptions.delete(pattern);
    subscription.unsubscribe();
  }

  async publish(topic: string, payload: Uint8Array, qos: QoS): Promise<void> {
    const connection = this.requireConnection();
    connection.publish(toNatsSubject(topic), payload);
    if (qos > 0) {
      await connection.flush();
    }
  }

  async ping(): Promise<void> {
    await this.requireConnection().flush();
  }

  onMessage(callback: InboundCallback): void {
    this.messageCallbacks.push(callback);
  }

  onDisconnect(callback: DisconnectCallback): void {
    this.disconnectCallbacks.push(callback);
  }

  private requireConnection(): NatsConnection {
    if (!this.connection || this.connection.isClosed()) {
      throw new Error('Not connected to NATS');
    }
    return this.connection;
  }
}

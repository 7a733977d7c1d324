/**
 * In-process transport
 *
 * Behaves like a single-client broker: subscriptions live with the
 * connection, injected messages are delivered to matching subscriptions and
 * every publish is recorded. Failures, acknowledgments and dropped
 * connections are scriptable, which makes it the stand-in broker for tests
 * and offline runs.
 */

import { SubscriptionError, type QoS } from '@brokerline/types';
import { matchTopic, validatePattern, validateTopic } from './topics.js';
import type {
  DisconnectCallback,
  InboundCallback,
  TransportAdapter,
  TransportConnectOptions,
} from './types.js';

/**
 * A message handed to the memory broker
 */
export interface PublishedMessage {
  topic: string;
  payload: Uint8Array;
  qos: QoS;
}

export type PingBehavior = 'ok' | 'fail' | 'hang';

interface PendingAck {
  topic: string;
  resolve: () => void;
  reject: (error: Error) => void;
}

const encoder = new TextEncoder();

export class MemoryTransport implements TransportAdapter {
  readonly kind = 'memory';

  /** Every message accepted by publish(), in order */
  readonly published: PublishedMessage[] = [];
  /** Number of connect() calls, successful or not */
  connectAttempts = 0;
  lastConnectOptions: TransportConnectOptions | null = null;
  /** When false, QoS 1/2 publishes wait for ackNext()/ackAll() */
  autoAck = true;
  pingBehavior: PingBehavior = 'ok';

  private connected = false;
  private readonly connectFailures: Error[] = [];
  private readonly publishFailures: Error[] = [];
  private readonly refusedPatterns = new Set<string>();
  private readonly subscriptions = new Map<string, QoS>();
  private pendingAcks: PendingAck[] = [];
  private readonly messageCallbacks: InboundCallback[] = [];
  private readonly disconnectCallbacks: DisconnectCallback[] = [];

  async connect(options: TransportConnectOptions): Promise<void> {
    this.connectAttempts++;
    this.lastConnectOptions = options;

    if (this.connected) {
      this.reset(new Error('Connection replaced'));
    }

    const failure = this.connectFailures.shift();
    if (failure) {
      throw failure;
    }

    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    this.reset(new Error('Connection closed'));
  }

  isConnected(): boolean {
    return this.connected;
  }

  async subscribe(pattern: string, qos: QoS): Promise<void> {
    this.assertConnected();
    validatePattern(pattern);
    if (this.refusedPatterns.has(pattern)) {
      throw new SubscriptionError(`Broker refused subscription to ${pattern}`, {
        details: { pattern },
      });
    }
    this.subscriptions.set(pattern, qos);
  }

  async unsubscribe(pattern: string): Promise<void> {
    this.assertConnected();
    this.subscriptions.delete(pattern);
  }

  async publish(topic: string, payload: Uint8Array, qos: QoS): Promise<void> {
    this.assertConnected();
    validateTopic(topic);

    const failure = this.publishFailures.shift();
    if (failure) {
      throw failure;
    }

    this.published.push({ topic, payload, qos });

    if (qos === 0 || this.autoAck) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      this.pendingAcks.push({ topic, resolve, reject });
    });
  }

  async ping(): Promise<void> {
    this.assertConnected();
    switch (this.pingBehavior) {
      case 'ok':
        return;
      case 'fail':
        throw new Error('Ping failed');
      case 'hang':
        await new Promise<never>(() => undefined);
    }
  }

  onMessage(callback: InboundCallback): void {
    this.messageCallbacks.push(callback);
  }

  onDisconnect(callback: DisconnectCallback): void {
    this.disconnectCallbacks.push(callback);
  }

  // ==========================================================================
  // Scripting
  // ==========================================================================

  /** Make the next connect() reject */
  failNextConnect(error: Error = new Error('Connection refused')): void {
    this.connectFailures.push(error);
  }

  /** Make the next publish() reject */
  failNextPublish(error: Error = new Error('Publish failed')): void {
    this.publishFailures.push(error);
  }

  /** Make every subscribe() to this exact pattern fail */
  refuseSubscription(pattern: string): void {
    this.refusedPatterns.add(pattern);
  }

  /** Acknowledge the oldest outstanding publish */
  ackNext(): boolean {
    const ack = this.pendingAcks.shift();
    if (!ack) return false;
    ack.resolve();
    return true;
  }

  /** Acknowledge every outstanding publish */
  ackAll(): number {
    const acks = this.pendingAcks;
    this.pendingAcks = [];
    for (const ack of acks) {
      ack.resolve();
    }
    return acks.length;
  }

  get pendingAckCount(): number {
    return this.pendingAcks.length;
  }

  /** Patterns the current connection is subscribed to */
  get subscribedPatterns(): string[] {
    return [...this.subscriptions.keys()];
  }

  subscriptionQos(pattern: string): QoS | undefined {
    return this.subscriptions.get(pattern);
  }

  /**
   * Deliver a message as if the broker had routed it here.
   * Returns false when not connected or no subscription matches.
   */
  inject(topic: string, payload: Uint8Array | string): boolean {
    if (!this.connected) return false;

    const matched = [...this.subscriptions.keys()].some((pattern) => matchTopic(pattern, topic));
    if (!matched) return false;

    const bytes = typeof payload === 'string' ? encoder.encode(payload) : payload;
    for (const callback of this.messageCallbacks) {
      callback(topic, bytes);
    }
    return true;
  }

  /** Simulate an unsolicited connection loss */
  dropConnection(error: Error = new Error('Connection lost')): void {
    if (!this.connected) return;
    this.reset(error);
    for (const callback of this.disconnectCallbacks) {
      callback(error);
    }
  }

  private reset(error: Error): void {
    this.connected = false;
    this.subscriptions.clear();
    const acks = this.pendingAcks;
    this.pendingAcks = [];
    for (const ack of acks) {
      ack.reject(error);
    }
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new Error('Memory transport is not connected');
    }
  }
}

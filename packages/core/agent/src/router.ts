/**
 * Subscription Router
 *
 * Maps topic patterns to receivers and dispatches inbound messages. Each
 * (subscription, topic) pair has its own serial queue, so a receiver sees
 * messages on one topic in arrival order and never concurrently, while
 * different topics proceed independently.
 */

import {
  InvalidStateError,
  SubscriptionError,
  createMessage,
  isAgentError,
  toReceiver,
  wrapError,
  type AgentError,
  type Message,
  type MessageReceiver,
  type QoS,
  type Subscriber,
} from '@brokerline/types';
import { matchTopic, validatePattern, type TransportAdapter } from '@brokerline/transport';
import { silentLogger, type Logger } from '@brokerline/utils';
import type { Session } from './session.js';
import type { ErrorContext, ErrorSink } from './types.js';

/**
 * A registered (pattern, receiver, QoS) triple
 */
export interface Subscription {
  readonly id: number;
  readonly pattern: string;
  readonly qos: QoS;
  readonly receiver: MessageReceiver;
}

export interface RouterOptions {
  transport: TransportAdapter;
  session: Session;
  onError: ErrorSink;
  logger?: Logger;
}

interface DispatchQueue {
  subscription: Subscription;
  messages: Message[];
}

function toSubscriptionError(error: unknown, pattern: string): AgentError {
  if (isAgentError(error)) {
    return error;
  }
  return new SubscriptionError(
    `Failed to subscribe to ${pattern}: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error, details: { pattern } }
  );
}

export class SubscriptionRouter {
  private readonly transport: TransportAdapter;
  private readonly session: Session;
  private readonly onError: ErrorSink;
  private readonly logger: Logger;

  private readonly subscriptions = new Map<number, Subscription>();
  /** Patterns subscribed on the current connection, with the QoS requested */
  private readonly active = new Map<string, QoS>();
  private readonly queues = new Map<string, DispatchQueue>();
  private idleWaiters: Array<() => void> = [];
  private nextId = 1;

  constructor(options: RouterOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.onError = options.onError;
    this.logger = options.logger ?? silentLogger;

    this.transport.onMessage((topic, payload) => this.route(topic, payload));
    this.session.onStateChange(({ from }) => {
      if (from === 'connected') {
        this.active.clear();
      }
    });
  }

  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Distinct patterns currently registered
   */
  get patterns(): string[] {
    return [...new Set([...this.subscriptions.values()].map((s) => s.pattern))];
  }

  /**
   * Register a subscription. When connected the transport subscription is
   * issued now; otherwise it is issued on the next successful connect.
   */
  async subscribe(pattern: string, subscriber: Subscriber, qos: QoS = 0): Promise<Subscription> {
    if (this.session.isClosed()) {
      throw new InvalidStateError(`Cannot subscribe to ${pattern}: session is closed`, {
        component: 'router',
      });
    }
    validatePattern(pattern);

    const subscription: Subscription = {
      id: this.nextId++,
      pattern,
      qos,
      receiver: toReceiver(subscriber),
    };
    this.subscriptions.set(subscription.id, subscription);

    if (!this.session.isConnected()) {
      this.logger.debug(`Deferring subscription to ${pattern} until connected`);
      return subscription;
    }

    try {
      await this.ensureTransportSubscription(pattern);
    } catch (error) {
      // A connection that dropped meanwhile replays the registration later
      if (this.session.isConnected()) {
        this.subscriptions.delete(subscription.id);
        throw toSubscriptionError(error, pattern);
      }
    }

    return subscription;
  }

  /**
   * Remove a subscription. The transport subscription is dropped once no
   * other subscription uses the pattern.
   */
  async unsubscribe(subscription: Subscription | number): Promise<boolean> {
    const id = typeof subscription === 'number' ? subscription : subscription.id;
    const existing = this.subscriptions.get(id);
    if (!existing) {
      return false;
    }
    this.subscriptions.delete(id);

    const { pattern } = existing;
    const stillUsed = [...this.subscriptions.values()].some((s) => s.pattern === pattern);
    if (stillUsed || !this.active.has(pattern)) {
      return true;
    }

    this.active.delete(pattern);
    if (this.session.isConnected()) {
      try {
        await this.transport.unsubscribe(pattern);
      } catch (error) {
        this.report(wrapError(error, { component: 'router' }), { source: 'subscription', pattern });
      }
    }
    return true;
  }

  /**
   * Issue every registered pattern against a fresh connection
   */
  async resubscribeAll(): Promise<void> {
    this.active.clear();

    for (const pattern of this.patterns) {
      if (!this.session.isConnected()) {
        return;
      }
      try {
        await this.ensureTransportSubscription(pattern);
      } catch (error) {
        this.report(toSubscriptionError(error, pattern), { source: 'subscription', pattern });
      }
    }
  }

  /**
   * Drop every subscription (session teardown)
   */
  clear(): void {
    this.subscriptions.clear();
    this.active.clear();
  }

  /**
   * Resolves once every dispatch queue is empty
   */
  whenIdle(): Promise<void> {
    if (this.queues.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Inbound entry point: fan the message out to every matching subscription
   */
  route(topic: string, payload: Uint8Array): void {
    const receivedAt = Date.now();
    let matched = 0;

    for (const subscription of this.subscriptions.values()) {
      if (!matchTopic(subscription.pattern, topic)) {
        continue;
      }
      matched++;
      this.enqueue(
        subscription,
        createMessage({ topic, payload, qos: subscription.qos, receivedAt })
      );
    }

    if (matched === 0) {
      this.logger.debug(`No subscription matches ${topic}; message dropped`);
    }
  }

  private async ensureTransportSubscription(pattern: string): Promise<void> {
    let qos: QoS = 0;
    for (const subscription of this.subscriptions.values()) {
      if (subscription.pattern === pattern && subscription.qos > qos) {
        qos = subscription.qos;
      }
    }

    const current = this.active.get(pattern);
    if (current !== undefined && current >= qos) {
      return;
    }

    await this.transport.subscribe(pattern, qos);
    this.active.set(pattern, qos);
    this.logger.debug(`Subscribed to ${pattern} (QoS ${qos})`);
  }

  private enqueue(subscription: Subscription, message: Message): void {
    const key = `${subscription.id}\u0000${message.topic}`;
    const existing = this.queues.get(key);
    if (existing) {
      existing.messages.push(message);
      return;
    }

    const queue: DispatchQueue = { subscription, messages: [message] };
    this.queues.set(key, queue);
    this.drain(key, queue).catch((error: unknown) => {
      this.logger.error('Dispatch loop failed:', error);
    });
  }

  private async drain(key: string, queue: DispatchQueue): Promise<void> {
    const { subscription } = queue;
    try {
      let message = queue.messages.shift();
      while (message) {
        // Skip messages for a subscription removed while they waited
        if (this.subscriptions.has(subscription.id)) {
          await this.deliver(subscription, message);
        }
        message = queue.messages.shift();
      }
    } finally {
      this.queues.delete(key);
      if (this.queues.size === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
          resolve();
        }
      }
    }
  }

  private async deliver(subscription: Subscription, message: Message): Promise<void> {
    try {
      await subscription.receiver.accept(message);
    } catch (error) {
      this.report(wrapError(error, { component: 'router' }), {
        source: 'handler',
        topic: message.topic,
        pattern: subscription.pattern,
      });
    }
  }

  private report(error: AgentError, context: ErrorContext): void {
    try {
      this.onError(error, context);
    } catch (sinkError) {
      this.logger.error('Error sink failed:', sinkError);
    }
  }
}

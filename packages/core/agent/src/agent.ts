/**
 * Agent Facade
 *
 * The surface applications use: connect, subscribe, publish, call and
 * disconnect. It wires the session, connection manager, router, correlator
 * and publisher together; none of them is exposed.
 */

import {
  InvalidStateError,
  type AgentError,
  type ConnectionError,
  type DeliveryFailureError,
  type QoS,
  type SessionLostError,
  type Subscriber,
} from '@brokerline/types';
import { CONFIG_DEFAULTS } from '@brokerline/config';
import {
  createTransport,
  type TlsMaterial,
  type TransportAdapter,
} from '@brokerline/transport';
import {
  EventHub,
  childLogger,
  createLogger,
  decodeJson,
  toPayload,
  type Logger,
  type PayloadInput,
} from '@brokerline/utils';
import type { BackoffPolicy } from './backoff.js';
import { ConnectionManager } from './connection-manager.js';
import { CommandCorrelator, type CallOptions } from './correlator.js';
import { TelemetryPublisher, type PublishJob } from './publisher.js';
import { SubscriptionRouter, type Subscription } from './router.js';
import { Session, type SessionState, type StateChange } from './session.js';
import type { ErrorContext, ErrorSink } from './types.js';

export interface AgentOptions {
  /** Client id presented to the broker; also names the response topics */
  clientId: string;
  /** Broker URL; its scheme picks the transport unless one is given */
  endpoint: string;
  username?: string;
  password?: string;
  tls?: TlsMaterial;
  /** Transport to use instead of the one the endpoint implies */
  transport?: TransportAdapter;
  cleanSession?: boolean;
  connectTimeoutMs?: number;
  /**
   * Ping period; 0 disables pings. Also sets the MQTT protocol keepalive,
   * rounded up to whole seconds.
   */
  keepaliveIntervalMs?: number;
  /**
   * Deadline for a ping round trip. Over MQTT a ping only checks the client
   * is still connected: mqtt.js detects a dead link itself from the protocol
   * keepalive, so this value has no effect there.
   */
  keepaliveTimeoutMs?: number;
  backoff?: Partial<BackoffPolicy>;
  queueCapacity?: number;
  maxRetries?: number;
  ackTimeoutMs?: number;
  retryDelayMs?: number;
  /** How long disconnect() waits for queued telemetry */
  drainTimeoutMs?: number;
  defaultCallTimeoutMs?: number;
  responseRoot?: string;
  logger?: Logger;
  /** Receives handler, subscription and delivery errors */
  onError?: ErrorSink;
}

export interface PublishOptions {
  /** Delivery level (default 1) */
  qos?: QoS;
  /** Resolve only once the broker acknowledged the message */
  waitForDelivery?: boolean;
}

export interface SubscribeOptions {
  /** Delivery level requested from the broker (default 0) */
  qos?: QoS;
}

export interface SubscriptionHandle {
  readonly id: number;
  readonly pattern: string;
  readonly qos: QoS;
  unsubscribe(): Promise<boolean>;
}

export interface AgentEvents {
  state: StateChange;
  connected: { clientId: string; at: number };
  connection_failed: { error: ConnectionError; attempt: number; retryInMs: number };
  session_lost: { error: SessionLostError };
  closed: void;
  error: { error: AgentError; context: ErrorContext };
  delivery_failed: { error: DeliveryFailureError; job: PublishJob };
}

export interface AgentHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  clientId: string;
  /** Kind of the transport adapter in use */
  transport: string;
  state: SessionState;
  /** Seconds since the last successful connect, 0 when not connected */
  uptime: number;
  pendingCalls: number;
  queuedJobs: number;
  subscriptions: number;
  checks: {
    connection: 'ok' | 'error';
  };
}

export class Agent {
  readonly clientId: string;

  private readonly logger: Logger;
  private readonly events: EventHub<AgentEvents>;
  private readonly session: Session;
  private readonly transport: TransportAdapter;
  private readonly manager: ConnectionManager;
  private readonly router: SubscriptionRouter;
  private readonly correlator: CommandCorrelator;
  private readonly publisher: TelemetryPublisher;
  private readonly errorSink: ErrorSink;
  private readonly drainTimeoutMs: number;

  constructor(options: AgentOptions) {
    if (!options.clientId) {
      throw new InvalidStateError('Agent requires a clientId');
    }

    const { session: sessionDefaults, publisher: publisherDefaults, calls, broker } =
      CONFIG_DEFAULTS;

    this.clientId = options.clientId;
    this.logger = options.logger ?? createLogger('agent');
    this.events = new EventHub<AgentEvents>(this.logger);
    this.errorSink = options.onError ?? ((error, context) => this.logUnhandled(error, context));
    this.drainTimeoutMs = options.drainTimeoutMs ?? publisherDefaults.drain_timeout_ms;

    this.session = new Session(options.clientId);
    this.transport =
      options.transport ??
      createTransport(options.endpoint, { logger: childLogger(this.logger, 'transport') });

    const keepaliveIntervalMs =
      options.keepaliveIntervalMs ?? sessionDefaults.keepalive_interval_ms;

    this.manager = new ConnectionManager({
      transport: this.transport,
      session: this.session,
      connectOptions: {
        endpoint: options.endpoint,
        clientId: options.clientId,
        username: options.username,
        password: options.password,
        tls: options.tls,
        cleanSession: options.cleanSession ?? broker.clean_session,
        connectTimeoutMs: options.connectTimeoutMs ?? broker.connect_timeout_ms,
        keepaliveSeconds:
          keepaliveIntervalMs > 0 ? Math.ceil(keepaliveIntervalMs / 1000) : undefined,
      },
      backoff: {
        baseMs: options.backoff?.baseMs ?? sessionDefaults.backoff_base_ms,
        maxMs: options.backoff?.maxMs ?? sessionDefaults.backoff_max_ms,
        jitter: options.backoff?.jitter ?? sessionDefaults.backoff_jitter,
      },
      keepaliveIntervalMs,
      keepaliveTimeoutMs: options.keepaliveTimeoutMs ?? sessionDefaults.keepalive_timeout_ms,
      connectTimeoutMs: options.connectTimeoutMs ?? broker.connect_timeout_ms,
      logger: childLogger(this.logger, 'connection'),
    });

    this.router = new SubscriptionRouter({
      transport: this.transport,
      session: this.session,
      onError: (error, context) => this.reportError(error, context),
      logger: childLogger(this.logger, 'router'),
    });

    this.correlator = new CommandCorrelator({
      transport: this.transport,
      session: this.session,
      router: this.router,
      responseRoot: options.responseRoot ?? calls.response_root,
      defaultTimeoutMs: options.defaultCallTimeoutMs ?? calls.default_timeout_ms,
      logger: childLogger(this.logger, 'correlator'),
    });

    this.publisher = new TelemetryPublisher({
      transport: this.transport,
      session: this.session,
      capacity: options.queueCapacity ?? publisherDefaults.queue_capacity,
      maxRetries: options.maxRetries ?? publisherDefaults.max_retries,
      ackTimeoutMs: options.ackTimeoutMs ?? publisherDefaults.ack_timeout_ms,
      retryDelayMs: options.retryDelayMs ?? publisherDefaults.retry_delay_ms,
      onDeliveryFailure: (error, job) => {
        this.events.emit('delivery_failed', { error, job });
        this.reportError(error, { source: 'publisher', topic: job.topic });
      },
      logger: childLogger(this.logger, 'publisher'),
    });

    // Subscriptions first, so replayed telemetry can be answered
    this.manager.onConnected(() => this.router.resubscribeAll());
    this.manager.onConnected(() => this.publisher.resume());

    this.manager.events.on('state', (change) => this.events.emit('state', change));
    this.manager.events.on('connected', (event) => this.events.emit('connected', event));
    this.manager.events.on('connection_failed', (event) =>
      this.events.emit('connection_failed', event)
    );
    this.manager.events.on('session_lost', ({ error }) => {
      this.correlator.failAll(error.message, error);
      this.publisher.suspend();
      this.events.emit('session_lost', { error });
    });
    this.manager.events.on('closed', () => this.events.emit('closed', undefined));
  }

  get state(): SessionState {
    return this.session.state;
  }

  isConnected(): boolean {
    return this.session.isConnected();
  }

  /**
   * Connect to the broker. Resolves once connected with every subscription
   * re-established; if this first handshake fails the promise rejects with
   * ConnectionError and the agent keeps retrying in the background.
   */
  async connect(): Promise<void> {
    if (this.session.isClosed()) {
      throw new InvalidStateError('Agent is closed; create a new Agent to reconnect');
    }
    await this.correlator.attach();
    await this.manager.start();
  }

  /**
   * Close the agent for good: flush telemetry for up to the drain timeout,
   * fail pending calls, close the transport and fail undelivered jobs.
   */
  async disconnect(): Promise<void> {
    if (this.session.isClosed()) {
      return;
    }

    if (this.session.isConnected() && this.publisher.queuedCount > 0) {
      const drained = await this.publisher.flush(this.drainTimeoutMs);
      if (!drained) {
        this.logger.warn(
          `Disconnecting with ${this.publisher.queuedCount} publish jobs undelivered`
        );
      }
    }

    this.correlator.failAll('Agent disconnected');
    await this.manager.shutdown();
    this.publisher.abandon('agent disconnected');
    this.router.clear();
  }

  /**
   * Register a handler for a topic pattern (`+` and `#` wildcards)
   */
  async subscribe(
    pattern: string,
    subscriber: Subscriber,
    options: SubscribeOptions = {}
  ): Promise<SubscriptionHandle> {
    const subscription = await this.router.subscribe(pattern, subscriber, options.qos ?? 0);
    return {
      id: subscription.id,
      pattern: subscription.pattern,
      qos: subscription.qos,
      unsubscribe: () => this.router.unsubscribe(subscription),
    };
  }

  async unsubscribe(subscription: SubscriptionHandle | Subscription | number): Promise<boolean> {
    return this.router.unsubscribe(typeof subscription === 'number' ? subscription : subscription.id);
  }

  /**
   * Queue telemetry. Bytes are sent unchanged, strings as UTF-8 and any
   * other value as JSON.
   *
   * @throws BackpressureError when the outbound queue is full
   */
  async publish(topic: string, payload: PayloadInput, options: PublishOptions = {}): Promise<void> {
    const qos = options.qos ?? 1;
    const bytes = toPayload(payload);

    if (options.waitForDelivery) {
      await this.publisher.enqueueAndWait(topic, bytes, qos);
      return;
    }
    this.publisher.enqueue(topic, bytes, qos);
  }

  /**
   * Send a request and resolve with the correlated response payload
   */
  call(topic: string, payload: unknown, options: CallOptions = {}): Promise<Uint8Array> {
    return this.correlator.call(topic, payload, options);
  }

  /**
   * Like call(), with the response decoded as JSON
   */
  async callJson(topic: string, payload: unknown, options: CallOptions = {}): Promise<unknown> {
    return decodeJson(await this.call(topic, payload, options));
  }

  /**
   * Cancel a pending call by correlation id
   */
  cancelCall(correlationId: string): boolean {
    return this.correlator.cancel(correlationId);
  }

  on<E extends keyof AgentEvents>(
    event: E,
    handler: (data: AgentEvents[E]) => void
  ): () => void {
    return this.events.on(event, handler);
  }

  /**
   * Resolves once every inbound message received so far has been handled
   */
  whenIdle(): Promise<void> {
    return this.router.whenIdle();
  }

  getHealth(): AgentHealth {
    const state = this.session.state;
    const connected = state === 'connected';
    const lastConnectAt = this.session.lastConnectAt;

    let status: AgentHealth['status'] = 'unhealthy';
    if (connected) {
      status = 'healthy';
    } else if (state === 'connecting' || state === 'reconnecting') {
      status = 'degraded';
    }

    return {
      status,
      clientId: this.clientId,
      transport: this.transport.kind,
      state,
      uptime:
        connected && lastConnectAt !== null ? Math.floor((Date.now() - lastConnectAt) / 1000) : 0,
      pendingCalls: this.correlator.pendingCount,
      queuedJobs: this.publisher.queuedCount,
      subscriptions: this.router.subscriptionCount,
      checks: {
        connection: connected ? 'ok' : 'error',
      },
    };
  }

  private reportError(error: AgentError, context: ErrorContext): void {
    this.events.emit('error', { error, context });
    try {
      this.errorSink(error, context);
    } catch (sinkError) {
      this.logger.error('Error sink failed:', sinkError);
    }
  }

  private logUnhandled(error: AgentError, context: ErrorContext): void {
    const where = context.topic ?? context.pattern;
    this.logger.error(
      `Unhandled ${context.source} error${where ? ` on ${where}` : ''}: ${error.toString()}`
    );
  }
}

/**
 * Factory function to create a new agent
 */
export function createAgent(options: AgentOptions): Agent {
  return new Agent(options);
}

/**
 * Connection Manager
 *
 * Owns the session state machine, the reconnect loop and keepalive. It is
 * the only component that opens or closes the transport, and it translates
 * transport failures into ConnectionError and SessionLostError.
 */

import {
  ConnectionError,
  InvalidStateError,
  SessionLostError,
  TimeoutError,
} from '@brokerline/types';
import type { TransportAdapter, TransportConnectOptions } from '@brokerline/transport';
import { EventHub, silentLogger, withTimeout, type Logger } from '@brokerline/utils';
import { computeBackoffDelay, type BackoffPolicy } from './backoff.js';
import type { Session, StateChange } from './session.js';

export interface ConnectionEvents {
  state: StateChange;
  connected: { clientId: string; at: number };
  connection_failed: { error: ConnectionError; attempt: number; retryInMs: number };
  session_lost: { error: SessionLostError };
  closed: void;
}

/**
 * Runs after every successful handshake, before `connected` is emitted
 */
export type ConnectedHook = () => void | Promise<void>;

export interface ConnectionManagerOptions {
  transport: TransportAdapter;
  session: Session;
  connectOptions: TransportConnectOptions;
  backoff: BackoffPolicy;
  /** 0 disables keepalive pings */
  keepaliveIntervalMs: number;
  keepaliveTimeoutMs: number;
  connectTimeoutMs: number;
  logger?: Logger;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConnectionManager {
  readonly events: EventHub<ConnectionEvents>;

  private readonly transport: TransportAdapter;
  private readonly session: Session;
  private readonly connectOptions: TransportConnectOptions;
  private readonly backoff: BackoffPolicy;
  private readonly keepaliveIntervalMs: number;
  private readonly keepaliveTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;
  private readonly hooks: ConnectedHook[] = [];

  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private keepaliveTimer: ReturnType<typeof setTimeout> | null = null;
  /** Bumped whenever a connection ends; stale pings and attempts compare against it */
  private generation = 0;
  private inFlight: Promise<ConnectionError | null> | null = null;

  constructor(options: ConnectionManagerOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.connectOptions = options.connectOptions;
    this.backoff = options.backoff;
    this.keepaliveIntervalMs = options.keepaliveIntervalMs;
    this.keepaliveTimeoutMs = options.keepaliveTimeoutMs;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.events = new EventHub<ConnectionEvents>(this.logger);

    this.session.onStateChange((change) => {
      this.logger.info(`Session ${change.from} → ${change.to}`);
      this.events.emit('state', change);
    });
    this.transport.onDisconnect((error) => this.handleConnectionLoss(error));
  }

  get state(): Session['state'] {
    return this.session.state;
  }

  /**
   * Register work to run after each successful handshake (in order)
   */
  onConnected(hook: ConnectedHook): void {
    this.hooks.push(hook);
  }

  /**
   * Connect now. Resolves once connected hooks have run; rejects with
   * ConnectionError if this handshake fails, in which case retries continue
   * in the background.
   */
  async start(): Promise<void> {
    if (this.session.isClosed()) {
      throw new InvalidStateError('Cannot connect: session is closed', { component: 'connection' });
    }
    if (this.session.isConnected()) {
      return;
    }

    const error = await (this.inFlight ?? this.connectNow());
    if (error) {
      throw error;
    }
  }

  /**
   * Close the session for good. Timers stop, an attempt in progress is
   * awaited and the transport is closed.
   */
  async shutdown(): Promise<void> {
    if (this.session.isClosed()) {
      return;
    }

    this.clearReconnectTimer();
    this.stopKeepalive();
    this.generation++;
    this.session.transition('closed');
    this.events.emit('closed', undefined);

    if (this.inFlight) {
      await this.inFlight;
    }
    await this.safeDisconnect();
  }

  private connectNow(): Promise<ConnectionError | null> {
    this.clearReconnectTimer();
    const attempt = this.runAttempt().finally(() => {
      if (this.inFlight === attempt) {
        this.inFlight = null;
      }
    });
    this.inFlight = attempt;
    return attempt;
  }

  /**
   * One handshake. Never rejects: the failure is returned.
   */
  private async runAttempt(): Promise<ConnectionError | null> {
    const { session } = this;
    const endpoint = this.connectOptions.endpoint;

    session.transition('connecting');
    const generation = ++this.generation;

    try {
      await withTimeout(
        this.transport.connect(this.connectOptions),
        this.connectTimeoutMs,
        () => new TimeoutError(`Handshake timed out after ${this.connectTimeoutMs}ms`)
      );
    } catch (error) {
      await this.safeDisconnect();
      const connectionError = new ConnectionError(
        `Failed to connect to ${endpoint}: ${describeError(error)}`,
        { cause: error, details: { endpoint } }
      );
      if (session.isClosed()) {
        return connectionError;
      }

      const attempt = session.backoffAttempt + 1;
      const retryInMs = this.scheduleReconnect();
      this.logger.warn(`${connectionError.message}; retrying in ${retryInMs}ms`);
      this.events.emit('connection_failed', { error: connectionError, attempt, retryInMs });
      return connectionError;
    }

    if (session.isClosed()) {
      await this.safeDisconnect();
      return new ConnectionError(`Session closed while connecting to ${endpoint}`);
    }

    session.transition('connected');

    for (const hook of this.hooks) {
      try {
        await hook();
      } catch (error) {
        this.logger.error('Connected hook failed:', error);
      }
    }

    // The connection may have dropped while hooks ran
    if (generation === this.generation && session.isConnected()) {
      this.events.emit('connected', { clientId: session.clientId, at: Date.now() });
      this.scheduleKeepalive(generation);
    }
    return null;
  }

  /**
   * Enter reconnecting and arm the backoff timer. Returns the delay.
   */
  private scheduleReconnect(): number {
    this.session.transition('reconnecting');
    this.session.backoffAttempt++;
    const delayMs = computeBackoffDelay(this.session.backoffAttempt, this.backoff);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connectNow().catch((error: unknown) => {
        this.logger.error('Reconnect attempt failed unexpectedly:', error);
      });
    }, delayMs);

    return delayMs;
  }

  /**
   * Unsolicited loss while connected: fail fast and start reconnecting
   */
  private handleConnectionLoss(cause?: Error): void {
    if (!this.session.isConnected()) {
      return;
    }

    this.stopKeepalive();
    this.generation++;

    const error = new SessionLostError(
      `Session lost: ${cause?.message ?? 'connection closed by broker'}`,
      { cause }
    );
    const retryInMs = this.scheduleReconnect();
    this.logger.warn(`${error.message}; reconnecting in ${retryInMs}ms`);
    this.events.emit('session_lost', { error });
  }

  private scheduleKeepalive(generation: number): void {
    if (this.keepaliveIntervalMs <= 0) {
      return;
    }

    this.keepaliveTimer = setTimeout(() => {
      this.keepaliveTimer = null;
      this.runKeepalive(generation).catch((error: unknown) => {
        this.logger.error('Keepalive loop failed:', error);
      });
    }, this.keepaliveIntervalMs);
  }

  private async runKeepalive(generation: number): Promise<void> {
    try {
      await withTimeout(
        this.transport.ping(),
        this.keepaliveTimeoutMs,
        () => new TimeoutError(`Keepalive not acknowledged within ${this.keepaliveTimeoutMs}ms`)
      );
    } catch (error) {
      if (generation !== this.generation || !this.session.isConnected()) {
        return;
      }
      this.logger.warn(`Keepalive failed: ${describeError(error)}`);
      await this.safeDisconnect();
      this.handleConnectionLoss(error instanceof Error ? error : new Error(String(error)));
      return;
    }

    if (generation === this.generation && this.session.isConnected()) {
      this.scheduleKeepalive(generation);
    }
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearTimeout(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private async safeDisconnect(): Promise<void> {
    try {
      await this.transport.disconnect();
    } catch (error) {
      this.logger.warn(`Error while closing ${this.transport.kind} transport:`, error);
    }
  }
}

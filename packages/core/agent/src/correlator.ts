/**
 * Command Correlator
 *
 * Issues request messages tagged with a fresh correlation id and matches
 * responses arriving on `<responseRoot>/<clientId>/<correlationId>` back to
 * the waiting caller.
 */

import { v4 as uuid } from 'uuid';
import {
  CancellationError,
  InvalidMessageError,
  InvalidStateError,
  SessionLostError,
  TimeoutError,
  type AgentError,
  type Message,
  type QoS,
  type RequestEnvelope,
} from '@brokerline/types';
import { validateTopic, type TransportAdapter } from '@brokerline/transport';
import {
  MAX_TIMER_DELAY_MS,
  encodeBase64,
  encodeJson,
  isTimerDelay,
  silentLogger,
  type Logger,
} from '@brokerline/utils';
import type { Session } from './session.js';
import type { Subscription, SubscriptionRouter } from './router.js';

export interface CallOptions {
  /** Deadline in milliseconds (1 to 2^31-1); defaults to the correlator's default */
  timeoutMs?: number;
  /** Aborting the signal cancels the call */
  signal?: AbortSignal;
  /** QoS of the request publish (default 1) */
  qos?: QoS;
}

export interface CorrelatorOptions {
  transport: TransportAdapter;
  session: Session;
  router: SubscriptionRouter;
  /** Topic prefix responses are published under */
  responseRoot: string;
  defaultTimeoutMs: number;
  logger?: Logger;
  /** Correlation id source; uuid v4 unless overridden */
  generateId?: () => string;
}

interface PendingCall {
  readonly id: string;
  readonly topic: string;
  readonly deadline: number;
  resolve(payload: Uint8Array): void;
  reject(error: AgentError): void;
  cleanup(): void;
}

export class CommandCorrelator {
  readonly responsePattern: string;

  private readonly transport: TransportAdapter;
  private readonly session: Session;
  private readonly router: SubscriptionRouter;
  private readonly responsePrefix: string;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly pending = new Map<string, PendingCall>();
  private attaching: Promise<Subscription> | null = null;

  constructor(options: CorrelatorOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.router = options.router;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.generateId = options.generateId ?? (() => uuid());

    const root = options.responseRoot.replace(/\/+$/, '');
    this.responsePrefix = `${root}/${this.session.clientId}/`;
    this.responsePattern = `${this.responsePrefix}+`;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Register the internal response subscription (idempotent)
   */
  async attach(): Promise<void> {
    this.attaching ??= this.router
      .subscribe(this.responsePattern, { accept: (message) => this.handleResponse(message) }, 1)
      .catch((error: unknown) => {
        this.attaching = null;
        throw error;
      });
    await this.attaching;
  }

  responseTopic(correlationId: string): string {
    return `${this.responsePrefix}${correlationId}`;
  }

  /**
   * Publish a request and wait for the correlated response payload.
   * Byte payloads travel base64-encoded, flagged by `payloadEncoding`.
   */
  call(topic: string, payload: unknown, options: CallOptions = {}): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      validateTopic(topic);

      const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
      if (!isTimerDelay(timeoutMs)) {
        reject(
          new InvalidStateError(
            `Call timeout must be an integer between 1 and ${MAX_TIMER_DELAY_MS}ms, got ${timeoutMs}`,
            { component: 'correlator', details: { topic, timeoutMs } }
          )
        );
        return;
      }

      if (!this.session.isConnected()) {
        reject(
          new SessionLostError(`Cannot call ${topic}: session is ${this.session.state}`, {
            details: { topic },
          })
        );
        return;
      }

      if (options.signal?.aborted) {
        reject(new CancellationError(`Call to ${topic} was cancelled before it was sent`));
        return;
      }

      const id = this.nextCorrelationId();
      const signal = options.signal;

      const onAbort = (): void => {
        this.settleWithError(
          id,
          new CancellationError(`Call to ${topic} was cancelled`, { correlationId: id })
        );
      };

      const timer = setTimeout(() => {
        this.settleWithError(
          id,
          new TimeoutError(`Call to ${topic} timed out after ${timeoutMs}ms`, {
            correlationId: id,
            details: { topic, timeoutMs },
          })
        );
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        id,
        topic,
        deadline: Date.now() + timeoutMs,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      });

      const envelope: RequestEnvelope = {
        id: uuid(),
        timestamp: new Date().toISOString(),
        source: this.session.clientId,
        type: 'request',
        correlationId: id,
        replyTo: this.responseTopic(id),
        payload,
      };
      if (payload instanceof Uint8Array) {
        envelope.payload = encodeBase64(payload);
        envelope.payloadEncoding = 'base64';
      }

      let body: Uint8Array;
      try {
        body = encodeJson(envelope);
      } catch (error) {
        this.settleWithError(
          id,
          new InvalidMessageError(`Request payload for ${topic} is not JSON-serializable`, {
            cause: error,
            correlationId: id,
          })
        );
        return;
      }

      this.transport.publish(topic, body, options.qos ?? 1).catch((error: unknown) => {
        this.settleWithError(
          id,
          new SessionLostError(`Failed to send request to ${topic}`, {
            cause: error,
            correlationId: id,
          })
        );
      });
    });
  }

  /**
   * Cancel one pending call
   */
  cancel(correlationId: string, reason = 'cancelled by caller'): boolean {
    const call = this.pending.get(correlationId);
    if (!call) {
      return false;
    }
    return this.settleWithError(
      correlationId,
      new CancellationError(`Call to ${call.topic} ${reason}`, { correlationId })
    );
  }

  /**
   * Fail every pending call with SessionLostError
   */
  failAll(reason: string, cause?: unknown): number {
    const ids = [...this.pending.keys()];
    for (const id of ids) {
      const call = this.pending.get(id);
      if (!call) continue;
      this.settleWithError(
        id,
        new SessionLostError(`${reason} (call to ${call.topic})`, { cause, correlationId: id })
      );
    }
    return ids.length;
  }

  /**
   * Calls still awaiting a response
   */
  pendingCalls(): Array<{ correlationId: string; topic: string; deadline: number }> {
    return [...this.pending.values()].map((call) => ({
      correlationId: call.id,
      topic: call.topic,
      deadline: call.deadline,
    }));
  }

  private handleResponse(message: Message): void {
    const id = message.topic.slice(this.responsePrefix.length);
    const call = this.take(id);
    if (!call) {
      this.logger.debug(`Discarding response for unknown correlation id ${id}`);
      return;
    }
    call.resolve(message.payload);
  }

  private settleWithError(id: string, error: AgentError): boolean {
    const call = this.take(id);
    if (!call) {
      return false;
    }
    this.logger.debug(`Call ${id} failed: ${error.message}`);
    call.reject(error);
    return true;
  }

  private take(id: string): PendingCall | undefined {
    const call = this.pending.get(id);
    if (!call) {
      return undefined;
    }
    this.pending.delete(id);
    call.cleanup();
    return call;
  }

  private nextCorrelationId(): string {
    let id = this.generateId();
    while (this.pending.has(id)) {
      id = this.generateId();
    }
    return id;
  }
}

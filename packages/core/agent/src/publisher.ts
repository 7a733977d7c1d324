/**
 * Telemetry Publisher
 *
 * Bounded outbound queue with one FIFO lane per topic. Each lane has at
 * most one job in flight; a job stays in its lane until the transport
 * acknowledges it or its retries run out. While the session is not
 * connected jobs only accumulate.
 */

import {
  BackpressureError,
  DeliveryFailureError,
  InvalidStateError,
  TimeoutError,
  type QoS,
} from '@brokerline/types';
import { validateTopic, type TransportAdapter } from '@brokerline/transport';
import { silentLogger, withTimeout, type Logger } from '@brokerline/utils';
import type { Session } from './session.js';

/**
 * An outbound telemetry item
 */
export interface PublishJob {
  readonly id: number;
  readonly topic: string;
  readonly payload: Uint8Array;
  readonly qos: QoS;
  /** Failed delivery attempts so far */
  readonly retries: number;
  /** Epoch milliseconds */
  readonly enqueuedAt: number;
}

export type DeliveryFailureHandler = (error: DeliveryFailureError, job: PublishJob) => void;

export interface PublisherOptions {
  transport: TransportAdapter;
  session: Session;
  /** Maximum queued plus in-flight jobs */
  capacity: number;
  /** Retries after the first attempt before a job is dropped */
  maxRetries: number;
  ackTimeoutMs: number;
  retryDelayMs: number;
  onDeliveryFailure: DeliveryFailureHandler;
  logger?: Logger;
}

interface Waiter {
  resolve: () => void;
  reject: (error: DeliveryFailureError) => void;
}

class QueuedJob implements PublishJob {
  retries = 0;
  private waiters: Waiter[] = [];

  constructor(
    readonly id: number,
    readonly topic: string,
    readonly payload: Uint8Array,
    readonly qos: QoS,
    readonly enqueuedAt: number
  ) {}

  wait(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  succeed(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  fail(error: DeliveryFailureError): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }
}

interface Lane {
  jobs: QueuedJob[];
  inFlight: QueuedJob | null;
  retryTimer: ReturnType<typeof setTimeout> | null;
}

export class TelemetryPublisher {
  private readonly transport: TransportAdapter;
  private readonly session: Session;
  private readonly capacity: number;
  private readonly maxRetries: number;
  private readonly ackTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly onDeliveryFailure: DeliveryFailureHandler;
  private readonly logger: Logger;

  private readonly lanes = new Map<string, Lane>();
  private size = 0;
  private nextId = 1;
  /** Bumped on suspend/abandon so late acknowledgments are ignored */
  private generation = 0;
  private closed = false;
  private flushWaiters = new Set<(drained: boolean) => void>();

  constructor(options: PublisherOptions) {
    this.transport = options.transport;
    this.session = options.session;
    this.capacity = options.capacity;
    this.maxRetries = options.maxRetries;
    this.ackTimeoutMs = options.ackTimeoutMs;
    this.retryDelayMs = options.retryDelayMs;
    this.onDeliveryFailure = options.onDeliveryFailure;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Jobs queued or in flight
   */
  get queuedCount(): number {
    return this.size;
  }

  /**
   * Add a job to its topic lane
   *
   * @throws BackpressureError when the queue is at capacity
   */
  enqueue(topic: string, payload: Uint8Array, qos: QoS): PublishJob {
    return this.add(topic, payload, qos);
  }

  /**
   * Enqueue and wait until the transport confirms delivery
   */
  enqueueAndWait(topic: string, payload: Uint8Array, qos: QoS): Promise<void> {
    let job: QueuedJob;
    try {
      job = this.add(topic, payload, qos);
    } catch (error) {
      return Promise.reject(error);
    }
    return job.wait();
  }

  /**
   * Session lost: in-flight jobs go back to the head of their lane without
   * counting as a retry, and nothing is sent until resume()
   */
  suspend(): void {
    this.generation++;
    for (const lane of this.lanes.values()) {
      if (lane.retryTimer) {
        clearTimeout(lane.retryTimer);
        lane.retryTimer = null;
      }
      if (lane.inFlight) {
        lane.jobs.unshift(lane.inFlight);
        lane.inFlight = null;
      }
    }
  }

  /**
   * Start draining every lane (called once connected)
   */
  resume(): void {
    for (const topic of [...this.lanes.keys()]) {
      this.pump(topic);
    }
  }

  /**
   * Wait until the queue is empty. Resolves false on timeout.
   */
  flush(timeoutMs: number): Promise<boolean> {
    if (this.size === 0) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const waiter = (drained: boolean): void => {
        clearTimeout(timer);
        this.flushWaiters.delete(waiter);
        resolve(drained);
      };
      const timer = setTimeout(() => waiter(false), timeoutMs);
      this.flushWaiters.add(waiter);
    });
  }

  /**
   * Shutdown: every remaining job fails with DeliveryFailureError
   */
  abandon(reason: string): number {
    this.closed = true;
    this.generation++;

    const abandoned: QueuedJob[] = [];
    for (const lane of this.lanes.values()) {
      if (lane.retryTimer) {
        clearTimeout(lane.retryTimer);
      }
      if (lane.inFlight) {
        abandoned.push(lane.inFlight);
      }
      abandoned.push(...lane.jobs);
    }
    this.lanes.clear();
    this.size = 0;

    for (const job of abandoned) {
      this.fail(
        job,
        new DeliveryFailureError(`Publish to ${job.topic} abandoned: ${reason}`, {
          details: { topic: job.topic, jobId: job.id, retries: job.retries },
        })
      );
    }
    this.notifyFlushWaiters(abandoned.length === 0);
    return abandoned.length;
  }

  private add(topic: string, payload: Uint8Array, qos: QoS): QueuedJob {
    if (this.closed) {
      throw new InvalidStateError(`Cannot publish to ${topic}: publisher is closed`, {
        component: 'publisher',
      });
    }
    validateTopic(topic);

    if (this.size >= this.capacity) {
      throw new BackpressureError(`Publish queue is full (${this.capacity} jobs)`, {
        details: { topic, capacity: this.capacity },
      });
    }

    const job = new QueuedJob(this.nextId++, topic, payload, qos, Date.now());
    let lane = this.lanes.get(topic);
    if (!lane) {
      lane = { jobs: [], inFlight: null, retryTimer: null };
      this.lanes.set(topic, lane);
    }
    lane.jobs.push(job);
    this.size++;

    this.pump(topic);
    return job;
  }

  private pump(topic: string): void {
    if (this.closed || !this.session.isConnected()) {
      return;
    }

    const lane = this.lanes.get(topic);
    if (!lane || lane.inFlight || lane.retryTimer) {
      return;
    }

    const job = lane.jobs.shift();
    if (!job) {
      this.lanes.delete(topic);
      return;
    }

    lane.inFlight = job;
    this.send(lane, job, this.generation).catch((error: unknown) => {
      this.logger.error(`Publisher lane for ${topic} failed:`, error);
    });
  }

  private async send(lane: Lane, job: QueuedJob, generation: number): Promise<void> {
    let failure: unknown;
    let delivered = false;
    try {
      await withTimeout(
        this.transport.publish(job.topic, job.payload, job.qos),
        this.ackTimeoutMs,
        () => new TimeoutError(`No acknowledgment for ${job.topic} within ${this.ackTimeoutMs}ms`)
      );
      delivered = true;
    } catch (error) {
      failure = error;
    }

    // Suspended or abandoned while waiting; the job was already requeued or failed
    if (generation !== this.generation || lane.inFlight !== job) {
      return;
    }
    lane.inFlight = null;

    if (delivered) {
      this.size--;
      job.succeed();
      this.afterSettled();
      this.pump(job.topic);
      return;
    }

    job.retries++;
    if (job.retries > this.maxRetries) {
      this.size--;
      const error = new DeliveryFailureError(
        `Dropped publish to ${job.topic} after ${job.retries} failed attempts`,
        { cause: failure, details: { topic: job.topic, jobId: job.id, retries: job.retries } }
      );
      this.logger.error(error.message);
      this.fail(job, error);
      this.afterSettled();
      this.pump(job.topic);
      return;
    }

    this.logger.warn(
      `Publish to ${job.topic} failed (attempt ${job.retries}); retrying in ${this.retryDelayMs}ms`
    );
    lane.jobs.unshift(job);
    lane.retryTimer = setTimeout(() => {
      lane.retryTimer = null;
      this.pump(job.topic);
    }, this.retryDelayMs);
  }

  private fail(job: QueuedJob, error: DeliveryFailureError): void {
    job.fail(error);
    try {
      this.onDeliveryFailure(error, job);
    } catch (sinkError) {
      this.logger.error('Delivery failure handler threw:', sinkError);
    }
  }

  private afterSettled(): void {
    if (this.size === 0) {
      this.notifyFlushWaiters(true);
    }
  }

  private notifyFlushWaiters(drained: boolean): void {
    for (const waiter of [...this.flushWaiters]) {
      waiter(drained);
    }
  }
}

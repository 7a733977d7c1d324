/**
 * Message model shared by the transport, the agent runtime and the platform layer
 */

/**
 * Delivery level negotiated with the transport
 * 0 = fire-and-forget, 1 = acknowledged, 2 = exactly-once (transport-defined)
 */
export type QoS = 0 | 1 | 2;

/**
 * Immutable message value.
 * Payload bytes are passed through exactly as received or supplied.
 */
export interface Message {
  readonly topic: string;
  readonly payload: Uint8Array;
  readonly qos: QoS;
  /** Epoch milliseconds at which the router accepted the message */
  readonly receivedAt: number;
}

/**
 * Plain handler callable
 */
export type MessageHandler = (message: Message) => void | Promise<void>;

/**
 * Anything that accepts messages can be registered as a subscriber
 */
export interface MessageReceiver {
  accept(message: Message): void | Promise<void>;
}

export type Subscriber = MessageHandler | MessageReceiver;

/**
 * Check if a value is a valid QoS level
 */
export function isQoS(value: unknown): value is QoS {
  return value === 0 || value === 1 || value === 2;
}

/**
 * Normalize a subscriber into the receiver contract
 */
export function toReceiver(subscriber: Subscriber): MessageReceiver {
  if (typeof subscriber === 'function') {
    return { accept: subscriber };
  }
  return subscriber;
}

/**
 * Create a frozen message value
 */
export function createMessage(fields: {
  topic: string;
  payload: Uint8Array;
  qos: QoS;
  receivedAt?: number;
}): Message {
  return Object.freeze({
    topic: fields.topic,
    payload: fields.payload,
    qos: fields.qos,
    receivedAt: fields.receivedAt ?? Date.now(),
  });
}

/**
 * Envelope wrapped around call requests
 */
export interface RequestEnvelope<T = unknown> {
  /** Unique message identifier (UUID) */
  id: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Client id of the requesting agent */
  source: string;
  /** Message type identifier */
  type: 'request';
  /** Correlation ID echoed back in the response topic */
  correlationId: string;
  /** Topic the response must be published to */
  replyTo: string;
  /** Request payload; a base64 string when `payloadEncoding` is set */
  payload: T;
  /** Present when the caller passed raw bytes */
  payloadEncoding?: 'base64';
}

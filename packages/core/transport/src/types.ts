/**
 * Type definitions for the transport layer
 */

import type { QoS } from '@brokerline/types';

/**
 * PEM-encoded TLS material
 */
export interface TlsMaterial {
  ca?: string;
  cert?: string;
  key?: string;
}

/**
 * Options for opening a broker connection
 */
export interface TransportConnectOptions {
  /** Broker URL, e.g. mqtts://broker.example.com:8883 */
  endpoint: string;
  /** Client id presented to the broker */
  clientId: string;
  username?: string;
  password?: string;
  tls?: TlsMaterial;
  /** Protocol-level keepalive in seconds (MQTT only) */
  keepaliveSeconds?: number;
  /** Handshake timeout in milliseconds */
  connectTimeoutMs?: number;
  /** Start a fresh broker session (MQTT only) */
  cleanSession?: boolean;
}

/**
 * Invoked by the transport for every received message
 */
export type InboundCallback = (topic: string, payload: Uint8Array) => void;

/**
 * Invoked when the connection drops without disconnect() being called
 */
export type DisconnectCallback = (error?: Error) => void;

/**
 * Narrow contract the runtime consumes. Implementations own exactly one
 * raw connection at a time and never reconnect on their own.
 */
export interface TransportAdapter {
  /** Short name used in logs */
  readonly kind: string;

  /** Open a connection, replacing any previous one */
  connect(options: TransportConnectOptions): Promise<void>;

  /** Close the connection. Never fires the disconnect callback. */
  disconnect(): Promise<void>;

  isConnected(): boolean;

  subscribe(pattern: string, qos: QoS): Promise<void>;

  unsubscribe(pattern: string): Promise<void>;

  /**
   * Hand a message to the broker. Resolves once the broker acknowledged it
   * (QoS 1 and 2) or once it was written (QoS 0).
   */
  publish(topic: string, payload: Uint8Array, qos: QoS): Promise<void>;

  /** Liveness round trip */
  ping(): Promise<void>;

  onMessage(callback: InboundCallback): void;

  onDisconnect(callback: DisconnectCallback): void;
}

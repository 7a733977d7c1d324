/**
 * @brokerline/transport - pub/sub transport adapters
 *
 * This package provides:
 * - The TransportAdapter contract the agent runtime consumes
 * - An MQTT adapter (mqtt.js) and a NATS adapter (nats.js)
 * - An in-process adapter for tests and offline runs
 * - Topic syntax helpers shared by the router and the adapters
 *
 * @example
 * ```typescript
 * import { createTransport } from '@brokerline/transport';
 *
 * const transport = createTransport('mqtts://broker.example.com:8883');
 * transport.onMessage((topic, payload) => console.log(topic, payload.length));
 *
 * await transport.connect({ endpoint: 'mqtts://broker.example.com:8883', clientId: 'agent-1' });
 * await transport.subscribe('sensors/+', 1);
 * ```
 */

export { MqttTransport, type MqttTransportOptions } from './mqtt-transport.js';
export { NatsTransport, type NatsTransportOptions } from './nats-transport.js';
export {
  MemoryTransport,
  type PublishedMessage,
  type PingBehavior,
} from './memory-transport.js';
export { createTransport, type CreateTransportOptions } from './factory.js';

export {
  TOPIC_SEPARATOR,
  SINGLE_LEVEL_WILDCARD,
  MULTI_LEVEL_WILDCARD,
  validateTopic,
  validatePattern,
  isWildcardPattern,
  matchTopic,
  toNatsSubject,
  fromNatsSubject,
} from './topics.js';

export type {
  TransportAdapter,
  TransportConnectOptions,
  TlsMaterial,
  InboundCallback,
  DisconnectCallback,
} from './types.js';

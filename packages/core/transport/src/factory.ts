/**
 * Pick a transport adapter from the endpoint scheme
 */

import { InvalidStateError } from '@brokerline/types';
import type { Logger } from '@brokerline/utils';
import { MemoryTransport } from './memory-transport.js';
import { MqttTransport } from './mqtt-transport.js';
import { NatsTransport } from './nats-transport.js';
import type { TransportAdapter } from './types.js';

const MQTT_SCHEMES = new Set(['mqtt', 'mqtts', 'ws', 'wss', 'tls']);

export interface CreateTransportOptions {
  logger?: Logger;
}

export function createTransport(
  endpoint: string,
  options: CreateTransportOptions = {}
): TransportAdapter {
  const scheme = /^([a-z][a-z0-9+.-]*):\/\//i.exec(endpoint)?.[1]?.toLowerCase();

  if (scheme === 'nats') {
    return new NatsTransport({ logger: options.logger });
  }
  if (scheme === 'memory') {
    return new MemoryTransport();
  }
  if (scheme && MQTT_SCHEMES.has(scheme)) {
    return new MqttTransport({ logger: options.logger });
  }

  throw new InvalidStateError(`No transport for endpoint ${endpoint}`, {
    component: 'transport',
    details: { endpoint, scheme },
  });
}

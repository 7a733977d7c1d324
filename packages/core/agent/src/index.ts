/**
 * @brokerline/agent - agent session runtime
 *
 * Keeps one logical broker session alive across network failures, routes
 * inbound messages to handlers, publishes telemetry with backpressure and
 * correlates request/response calls over pub/sub topics.
 *
 * @example
 * ```typescript
 * import { createAgent } from '@brokerline/agent';
 *
 * const agent = createAgent({ clientId: 'pump-7', endpoint: 'mqtts://broker.example.com:8883' });
 * await agent.subscribe('sensors/+', (message) => console.log(message.topic));
 * await agent.connect();
 * await agent.publish('telemetry/pump-7', { rpm: 1200 });
 * const reply = await agent.callJson('cmd/reboot', {}, { timeoutMs: 2000 });
 * await agent.disconnect();
 * ```
 */

export {
  Agent,
  createAgent,
  type AgentOptions,
  type AgentEvents,
  type AgentHealth,
  type PublishOptions,
  type SubscribeOptions,
  type SubscriptionHandle,
} from './agent.js';
export { resolveAgentOptions } from './options.js';
export type { CallOptions } from './correlator.js';
export type { PublishJob } from './publisher.js';
export type { SessionState, StateChange } from './session.js';
export type { BackoffPolicy } from './backoff.js';
export type { ErrorContext, ErrorSink, ErrorSource } from './types.js';

/**
 * Platform topic layout
 */

export const EVENT_TOPIC = 'iot/event/fmt/json';
export const LOG_TOPIC = 'iot/log/fmt/json';

export function agentCommandTopic(agentId: number): string {
  return `iot/cmd/agent/${agentId}/fmt/json`;
}

export function agentCommandStatusTopic(agentId: number): string {
  return `iot/cmd/agent/${agentId}/status/fmt/json`;
}

export function deviceCommandStatusTopic(deviceId: number): string {
  return `iot/cmd/device/${deviceId}/status/fmt/json`;
}

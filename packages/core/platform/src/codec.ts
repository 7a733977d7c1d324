/**
 * Platform wire codec
 *
 * Outbound messages become UTF-8 JSON with timestamps in integer
 * microseconds; inbound commands and REST API bodies are validated before
 * they are converted.
 */

import { InvalidMessageError, validateOrThrow } from '@brokerline/types';
import { decodeJson, encodeJson, fromMicros, toMicros } from '@brokerline/utils';
import {
  isCommandStatus,
  type AgentCommands,
  type AgentConfig,
  type Command,
  type CommandMessage,
  type CommandRecord,
  type CommandStatusMessage,
  type DeviceDefinition,
  type EventMessage,
  type EventTag,
  type LogRecord,
  type TagDefinition,
  type TagValue,
  type VersionedDeviceConfig,
} from './models.js';
import {
  AgentCommandsSchema,
  AgentConfigSchema,
  CommandMessageSchema,
  VersionedDeviceConfigSchema,
  type WireCommand,
  type WireCommandRecord,
  type WireDevice,
  type WireTag,
} from './schemas.js';

function encodeTagValue(value: TagValue): number | string | boolean | { lat: number; lng: number } {
  if (value instanceof Date) {
    return toMicros(value);
  }
  if (typeof value === 'object') {
    return { lat: value.lat, lng: value.lng };
  }
  return value;
}

function encodeTag(tag: EventTag): Record<string, unknown> {
  return {
    id: tag.id,
    value: encodeTagValue(tag.value),
    timestamp: toMicros(tag.timestamp),
  };
}

/** Wire object for an event, shared by the broker and REST encodings */
export function eventToWire(message: EventMessage): Record<string, unknown> {
  return { tags: message.tags.map(encodeTag) };
}

export function logsToWire(records: LogRecord[]): Record<string, unknown>[] {
  return records.map((record) => ({ level: record.level, message: record.message }));
}

/**
 * Status report body. `reason` is always present, null when there is none;
 * the REST API takes the command id from the URL instead of the body.
 */
export function commandStatusToWire(
  message: CommandStatusMessage,
  options: { includeId?: boolean } = {}
): Record<string, unknown> {
  const { includeId = true } = options;
  return {
    ...(includeId ? { id: message.id } : {}),
    status: message.status,
    reason: message.reason ?? null,
    timestamp: toMicros(message.timestamp),
  };
}

export function encodeEvent(message: EventMessage): Uint8Array {
  return encodeJson(eventToWire(message));
}

export function encodeLogs(records: LogRecord[]): Uint8Array {
  return encodeJson(logsToWire(records));
}

export function encodeCommandStatus(message: CommandStatusMessage): Uint8Array {
  return encodeJson(commandStatusToWire(message));
}

function toCommand(wire: WireCommand): Command {
  return {
    id: wire.id,
    tags: wire.tags.map((tag) => ({ id: tag.id, value: tag.value })),
    timestamp: fromMicros(wire.timestamp),
  };
}

/**
 * Parse and validate a command message
 *
 * @throws InvalidMessageError when the payload is not JSON or does not match the schema
 */
export function decodeCommandMessage(payload: Uint8Array): CommandMessage {
  let raw: unknown;
  try {
    raw = decodeJson(payload);
  } catch (error) {
    throw new InvalidMessageError('Command payload is not valid JSON', {
      component: 'platform',
      cause: error,
    });
  }

  const wire = validateOrThrow(CommandMessageSchema, raw, 'command message');

  return {
    command: wire.command ? toCommand(wire.command) : null,
    devices: wire.devices.map((device) => ({
      deviceId: device.device_id,
      command: toCommand(device.command),
    })),
  };
}

// ============================================================================
// REST API payloads
// ============================================================================

function toTag(wire: WireTag): TagDefinition {
  const children: Record<string, TagDefinition> = {};
  for (const child of wire.children ?? []) {
    children[child.name] = toTag(child);
  }
  return {
    id: wire.id,
    name: wire.name,
    properties: wire.properties,
    type: { id: wire.type.id, name: wire.type.name },
    attrs: wire.attrs ?? {},
    children,
    driverConfig: wire.driver_config ?? {},
  };
}

function toDevice(wire: WireDevice): DeviceDefinition {
  return {
    id: wire.id,
    name: wire.name,
    driver: { id: wire.driver.id, name: wire.driver.name, protocol: wire.driver.protocol ?? null },
    tag: toTag(wire.tag),
    driverConfig: wire.driver_config ?? {},
    configId: wire.config_id ?? null,
  };
}

/**
 * @throws InvalidMessageError when the body does not match the schema
 */
export function decodeAgentConfig(raw: unknown): AgentConfig {
  const wire = validateOrThrow(AgentConfigSchema, raw, 'agent config');
  return {
    version: wire.version,
    agent: {
      id: wire.agent.id,
      name: wire.agent.name,
      tag: toTag(wire.agent.tag),
      devices: wire.agent.devices.map(toDevice),
      configId: wire.agent.config_id ?? null,
    },
  };
}

function toCommandRecord(wire: WireCommandRecord): CommandRecord {
  const { status } = wire;
  if (!isCommandStatus(status)) {
    throw new InvalidMessageError(`Unknown command status '${status}' for command ${wire.id}`, {
      component: 'platform',
      details: { commandId: wire.id, status },
    });
  }
  return {
    id: wire.id,
    tags: wire.tags.map((tag) => ({ id: tag.tag_id, value: tag.value })),
    createdAt: fromMicros(wire.created_at),
    updatedAt: fromMicros(wire.updated_at),
    status,
    reason: wire.reason ?? null,
  };
}

/**
 * @throws InvalidMessageError on a schema mismatch or an unknown status
 */
export function decodeAgentCommands(raw: unknown): AgentCommands {
  const wire = validateOrThrow(AgentCommandsSchema, raw, 'agent commands');
  return {
    command: wire.command ? toCommandRecord(wire.command) : null,
    devices: wire.devices.map((device) => ({
      deviceId: device.device_id,
      command: toCommandRecord(device.command),
    })),
  };
}

export function decodeVersionedDeviceConfig(raw: unknown): VersionedDeviceConfig {
  const wire = validateOrThrow(VersionedDeviceConfigSchema, raw, 'device config');
  return {
    id: wire.id,
    deviceId: wire.device_id,
    createdAt:
      wire.created_at === undefined || wire.created_at === null ? null : fromMicros(wire.created_at),
    deviceConfig: wire.device_config ?? {},
  };
}

/**
 * @brokerline/platform - IoT platform protocol
 *
 * Event telemetry, log shipping, command intake and command status reports
 * on top of the agent runtime, plus the platform's REST API for the agent
 * configuration tree, pending commands and versioned device configs.
 *
 * @example
 * ```typescript
 * import { loadAndValidateConfig } from '@brokerline/config';
 * import { createPlatformClient } from '@brokerline/platform';
 *
 * const client = createPlatformClient(loadAndValidateConfig());
 * client.onCommands(async (message) => {
 *   for (const { deviceId, command } of message.devices) {
 *     await client.sendDeviceCommandStatus(deviceId, {
 *       id: command.id,
 *       status: 'received',
 *       timestamp: new Date(),
 *     });
 *   }
 * });
 * await client.start();
 * await client.sendEvent({ tags: [{ id: 1, value: 21.5, timestamp: new Date() }] });
 * ```
 */

export {
  PlatformClient,
  createPlatformClient,
  type CommandHandler,
  type PlatformClientOptions,
  type SendOptions,
} from './client.js';

export {
  PlatformHttpClient,
  createPlatformHttpClient,
  DEFAULT_HTTP_TIMEOUT_MS,
  type FetchFn,
  type PlatformHttpClientOptions,
} from './http-client.js';

export {
  HttpError,
  BadParamsError,
  UnauthorizedError,
  NotFoundError,
  InternalServerError,
  toHttpError,
  type HttpErrorOptions,
} from './errors.js';

export {
  commandStatusToWire,
  decodeAgentCommands,
  decodeAgentConfig,
  decodeCommandMessage,
  decodeVersionedDeviceConfig,
  encodeCommandStatus,
  encodeEvent,
  encodeLogs,
  eventToWire,
  logsToWire,
} from './codec.js';

export {
  PlatformLogLevel,
  COMMAND_STATUSES,
  isCommandStatus,
  platformLogin,
  findTag,
  type Location,
  type TagValue,
  type EventTag,
  type EventMessage,
  type LogRecord,
  type CommandStatus,
  type CommandTag,
  type Command,
  type DeviceCommand,
  type CommandMessage,
  type CommandStatusMessage,
  type PlatformAuth,
  type TagType,
  type TagDefinition,
  type DriverDefinition,
  type DeviceDefinition,
  type AgentDefinition,
  type AgentConfig,
  type CommandRecord,
  type AgentCommands,
  type VersionedDeviceConfig,
} from './models.js';

export {
  CommandMessageSchema,
  CommandSchema,
  CommandTagSchema,
  DeviceCommandSchema,
  LocationSchema,
  TagTypeSchema,
  TagSchema,
  DriverSchema,
  DeviceSchema,
  AgentDefinitionSchema,
  AgentConfigSchema,
  CommandRecordSchema,
  AgentCommandsSchema,
  VersionedDeviceConfigSchema,
} from './schemas.js';

export {
  EVENT_TOPIC,
  LOG_TOPIC,
  agentCommandTopic,
  agentCommandStatusTopic,
  deviceCommandStatusTopic,
} from './topics.js';

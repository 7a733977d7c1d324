/**
 * IoT platform message model
 *
 * In-memory shapes use Date for timestamps; the codec converts them to the
 * integer microseconds the platform sends on the wire.
 */

export interface Location {
  lat: number;
  lng: number;
}

/**
 * A tag value as reported in events or carried by commands
 */
export type TagValue = number | string | boolean | Location | Date;

export interface EventTag {
  id: number;
  value: TagValue;
  timestamp: Date;
}

export interface EventMessage {
  tags: EventTag[];
}

/**
 * Platform log severities, numbered as the platform expects them
 */
export const PlatformLogLevel = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
} as const;

export type PlatformLogLevel = (typeof PlatformLogLevel)[keyof typeof PlatformLogLevel];

export interface LogRecord {
  level: PlatformLogLevel;
  message: string;
}

export const COMMAND_STATUSES = [
  'new',
  'sending',
  'sent',
  'received',
  'skipped',
  'done',
  'failed',
] as const;

export type CommandStatus = (typeof COMMAND_STATUSES)[number];

export function isCommandStatus(value: unknown): value is CommandStatus {
  return typeof value === 'string' && COMMAND_STATUSES.some((status) => status === value);
}

export interface CommandTag {
  id: number;
  value: number | string | boolean | Location;
}

export interface Command {
  id: string;
  tags: CommandTag[];
  timestamp: Date;
}

/**
 * A command addressed to one of the agent's devices
 */
export interface DeviceCommand {
  deviceId: number;
  command: Command;
}

/**
 * What the platform sends on the agent command topic
 */
export interface CommandMessage {
  /** Command for the agent itself, if any */
  command: Command | null;
  devices: DeviceCommand[];
}

export interface CommandStatusMessage {
  id: string;
  status: CommandStatus;
  timestamp: Date;
  reason?: string | null;
}

/**
 * Platform credentials of one agent
 */
export interface PlatformAuth {
  clientId: number;
  agentId: number;
  token: string;
}

/**
 * Broker username the platform expects: `<clientId>_<agentId>`
 */
export function platformLogin(auth: Pick<PlatformAuth, 'clientId' | 'agentId'>): string {
  return `${auth.clientId}_${auth.agentId}`;
}

// ============================================================================
// Agent configuration tree (REST API)
// ============================================================================

export interface TagType {
  id: number;
  name: string;
}

export interface TagDefinition {
  id: number;
  name: string;
  properties: Record<string, unknown>;
  type: TagType;
  attrs: Record<string, unknown>;
  /** Child tags keyed by name */
  children: Record<string, TagDefinition>;
  driverConfig: Record<string, unknown>;
}

export interface DriverDefinition {
  id: number;
  name: string;
  protocol: string | null;
}

export interface DeviceDefinition {
  id: number;
  name: string;
  driver: DriverDefinition;
  tag: TagDefinition;
  driverConfig: Record<string, unknown>;
  configId: number | null;
}

export interface AgentDefinition {
  id: number;
  name: string;
  tag: TagDefinition;
  devices: DeviceDefinition[];
  configId: number | null;
}

export interface AgentConfig {
  agent: AgentDefinition;
  version: string;
}

/**
 * Walk down the tag tree by child names, e.g. `['$state', '$status']`
 */
export function findTag(root: TagDefinition, path: readonly string[]): TagDefinition | undefined {
  let current = root;
  for (const name of path) {
    if (!Object.hasOwn(current.children, name)) {
      return undefined;
    }
    current = current.children[name];
  }
  return current;
}

// ============================================================================
// Stored commands (REST API)
// ============================================================================

export interface CommandRecord {
  id: string;
  tags: CommandTag[];
  createdAt: Date;
  updatedAt: Date;
  status: CommandStatus;
  reason: string | null;
}

export interface AgentCommands {
  command: CommandRecord | null;
  devices: { deviceId: number; command: CommandRecord }[];
}

export interface VersionedDeviceConfig {
  id: number;
  deviceId: number;
  createdAt: Date | null;
  deviceConfig: Record<string, unknown>;
}

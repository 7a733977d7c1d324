/**
 * TypeBox schemas for inbound platform payloads (wire format), from the broker and the REST API
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

/** Integer microseconds since the Unix epoch */
const MicrosTimestamp = Type.Integer({ minimum: 0 });

export const LocationSchema = Type.Object({
  lat: Type.Number(),
  lng: Type.Number(),
});

export const CommandTagSchema = Type.Object({
  id: Type.Integer(),
  value: Type.Union([Type.Number(), Type.String(), Type.Boolean(), LocationSchema]),
});

export const CommandSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  tags: Type.Array(CommandTagSchema),
  timestamp: MicrosTimestamp,
});

export const DeviceCommandSchema = Type.Object({
  device_id: Type.Integer(),
  command: CommandSchema,
});

export const CommandMessageSchema = Type.Object({
  command: Type.Optional(Type.Union([CommandSchema, Type.Null()])),
  devices: Type.Array(DeviceCommandSchema),
});

export type WireCommand = Static<typeof CommandSchema>;
export type WireCommandMessage = Static<typeof CommandMessageSchema>;

// ============================================================================
// REST API payloads
// ============================================================================

const JsonObject = Type.Record(Type.String(), Type.Unknown());

function Nullable<T extends TSchema>(schema: T) {
  return Type.Union([schema, Type.Null()]);
}

export const TagTypeSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
});

/** Tag tree node; `children` arrive as a list */
export const TagSchema = Type.Recursive(
  (Tag) =>
    Type.Object({
      id: Type.Integer(),
      name: Type.String(),
      properties: JsonObject,
      type: TagTypeSchema,
      attrs: Type.Optional(Nullable(JsonObject)),
      children: Type.Optional(Nullable(Type.Array(Tag))),
      driver_config: Type.Optional(Nullable(JsonObject)),
    }),
  { $id: 'Tag' }
);

export const DriverSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  protocol: Type.Optional(Nullable(Type.String())),
});

export const DeviceSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  driver: DriverSchema,
  tag: TagSchema,
  driver_config: Type.Optional(Nullable(JsonObject)),
  config_id: Type.Optional(Nullable(Type.Integer())),
});

export const AgentDefinitionSchema = Type.Object({
  id: Type.Integer(),
  name: Type.String(),
  tag: TagSchema,
  devices: Type.Array(DeviceSchema),
  config_id: Type.Optional(Nullable(Type.Integer())),
});

export const AgentConfigSchema = Type.Object({
  agent: AgentDefinitionSchema,
  version: Type.String(),
});

/**
 * Stored command; unlike the broker payload its tags carry `tag_id` and
 * the status is checked against the known statuses after validation
 */
export const CommandRecordSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  tags: Type.Array(
    Type.Object({
      tag_id: Type.Integer(),
      value: CommandTagSchema.properties.value,
    })
  ),
  created_at: MicrosTimestamp,
  updated_at: MicrosTimestamp,
  status: Type.String(),
  reason: Type.Optional(Nullable(Type.String())),
});

export const AgentCommandsSchema = Type.Object({
  command: Type.Optional(Nullable(CommandRecordSchema)),
  devices: Type.Array(
    Type.Object({
      device_id: Type.Integer(),
      command: CommandRecordSchema,
    })
  ),
});

export const VersionedDeviceConfigSchema = Type.Object({
  id: Type.Integer(),
  device_id: Type.Integer(),
  created_at: Type.Optional(Nullable(MicrosTimestamp)),
  device_config: Type.Optional(Nullable(JsonObject)),
});

export type WireTag = Static<typeof TagSchema>;
export type WireDevice = Static<typeof DeviceSchema>;
export type WireAgentConfig = Static<typeof AgentConfigSchema>;
export type WireCommandRecord = Static<typeof CommandRecordSchema>;
export type WireAgentCommands = Static<typeof AgentCommandsSchema>;
export type WireVersionedDeviceConfig = Static<typeof VersionedDeviceConfigSchema>;

/**
 * Configuration Schema for Brokerline
 *
 * TypeBox schema matching the brokerline.toml structure. The TypeScript
 * types are derived from it so the file and the types cannot drift apart.
 */

import { Type, type Static } from '@sinclair/typebox';

const PositiveInt = Type.Integer({ minimum: 1 });
const NonNegativeInt = Type.Integer({ minimum: 0 });

/** Longest delay a Node.js timer honours */
const MAX_TIMER_MS = 2_147_483_647;
const TimerMs = Type.Integer({ minimum: 1, maximum: MAX_TIMER_MS });
const OptionalTimerMs = Type.Integer({ minimum: 0, maximum: MAX_TIMER_MS });

/**
 * Agent identity
 */
export const AgentSectionSchema = Type.Object({
  /** Client id presented to the broker */
  client_id: Type.String({ minLength: 1 }),
  /** Human-readable agent name for logs */
  name: Type.Optional(Type.String()),
});

/**
 * Broker connection settings
 */
export const BrokerConfigSchema = Type.Object({
  /** e.g. mqtts://broker.example.com:8883 or nats://localhost:4222 */
  endpoint: Type.String({ minLength: 1 }),
  username: Type.Optional(Type.String()),
  password: Type.Optional(Type.String()),
  /** PEM CA bundle path */
  ca_file: Type.Optional(Type.String()),
  /** PEM client certificate path */
  cert_file: Type.Optional(Type.String()),
  /** PEM client key path */
  key_file: Type.Optional(Type.String()),
  connect_timeout_ms: Type.Optional(TimerMs),
  clean_session: Type.Optional(Type.Boolean()),
});

/**
 * Session lifecycle settings
 */
export const SessionConfigSchema = Type.Object({
  /** 0 disables keepalive pings */
  keepalive_interval_ms: Type.Optional(OptionalTimerMs),
  keepalive_timeout_ms: Type.Optional(TimerMs),
  backoff_base_ms: Type.Optional(TimerMs),
  backoff_max_ms: Type.Optional(TimerMs),
  /** Fraction of the delay added as random jitter */
  backoff_jitter: Type.Optional(Type.Number()),
});

/**
 * Outbound telemetry settings
 */
export const PublisherConfigSchema = Type.Object({
  queue_capacity: Type.Optional(PositiveInt),
  max_retries: Type.Optional(NonNegativeInt),
  ack_timeout_ms: Type.Optional(TimerMs),
  retry_delay_ms: Type.Optional(OptionalTimerMs),
  /** How long disconnect() waits for queued telemetry to flush */
  drain_timeout_ms: Type.Optional(OptionalTimerMs),
});

/**
 * Request/response settings
 */
export const CallsConfigSchema = Type.Object({
  default_timeout_ms: Type.Optional(TimerMs),
  /** Topic prefix responses are published under */
  response_root: Type.Optional(Type.String({ minLength: 1 })),
});

/**
 * IoT platform identity
 */
export const PlatformConfigSchema = Type.Object({
  client_id: Type.Integer(),
  agent_id: Type.Integer(),
  token: Type.Optional(Type.String()),
  /** Base URL of the platform REST API, e.g. https://platform.example.com */
  http_url: Type.Optional(Type.String({ minLength: 1 })),
  http_timeout_ms: Type.Optional(TimerMs),
});

/**
 * Runtime settings
 */
export const RuntimeConfigSchema = Type.Object({
  log_level: Type.Optional(
    Type.Union([
      Type.Literal('debug'),
      Type.Literal('info'),
      Type.Literal('warn'),
      Type.Literal('error'),
    ])
  ),
});

/**
 * Complete brokerline.toml configuration
 */
export const BrokerlineConfigSchema = Type.Object({
  agent: AgentSectionSchema,
  broker: BrokerConfigSchema,
  session: Type.Optional(SessionConfigSchema),
  publisher: Type.Optional(PublisherConfigSchema),
  calls: Type.Optional(CallsConfigSchema),
  platform: Type.Optional(PlatformConfigSchema),
  runtime: Type.Optional(RuntimeConfigSchema),
});

export type AgentSection = Static<typeof AgentSectionSchema>;
export type BrokerConfig = Static<typeof BrokerConfigSchema>;
export type SessionConfig = Static<typeof SessionConfigSchema>;
export type PublisherConfig = Static<typeof PublisherConfigSchema>;
export type CallsConfig = Static<typeof CallsConfigSchema>;
export type PlatformConfig = Static<typeof PlatformConfigSchema>;
export type RuntimeConfig = Static<typeof RuntimeConfigSchema>;
export type BrokerlineConfig = Static<typeof BrokerlineConfigSchema>;

/**
 * Raw configuration as parsed from TOML, before validation
 */
export type RawConfig = Record<string, unknown>;

/**
 * Defaults applied when a setting is absent
 */
export const CONFIG_DEFAULTS = {
  broker: {
    connect_timeout_ms: 10_000,
    clean_session: true,
  },
  session: {
    keepalive_interval_ms: 30_000,
    keepalive_timeout_ms: 10_000,
    backoff_base_ms: 1_000,
    backoff_max_ms: 60_000,
    backoff_jitter: 0.2,
  },
  publisher: {
    queue_capacity: 1_000,
    max_retries: 5,
    ack_timeout_ms: 10_000,
    retry_delay_ms: 1_000,
    drain_timeout_ms: 5_000,
  },
  calls: {
    default_timeout_ms: 10_000,
    response_root: 'iot/rpc/response',
  },
  platform: {
    http_timeout_ms: 20_000,
  },
  runtime: {
    log_level: 'info',
  },
} as const;

/**
 * Endpoint schemes the transport layer understands
 */
export const SUPPORTED_SCHEMES = ['mqtt', 'mqtts', 'ws', 'wss', 'nats', 'tls', 'memory'] as const;

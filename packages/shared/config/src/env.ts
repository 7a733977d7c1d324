/**
 * Environment Variable Overlay
 *
 * Allows environment variables to override TOML configuration values
 */

import type { RawConfig } from './schema.js';

/**
 * Mapping of environment variables to configuration paths
 */
const ENV_VAR_MAPPINGS: Record<string, string> = {
  // Agent identity
  AGENT_CLIENT_ID: 'agent.client_id',
  AGENT_NAME: 'agent.name',

  // Broker settings
  BROKER_ENDPOINT: 'broker.endpoint',
  BROKER_USERNAME: 'broker.username',
  BROKER_PASSWORD: 'broker.password',
  BROKER_CA_FILE: 'broker.ca_file',
  BROKER_CERT_FILE: 'broker.cert_file',
  BROKER_KEY_FILE: 'broker.key_file',
  BROKER_CONNECT_TIMEOUT_MS: 'broker.connect_timeout_ms',
  BROKER_CLEAN_SESSION: 'broker.clean_session',

  // Session settings
  SESSION_KEEPALIVE_INTERVAL_MS: 'session.keepalive_interval_ms',
  SESSION_KEEPALIVE_TIMEOUT_MS: 'session.keepalive_timeout_ms',
  SESSION_BACKOFF_BASE_MS: 'session.backoff_base_ms',
  SESSION_BACKOFF_MAX_MS: 'session.backoff_max_ms',
  SESSION_BACKOFF_JITTER: 'session.backoff_jitter',

  // Publisher settings
  PUBLISHER_QUEUE_CAPACITY: 'publisher.queue_capacity',
  PUBLISHER_MAX_RETRIES: 'publisher.max_retries',
  PUBLISHER_ACK_TIMEOUT_MS: 'publisher.ack_timeout_ms',

  // Call settings
  CALLS_DEFAULT_TIMEOUT_MS: 'calls.default_timeout_ms',
  CALLS_RESPONSE_ROOT: 'calls.response_root',

  // Platform settings
  PLATFORM_CLIENT_ID: 'platform.client_id',
  PLATFORM_AGENT_ID: 'platform.agent_id',
  PLATFORM_AGENT_TOKEN: 'platform.token',
  PLATFORM_HTTP_URL: 'platform.http_url',
  PLATFORM_HTTP_TIMEOUT_MS: 'platform.http_timeout_ms',

  // Runtime settings
  RUNTIME_LOG_LEVEL: 'runtime.log_level',
};

const NUMERIC_PATHS = new Set([
  'broker.connect_timeout_ms',
  'session.keepalive_interval_ms',
  'session.keepalive_timeout_ms',
  'session.backoff_base_ms',
  'session.backoff_max_ms',
  'session.backoff_jitter',
  'publisher.queue_capacity',
  'publisher.max_retries',
  'publisher.ack_timeout_ms',
  'calls.default_timeout_ms',
  'platform.client_id',
  'platform.agent_id',
  'platform.http_timeout_ms',
]);

const BOOLEAN_PATHS = new Set(['broker.clean_session']);

/**
 * Parse environment variable value to the type its path expects.
 * Values that do not parse are kept as strings so validation reports them.
 */
function parseEnvValue(value: string, path: string): string | number | boolean {
  if (BOOLEAN_PATHS.has(path)) {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
  }

  if (NUMERIC_PATHS.has(path)) {
    const num = Number(value);
    if (value.trim() !== '' && !isNaN(num)) return num;
  }

  return value;
}

/**
 * Check if a key is safe to use (not a prototype pollution vector)
 */
function isSafeKey(key: string): boolean {
  return key !== '__proto__' && key !== 'constructor' && key !== 'prototype';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested property in an object using dot notation
 * Protected against prototype pollution
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (!part || !isSafeKey(part)) return;
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  const lastPart = parts[parts.length - 1];
  if (lastPart && isSafeKey(lastPart)) {
    current[lastPart] = value;
  }
}

/**
 * Create configuration overlay from environment variables
 */
export function createEnvOverlay(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overlay: RawConfig = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(overlay, configPath, parseEnvValue(value, configPath));
    }
  }

  return overlay;
}

/**
 * Deep merge two objects, with source taking precedence
 * Protected against prototype pollution
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const key of Object.keys(source)) {
    if (!isSafeKey(key)) {
      continue;
    }

    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Apply environment variable overlay to configuration
 */
export function applyEnvOverlay(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  return deepMerge(config, createEnvOverlay(env));
}

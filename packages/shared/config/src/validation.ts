/**
 * Configuration Validation
 *
 * Validates brokerline.toml configuration for correctness
 */

import { validate } from '@brokerline/types';
import {
  BrokerlineConfigSchema,
  CONFIG_DEFAULTS,
  SUPPORTED_SCHEMES,
  type BrokerlineConfig,
} from './schema.js';

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Typed configuration, present when valid */
  config?: BrokerlineConfig;
}

/**
 * Extract the scheme of an endpoint URL, or null when it is not a URL
 */
export function getEndpointScheme(endpoint: string): string | null {
  const match = /^([a-z][a-z0-9+.-]*):\/\//i.exec(endpoint);
  return match?.[1]?.toLowerCase() ?? null;
}

/**
 * Validate broker settings
 */
function validateBrokerConfig(config: BrokerlineConfig, errors: string[], warnings: string[]): void {
  const { broker } = config;
  const scheme = getEndpointScheme(broker.endpoint);
  const supported: readonly string[] = SUPPORTED_SCHEMES;

  if (!scheme) {
    errors.push(`broker.endpoint must be a URL with a scheme, got "${broker.endpoint}"`);
  } else if (!supported.includes(scheme)) {
    errors.push(
      `Invalid broker.endpoint scheme: "${scheme}". Must be one of: ${SUPPORTED_SCHEMES.join(', ')}`
    );
  }

  if (broker.cert_file && !broker.key_file) {
    errors.push('broker.key_file is required when broker.cert_file is set');
  }

  if (broker.key_file && !broker.cert_file) {
    errors.push('broker.cert_file is required when broker.key_file is set');
  }

  if (broker.password && !broker.username) {
    warnings.push('broker.password is set without broker.username');
  }
}

/**
 * Validate session settings
 */
function validateSessionConfig(
  config: BrokerlineConfig,
  errors: string[],
  warnings: string[]
): void {
  const session = { ...CONFIG_DEFAULTS.session, ...config.session };

  if (session.backoff_base_ms > session.backoff_max_ms) {
    errors.push('session.backoff_base_ms must not exceed session.backoff_max_ms');
  }

  if (session.backoff_jitter < 0 || session.backoff_jitter > 1) {
    errors.push('session.backoff_jitter must be between 0 and 1');
  }

  if (
    session.keepalive_interval_ms > 0 &&
    session.keepalive_timeout_ms >= session.keepalive_interval_ms
  ) {
    warnings.push('session.keepalive_timeout_ms should be shorter than keepalive_interval_ms');
  }
}

/**
 * Validate platform settings
 */
function validatePlatformConfig(
  config: BrokerlineConfig,
  errors: string[],
  warnings: string[]
): void {
  if (!config.platform) {
    return; // Platform is optional
  }

  const httpUrl = config.platform.http_url;
  if (httpUrl !== undefined) {
    const scheme = getEndpointScheme(httpUrl);
    if (scheme !== 'http' && scheme !== 'https') {
      errors.push(`platform.http_url must be an http(s) URL, got "${httpUrl}"`);
    }
  }

  if (!config.platform.token && !config.broker.password) {
    warnings.push('platform.token is not set; the broker will see an empty password');
  }
}

/**
 * Validate configuration and return all errors and warnings
 */
export function validateConfig(raw: unknown): ValidationResult {
  const structural = validate(BrokerlineConfigSchema, raw);

  if (!structural.success) {
    return {
      valid: false,
      errors: structural.errors.map((e) => `${formatPath(e.path)}: ${e.message}`),
      warnings: [],
    };
  }

  const config = structural.data;
  const errors: string[] = [];
  const warnings: string[] = [];

  validateBrokerConfig(config, errors, warnings);
  validateSessionConfig(config, errors, warnings);
  validatePlatformConfig(config, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config: errors.length === 0 ? config : undefined,
  };
}

/**
 * Validate configuration and throw if invalid
 *
 * @throws ConfigValidationError listing every problem found
 */
export function validateConfigOrThrow(raw: unknown): BrokerlineConfig {
  const result = validateConfig(raw);

  if (!result.valid || !result.config) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${result.errors.map((e) => `  - ${e}`).join('\n')}`,
      result.errors
    );
  }

  for (const warning of result.warnings) {
    console.warn(`[config] WARN: ${warning}`);
  }

  return result.config;
}

/**
 * Turn a JSON pointer like /broker/endpoint into broker.endpoint
 */
function formatPath(pointer: string): string {
  const dotted = pointer.replace(/^\//, '').replace(/\//g, '.');
  return dotted === '' ? '(root)' : dotted;
}

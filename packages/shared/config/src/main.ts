/**
 * Main Configuration Loading
 *
 * Convenience function that combines loading, overlay, and validation
 */

import type { BrokerlineConfig } from './schema.js';
import { loadConfig } from './loader.js';
import { applyEnvOverlay } from './env.js';
import { validateConfigOrThrow } from './validation.js';

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Path to brokerline.toml; BROKERLINE_CONFIG_PATH or the search paths otherwise */
  configPath?: string;
  /** Whether to apply environment variable overlays (default: true) */
  applyEnv?: boolean;
  /** Environment to read the config path and overlays from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load, overlay, and validate configuration in one call
 *
 * @throws ConfigLoadError if loading fails
 * @throws ConfigValidationError if validation fails
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): BrokerlineConfig {
  const { configPath, applyEnv = true, env = process.env } = options;

  let config = loadConfig(configPath, env);

  if (applyEnv) {
    config = applyEnvOverlay(config, env);
  }

  return validateConfigOrThrow(config);
}

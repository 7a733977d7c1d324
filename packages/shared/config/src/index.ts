/**
 * @brokerline/config - Configuration System
 *
 * Provides TOML parsing, environment variable overlays and validation
 * for brokerline.toml.
 */

// Export schema and types
export {
  BrokerlineConfigSchema,
  CONFIG_DEFAULTS,
  SUPPORTED_SCHEMES,
  type BrokerlineConfig,
  type RawConfig,
  type AgentSection,
  type BrokerConfig,
  type SessionConfig,
  type PublisherConfig,
  type CallsConfig,
  type PlatformConfig,
  type RuntimeConfig,
} from './schema.js';

// Export loader functions
export {
  loadConfig,
  parseToml,
  resolveConfigPath,
  getConfigSearchPaths,
  ConfigLoadError,
  CONFIG_FILE_NAME,
  CONFIG_PATH_ENV,
} from './loader.js';

// Export environment overlay functions
export { createEnvOverlay, applyEnvOverlay, deepMerge } from './env.js';

// Export validation functions
export {
  validateConfig,
  validateConfigOrThrow,
  getEndpointScheme,
  ConfigValidationError,
  type ValidationResult,
} from './validation.js';

// Main convenience function that loads, overlays, and validates config
export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';

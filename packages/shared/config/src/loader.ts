/**
 * brokerline.toml discovery and parsing
 *
 * An explicit path wins, then BROKERLINE_CONFIG_PATH, then the first file
 * found in the search paths.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { AgentError, AgentErrorCodes } from '@brokerline/types';
import type { RawConfig } from './schema.js';

export const CONFIG_FILE_NAME = 'brokerline.toml';

/** Names the configuration file when no path is passed in */
export const CONFIG_PATH_ENV = 'BROKERLINE_CONFIG_PATH';

/**
 * The file could not be found, read or parsed
 */
export class ConfigLoadError extends AgentError {
  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super(AgentErrorCodes.CONFIG, message, {
      component: 'config',
      cause: options.cause,
      details: options.path ? { path: options.path } : undefined,
    });
    this.name = 'ConfigLoadError';
  }
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Where to look when no path is configured, in order
 */
export function getConfigSearchPaths(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string[] {
  const paths = [path.join(cwd, CONFIG_FILE_NAME)];

  const home = env.HOME || env.USERPROFILE;
  if (home) {
    paths.push(path.join(home, '.brokerline', CONFIG_FILE_NAME));
  }

  paths.push(path.join('/etc/brokerline', CONFIG_FILE_NAME));
  return paths;
}

/**
 * Decide which file to load
 *
 * @throws ConfigLoadError when the chosen file does not exist or none is found
 */
export function resolveConfigPath(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const explicit = customPath || env[CONFIG_PATH_ENV];
  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new ConfigLoadError(`Configuration file not found: ${explicit}`, { path: explicit });
    }
    return explicit;
  }

  const candidates = getConfigSearchPaths(env);
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigLoadError(
      `No ${CONFIG_FILE_NAME} found (set ${CONFIG_PATH_ENV} or create one in: ${candidates.join(', ')})`
    );
  }
  return found;
}

/**
 * Parse TOML text. `source` names the input in error messages.
 */
export function parseToml(content: string, source = 'configuration'): RawConfig {
  try {
    return TOML.parse(content);
  } catch (error) {
    throw new ConfigLoadError(`Invalid TOML in ${source}: ${reason(error)}`, { cause: error });
  }
}

/**
 * Resolve, read and parse the configuration file
 */
export function loadConfig(customPath?: string, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const configPath = resolveConfigPath(customPath, env);

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigLoadError(`Cannot read ${configPath}: ${reason(error)}`, {
      path: configPath,
      cause: error,
    });
  }

  return parseToml(content, configPath);
}

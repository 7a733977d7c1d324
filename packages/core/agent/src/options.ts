/**
 * Turn a validated brokerline.toml into Agent options
 */

import { readFileSync } from 'node:fs';
import { AgentError, AgentErrorCodes } from '@brokerline/types';
import { CONFIG_DEFAULTS, type BrokerlineConfig } from '@brokerline/config';
import type { TlsMaterial } from '@brokerline/transport';
import { createLogger } from '@brokerline/utils';
import type { AgentOptions } from './agent.js';

function readPem(path: string, setting: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new AgentError(AgentErrorCodes.CONFIG, `Cannot read ${setting} at ${path}`, {
      component: 'config',
      cause: error,
      details: { setting, path },
    });
  }
}

function resolveTls(config: BrokerlineConfig): TlsMaterial | undefined {
  const { ca_file, cert_file, key_file } = config.broker;
  if (!ca_file && !cert_file && !key_file) {
    return undefined;
  }
  return {
    ca: ca_file ? readPem(ca_file, 'broker.ca_file') : undefined,
    cert: cert_file ? readPem(cert_file, 'broker.cert_file') : undefined,
    key: key_file ? readPem(key_file, 'broker.key_file') : undefined,
  };
}

/**
 * Map configuration sections onto AgentOptions. Values in `overrides` win.
 */
export function resolveAgentOptions(
  config: BrokerlineConfig,
  overrides: Partial<AgentOptions> = {}
): AgentOptions {
  const { broker, session = {}, publisher = {}, calls = {}, runtime = {} } = config;
  const logLevel = runtime.log_level ?? CONFIG_DEFAULTS.runtime.log_level;

  return {
    clientId: config.agent.client_id,
    endpoint: broker.endpoint,
    username: broker.username,
    password: broker.password,
    tls: resolveTls(config),
    cleanSession: broker.clean_session,
    connectTimeoutMs: broker.connect_timeout_ms,
    keepaliveIntervalMs: session.keepalive_interval_ms,
    keepaliveTimeoutMs: session.keepalive_timeout_ms,
    backoff: {
      baseMs: session.backoff_base_ms,
      maxMs: session.backoff_max_ms,
      jitter: session.backoff_jitter,
    },
    queueCapacity: publisher.queue_capacity,
    maxRetries: publisher.max_retries,
    ackTimeoutMs: publisher.ack_timeout_ms,
    retryDelayMs: publisher.retry_delay_ms,
    drainTimeoutMs: publisher.drain_timeout_ms,
    defaultCallTimeoutMs: calls.default_timeout_ms,
    responseRoot: calls.response_root,
    logger: createLogger(config.agent.name ? `agent:${config.agent.name}` : 'agent', logLevel),
    ...overrides,
  };
}

/**
 * Platform REST client
 *
 * The same platform identity as the broker client, over HTTPS with Basic
 * auth: `<client_id>_<agent_id>` and the agent token. Besides the reports
 * the broker client sends, it fetches the agent's configuration tree, the
 * pending commands and versioned device configs.
 */

import {
  AgentError,
  AgentErrorCodes,
  ConnectionError,
  InvalidMessageError,
  TimeoutError,
} from '@brokerline/types';
import type { BrokerlineConfig } from '@brokerline/config';
import { createLogger, silentLogger, type Logger } from '@brokerline/utils';
import {
  commandStatusToWire,
  decodeAgentCommands,
  decodeAgentConfig,
  decodeVersionedDeviceConfig,
  eventToWire,
  logsToWire,
} from './codec.js';
import { toHttpError } from './errors.js';
import {
  platformLogin,
  type AgentCommands,
  type AgentConfig,
  type CommandStatusMessage,
  type EventMessage,
  type LogRecord,
  type PlatformAuth,
  type VersionedDeviceConfig,
} from './models.js';

export type FetchFn = typeof fetch;

export const DEFAULT_HTTP_TIMEOUT_MS = 20_000;

export interface PlatformHttpClientOptions {
  /** API root, e.g. https://platform.example.com */
  baseUrl: string;
  auth: PlatformAuth;
  /** Per-request deadline (default: 20s) */
  timeoutMs?: number;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  logger?: Logger;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH';

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
}

export class PlatformHttpClient {
  readonly baseUrl: string;
  readonly agentId: number;

  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: PlatformHttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.agentId = options.auth.agentId;
    const credentials = `${platformLogin(options.auth)}:${options.auth.token}`;
    this.authorization = `Basic ${Buffer.from(credentials).toString('base64')}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Agent configuration tree; `version` asks for a specific revision
   */
  async getConfig(version?: string): Promise<AgentConfig> {
    const query = version === undefined ? undefined : { version };
    return decodeAgentConfig(await this.getJson('/v1/agents/config', query));
  }

  async getCommands(): Promise<AgentCommands> {
    return decodeAgentCommands(await this.getJson('/v1/commands'));
  }

  async getDeviceVersionedConfig(versionId: number): Promise<VersionedDeviceConfig> {
    return decodeVersionedDeviceConfig(await this.getJson(`/v1/devices/config/${versionId}`));
  }

  async sendEvent(message: EventMessage): Promise<void> {
    await this.request('POST', '/v1/events', { body: eventToWire(message) });
  }

  async sendLogs(records: LogRecord[]): Promise<void> {
    await this.request('POST', '/v1/logs', { body: logsToWire(records) });
  }

  async sendAgentCommandStatus(message: CommandStatusMessage): Promise<void> {
    await this.request(
      'PATCH',
      `/v1/agents/${this.agentId}/commands/${encodeURIComponent(message.id)}/status`,
      { body: commandStatusToWire(message, { includeId: false }) }
    );
  }

  async sendDeviceCommandStatus(deviceId: number, message: CommandStatusMessage): Promise<void> {
    await this.request(
      'PATCH',
      `/v1/devices/${deviceId}/commands/${encodeURIComponent(message.id)}/status`,
      { body: commandStatusToWire(message, { includeId: false }) }
    );
  }

  private async getJson(path: string, query?: Record<string, string>): Promise<unknown> {
    const text = await this.request('GET', path, { query });
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InvalidMessageError(`GET ${path} returned a body that is not JSON`, {
        component: 'platform-http',
        cause: error,
      });
    }
  }

  /**
   * Resolves with the response body for a 2xx answer
   *
   * @throws TimeoutError past the deadline
   * @throws ConnectionError when no response arrives
   * @throws HttpError (or a subclass) for any other status
   */
  private async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<string> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      Authorization: this.authorization,
      Accept: 'application/json',
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    this.logger.debug(`${method} ${url.pathname}`);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new TimeoutError(`${method} ${url.pathname} timed out after ${this.timeoutMs}ms`, {
          component: 'platform-http',
          cause: error,
        });
      }
      throw new ConnectionError(`${method} ${url.pathname} failed: ${reason}`, {
        component: 'platform-http',
        cause: error,
      });
    }

    if (!ok) {
      this.logger.warn(`${method} ${url.pathname} returned ${status}`);
      throw toHttpError({ status, url: url.href, body: text });
    }
    return text;
  }
}

/**
 * Build a REST client from the [platform] section; needs `http_url`
 */
export function createPlatformHttpClient(
  config: BrokerlineConfig,
  overrides: Partial<PlatformHttpClientOptions> = {}
): PlatformHttpClient {
  const platform = config.platform;
  if (!platform?.http_url) {
    throw new AgentError(
      AgentErrorCodes.CONFIG,
      'platform.http_url is required for the platform REST client',
      { component: 'platform' }
    );
  }

  return new PlatformHttpClient({
    baseUrl: platform.http_url,
    auth: { clientId: platform.client_id, agentId: platform.agent_id, token: platform.token ?? '' },
    timeoutMs: platform.http_timeout_ms ?? DEFAULT_HTTP_TIMEOUT_MS,
    logger: createLogger('platform-http', config.runtime?.log_level ?? 'info'),
    ...overrides,
  });
}

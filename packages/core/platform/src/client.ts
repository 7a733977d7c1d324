/**
 * Platform Client
 *
 * Speaks the IoT platform protocol over an Agent: events, logs and command
 * status reports go out as QoS 1 telemetry, commands arrive on the agent's
 * command topic and are handed to registered handlers.
 */

import { AgentError, AgentErrorCodes, type Message } from '@brokerline/types';
import type { BrokerlineConfig } from '@brokerline/config';
import { createAgent, resolveAgentOptions, type Agent, type AgentOptions } from '@brokerline/agent';
import { silentLogger, type Logger } from '@brokerline/utils';
import {
  decodeCommandMessage,
  encodeCommandStatus,
  encodeEvent,
  encodeLogs,
} from './codec.js';
import {
  platformLogin,
  type CommandMessage,
  type CommandStatusMessage,
  type EventMessage,
  type LogRecord,
} from './models.js';
import {
  EVENT_TOPIC,
  LOG_TOPIC,
  agentCommandStatusTopic,
  agentCommandTopic,
  deviceCommandStatusTopic,
} from './topics.js';

export type CommandHandler = (message: CommandMessage) => void | Promise<void>;

export interface PlatformClientOptions {
  agent: Agent;
  agentId: number;
  logger?: Logger;
}

export interface SendOptions {
  /** Resolve only once the broker acknowledged the message */
  waitForDelivery?: boolean;
}

export class PlatformClient {
  readonly agentId: number;

  private readonly agent: Agent;
  private readonly logger: Logger;
  private readonly handlers = new Set<CommandHandler>();
  private started = false;

  constructor(options: PlatformClientOptions) {
    this.agent = options.agent;
    this.agentId = options.agentId;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Subscribe to the command topic and connect.
   * Rejects with ConnectionError if the first handshake fails; the agent
   * keeps retrying.
   */
  async start(): Promise<void> {
    if (!this.started) {
      await this.agent.subscribe(
        agentCommandTopic(this.agentId),
        { accept: (message) => this.handleCommand(message) },
        { qos: 1 }
      );
      this.started = true;
    }
    await this.agent.connect();
  }

  async stop(): Promise<void> {
    await this.agent.disconnect();
    this.handlers.clear();
  }

  /**
   * Register a command handler, returning a function that removes it.
   * Malformed commands and handler failures reach the agent's error sink;
   * a failing handler does not keep the others from running.
   */
  onCommands(handler: CommandHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  sendEvent(message: EventMessage, options: SendOptions = {}): Promise<void> {
    return this.send(EVENT_TOPIC, encodeEvent(message), options);
  }

  sendLogs(records: LogRecord[], options: SendOptions = {}): Promise<void> {
    return this.send(LOG_TOPIC, encodeLogs(records), options);
  }

  sendAgentCommandStatus(message: CommandStatusMessage, options: SendOptions = {}): Promise<void> {
    return this.send(agentCommandStatusTopic(this.agentId), encodeCommandStatus(message), options);
  }

  sendDeviceCommandStatus(
    deviceId: number,
    message: CommandStatusMessage,
    options: SendOptions = {}
  ): Promise<void> {
    return this.send(deviceCommandStatusTopic(deviceId), encodeCommandStatus(message), options);
  }

  private send(topic: string, payload: Uint8Array, options: SendOptions): Promise<void> {
    return this.agent.publish(topic, payload, {
      qos: 1,
      waitForDelivery: options.waitForDelivery,
    });
  }

  private async handleCommand(message: Message): Promise<void> {
    const command = decodeCommandMessage(message.payload);
    this.logger.debug(
      `Received command ${command.command?.id ?? '(none)'} with ${command.devices.length} device commands`
    );

    // Every handler sees the command, even when an earlier one fails
    const failures: unknown[] = [];
    for (const handler of [...this.handlers]) {
      try {
        await handler(command);
      } catch (error) {
        this.logger.warn(
          `Command handler failed: ${error instanceof Error ? error.message : String(error)}`
        );
        failures.push(error);
      }
    }

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `${failures.length} command handlers failed`);
    }
  }
}

/**
 * Build a platform client from brokerline.toml. The broker login is
 * `<client_id>_<agent_id>` with the agent token as password.
 */
export function createPlatformClient(
  config: BrokerlineConfig,
  overrides: Partial<AgentOptions> = {}
): PlatformClient {
  const platform = config.platform;
  if (!platform) {
    throw new AgentError(AgentErrorCodes.CONFIG, 'Missing [platform] section in configuration', {
      component: 'platform',
    });
  }

  const options = resolveAgentOptions(config, {
    username: platformLogin({ clientId: platform.client_id, agentId: platform.agent_id }),
    password: platform.token ?? '',
    ...overrides,
  });

  return new PlatformClient({
    agent: createAgent(options),
    agentId: platform.agent_id,
    logger: options.logger,
  });
}

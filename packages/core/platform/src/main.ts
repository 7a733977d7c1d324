/**
 * Platform agent entry point
 *
 * Connects with brokerline.toml, acknowledges incoming commands and ships
 * its own log records to the platform. With `platform.http_url` set it also
 * reads the agent config over REST and reports the agent online.
 */
import { loadAndValidateConfig } from '@brokerline/config';
import { createLogger } from '@brokerline/utils';
import {
  createPlatformClient,
  createPlatformHttpClient,
  findTag,
  PlatformLogLevel,
} from './index.js';

async function main(): Promise<void> {
  const config = loadAndValidateConfig();
  const logger = createLogger('platform', config.runtime?.log_level ?? 'info');

  const client = createPlatformClient(config, {
    onError: (error, context) => logger.error(`${context.source} error: ${error.toString()}`),
  });

  client.onCommands(async (message) => {
    const now = new Date();
    if (message.command) {
      logger.info(`Agent command ${message.command.id} received`);
      await client.sendAgentCommandStatus({
        id: message.command.id,
        status: 'received',
        timestamp: now,
      });
    }
    for (const { deviceId, command } of message.devices) {
      logger.info(`Device ${deviceId} command ${command.id} received`);
      await client.sendDeviceCommandStatus(deviceId, {
        id: command.id,
        status: 'received',
        timestamp: now,
      });
    }
  });

  try {
    await client.start();
  } catch (error) {
    // The agent keeps reconnecting in the background
    logger.warn('Initial connect failed:', error instanceof Error ? error.message : error);
  }
  await client.sendLogs([{ level: PlatformLogLevel.info, message: 'Agent started' }]);

  if (config.platform?.http_url) {
    const http = createPlatformHttpClient(config);
    const remote = await http.getConfig();
    logger.info(`Platform config ${remote.version}: ${remote.agent.devices.length} devices`);

    const statusTag = findTag(remote.agent.tag, ['$state', '$status']);
    if (statusTag) {
      await client.sendEvent({
        tags: [{ id: statusTag.id, value: 'online', timestamp: new Date() }],
      });
    } else {
      logger.warn('Agent tag tree has no $state/$status tag');
    }
  }

  const shutdown = async () => {
    await client.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error('Platform agent startup failed:', error);
    process.exit(1);
  });
}

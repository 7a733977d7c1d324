import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadAndValidateConfig } from './main.js';
import { ConfigLoadError, ConfigValidationError } from './index.js';

describe('Main Configuration Loading', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'brokerline-config-'));
    configPath = path.join(testDir, 'brokerline.toml');
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadAndValidateConfig', () => {
    it('should load, overlay, and validate config', () => {
      fs.writeFileSync(
        configPath,
        `
[agent]
client_id = "file-agent"

[broker]
endpoint = "mqtt://localhost:1883"

[publisher]
queue_capacity = 50
`
      );

      const config = loadAndValidateConfig({
        configPath,
        env: { BROKER_ENDPOINT: 'nats://localhost:4222', PUBLISHER_MAX_RETRIES: '2' },
      });

      expect(config.agent.client_id).toBe('file-agent');
      expect(config.broker.endpoint).toBe('nats://localhost:4222');
      expect(config.publisher).toEqual({ queue_capacity: 50, max_retries: 2 });
    });

    it('should skip env overlay when disabled', () => {
      fs.writeFileSync(
        configPath,
        '[agent]\nclient_id = "file-agent"\n[broker]\nendpoint = "mqtt://localhost"\n'
      );

      const config = loadAndValidateConfig({
        configPath,
        applyEnv: false,
        env: { AGENT_CLIENT_ID: 'env-agent' },
      });

      expect(config.agent.client_id).toBe('file-agent');
    });

    it('should throw ConfigLoadError when the file is missing', () => {
      expect(() => loadAndValidateConfig({ configPath, env: {} })).toThrow(ConfigLoadError);
    });

    it('should throw ConfigValidationError for invalid config', () => {
      fs.writeFileSync(configPath, '[agent]\nclient_id = "a"\n[broker]\nendpoint = "ftp://x"\n');

      expect(() => loadAndValidateConfig({ configPath, env: {} })).toThrow(ConfigValidationError);
    });
  });
});

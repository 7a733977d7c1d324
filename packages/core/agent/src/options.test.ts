import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { AgentError, AgentErrorCodes } from '@brokerline/types';
import type { BrokerlineConfig } from '@brokerline/config';
import { resolveAgentOptions } from './options.js';

const baseConfig: BrokerlineConfig = {
  agent: { client_id: 'pump-7' },
  broker: { endpoint: 'mqtts://broker.example.com:8883', username: 'pump-7', password: 'test-secret' },
};

describe('resolveAgentOptions', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'brokerline-options-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should map the broker section', () => {
    const options = resolveAgentOptions(baseConfig);

    expect(options.clientId).toBe('pump-7');
    expect(options.endpoint).toBe('mqtts://broker.example.com:8883');
    expect(options.username).toBe('pump-7');
    expect(options.password).toBe('test-secret');
    expect(options.tls).toBeUndefined();
  });

  it('should map session, publisher and call settings', () => {
    const options = resolveAgentOptions({
      ...baseConfig,
      session: { keepalive_interval_ms: 15000, backoff_base_ms: 500, backoff_max_ms: 4000 },
      publisher: { queue_capacity: 100, max_retries: 3 },
      calls: { default_timeout_ms: 2000, response_root: 'rpc/replies' },
    });

    expect(options.keepaliveIntervalMs).toBe(15000);
    expect(options.backoff).toEqual({ baseMs: 500, maxMs: 4000, jitter: undefined });
    expect(options.queueCapacity).toBe(100);
    expect(options.maxRetries).toBe(3);
    expect(options.defaultCallTimeoutMs).toBe(2000);
    expect(options.responseRoot).toBe('rpc/replies');
  });

  it('should read certificate files', () => {
    const caFile = path.join(tempDir, 'ca.pem');
    const certFile = path.join(tempDir, 'client.pem');
    const keyFile = path.join(tempDir, 'client.key');
    fs.writeFileSync(caFile, 'CA');
    fs.writeFileSync(certFile, 'CERT');
    fs.writeFileSync(keyFile, 'KEY');

    const options = resolveAgentOptions({
      ...baseConfig,
      broker: { ...baseConfig.broker, ca_file: caFile, cert_file: certFile, key_file: keyFile },
    });

    expect(options.tls).toEqual({ ca: 'CA', cert: 'CERT', key: 'KEY' });
  });

  it('should fail with a config error when a certificate is missing', () => {
    const caFile = path.join(tempDir, 'missing.pem');
    const config = { ...baseConfig, broker: { ...baseConfig.broker, ca_file: caFile } };

    expect(() => resolveAgentOptions(config)).toThrow(AgentError);
    expect(() => resolveAgentOptions(config)).toThrow(`Cannot read broker.ca_file at ${caFile}`);
    try {
      resolveAgentOptions(config);
    } catch (error) {
      expect(error).toMatchObject({ code: AgentErrorCodes.CONFIG, component: 'config' });
    }
  });

  it('should let overrides win', () => {
    const options = resolveAgentOptions(baseConfig, { clientId: 'pump-8', queueCapacity: 5 });

    expect(options.clientId).toBe('pump-8');
    expect(options.queueCapacity).toBe(5);
  });
});

import { describe, it, expect } from 'vitest';
import { loadConfig, redactExplorerUrl } from '../config/index.js';
import { ConfigError } from '../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      localRpcUrl: null,
      localRpcPort: 8080,
      remoteRpcUrl: 'https://aztec-rpc.cerberusnode.com',
      explorerApiUrl: 'https://api.testnet.aztecscan.xyz/v1',
      explorerApiKey: 'temporary-api-key',
      checkIntervalMs: 10_000,
      maxRetries: 3,
      retryDelayMs: 1_000,
      requestTimeoutMs: 5_000,
      provenSearchWindow: 20,
      reportFormat: 'text',
    });
  });

  it('reads overrides and converts seconds to milliseconds', () => {
    const config = loadConfig({
      LOCAL_RPC_URL: 'http://10.0.0.5:8080/',
      REMOTE_RPC_URL: 'https://rpc.example.test',
      EXPLORER_API_URL: 'https://explorer.example.test/v1/',
      EXPLORER_API_KEY: 'test-key',
      CHECK_INTERVAL_SEC: '2.5',
      MAX_RETRIES: '5',
      PROVEN_SEARCH_WINDOW: '50',
      REPORT_FORMAT: 'json',
    });

    expect(config.localRpcUrl).toBe('http://10.0.0.5:8080');
    expect(config.remoteRpcUrl).toBe('https://rpc.example.test');
    expect(config.explorerApiUrl).toBe('https://explorer.example.test/v1');
    expect(config.explorerApiKey).toBe('test-key');
    expect(config.checkIntervalMs).toBe(2_500);
    expect(config.maxRetries).toBe(5);
    expect(config.provenSearchWindow).toBe(50);
    expect(config.reportFormat).toBe('json');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ LOCAL_RPC_URL: '  ', EXPLORER_API_KEY: '' }).localRpcUrl).toBeNull();
    expect(loadConfig({ EXPLORER_API_KEY: '' }).explorerApiKey).toBe('temporary-api-key');
  });

  it('rejects non-numeric counts', () => {
    expect(() => loadConfig({ MAX_RETRIES: 'three' })).toThrow(ConfigError);
  });

  it('rejects non-http URLs', () => {
    expect(() => loadConfig({ REMOTE_RPC_URL: 'ftp://rpc.example.test' })).toThrow(/remoteRpcUrl/);
  });

  it('rejects unknown report formats', () => {
    expect(() => loadConfig({ REPORT_FORMAT: 'xml' })).toThrow(/reportFormat/);
  });

  it('rejects a zero search window', () => {
    expect(() => loadConfig({ PROVEN_SEARCH_WINDOW: '0' })).toThrow(/provenSearchWindow/);
  });
});

describe('redactExplorerUrl', () => {
  it('never includes the API key', () => {
    const config = loadConfig({ EXPLORER_API_KEY: 'test-key' });
    expect(redactExplorerUrl(config)).toBe('https://api.testnet.aztecscan.xyz/v1/<api-key>');
  });
});

#!/usr/bin/env node
import { loadConfig, redactExplorerUrl } from './config/index.js';
import { createModuleLogger } from './utils/logger.js';
import { ConfigError, describeError, isAbortError } from './utils/errors.js';
import { resolveLocalEndpoint } from './utils/port-detect.js';
import { NodeRpcClient } from './sources/node-rpc-client.js';
import { ExplorerClient } from './sources/explorer-client.js';
import { ProvenHeightResolver } from './resolver/proven-height-resolver.js';
import { RemoteHeightResolver } from './resolver/remote-height.js';
import { SyncMonitor } from './monitor/sync-monitor.js';
import type { AppConfig } from './types/index.js';

const log = createModuleLogger('supervisor');

function createMonitor(config: AppConfig, localEndpoint: string): SyncMonitor {
  const local = new NodeRpcClient({
    endpoint: localEndpoint,
    timeoutMs: config.requestTimeoutMs,
    stage: 'local',
    parseMode: 'lenient',
  });
  const primary = new NodeRpcClient({
    endpoint: config.remoteRpcUrl,
    timeoutMs: config.requestTimeoutMs,
    stage: 'primary',
  });
  const explorer = new ExplorerClient({
    apiUrl: config.explorerApiUrl,
    apiKey: config.explorerApiKey,
    timeoutMs: config.requestTimeoutMs,
  });

  return new SyncMonitor({
    local,
    remote: new RemoteHeightResolver(primary, new ProvenHeightResolver(explorer, config.provenSearchWindow)),
    checkIntervalMs: config.checkIntervalMs,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    reportFormat: config.reportFormat,
  });
}

function stopGracefully(): never {
  log.info('Sync check stopped by user');
  process.exit(0);
}

// ─── Main Entry Point ────────────────────────────────────────
async function main(): Promise<void> {
  const config = loadConfig();

  const controller = new AbortController();

  // Handle graceful shutdown
  const stop = (sig: NodeJS.Signals) => {
    log.info(`Received ${sig}`);
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  process.on('unhandledRejection', (err) => {
    log.error('Unhandled rejection', { error: String(err) });
  });

  let localEndpoint: string;
  try {
    localEndpoint = await resolveLocalEndpoint(config, { signal: controller.signal });
  } catch (err) {
    if (isAbortError(err) || controller.signal.aborted) stopGracefully();
    throw err;
  }
  const monitor = createMonitor(config, localEndpoint);

  log.info('Starting Aztec node sync monitor...');
  log.info(`Local RPC: ${localEndpoint}`);
  log.info(`Remote RPC: ${config.remoteRpcUrl}`);
  log.info(`Fallback API: AztecScan (${redactExplorerUrl(config)})`);
  log.info(`Check interval: ${config.checkIntervalMs / 1000}s`);

  await monitor.run(controller.signal);
  stopGracefully();
}

main().catch((err) => {
  if (isAbortError(err)) stopGracefully();
  if (err instanceof ConfigError) {
    log.error(err.message);
  } else {
    log.error('Fatal error', { error: describeError(err) });
  }
  process.exit(1);
});

import net from 'net';
import { createInterface } from 'readline/promises';
import { PORT_PROBE_TIMEOUT_MS } from '../config/constants.js';
import { createModuleLogger } from './logger.js';
import type { AppConfig } from '../types/index.js';

const log = createModuleLogger('port-detect');

/** True when something accepts TCP connections on host:port within the timeout. */
export function probePort(port: number, host: string = '127.0.0.1', timeoutMs: number = PORT_PROBE_TIMEOUT_MS): Promise<boolean> {
  return new Promise(resolve => {
    const socket = net.createConnection({ port, host });
    const finish = (open: boolean) => {
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

export type PortPrompt = (defaultPort: number, signal?: AbortSignal) => Promise<string>;

async function promptForPort(defaultPort: number, signal?: AbortSignal): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const question = `Please enter your local Aztec RPC port (or press Enter for ${defaultPort}): `;
    return await rl.question(question, { signal });
  } finally {
    rl.close();
  }
}

export function parsePortAnswer(answer: string, defaultPort: number): number {
  const trimmed = answer.trim();
  if (trimmed === '') return defaultPort;
  const port = Number(trimmed);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    log.warn(`"${trimmed}" is not a valid port, using ${defaultPort}`);
    return defaultPort;
  }
  return port;
}

export interface LocalEndpointOptions {
  probe?: (port: number) => Promise<boolean>;
  prompt?: PortPrompt;
  interactive?: boolean;
  /** Aborts a pending prompt; Ctrl+C at the prompt rejects with an AbortError. */
  signal?: AbortSignal;
}

/**
 * LOCAL_RPC_URL wins when set. Otherwise probe the default port on localhost,
 * and ask on a TTY when nothing is listening there.
 */
export async function resolveLocalEndpoint(
  config: Pick<AppConfig, 'localRpcUrl' | 'localRpcPort'>,
  options: LocalEndpointOptions = {},
): Promise<string> {
  if (config.localRpcUrl) return config.localRpcUrl;

  const probe = options.probe ?? (port => probePort(port));
  const prompt = options.prompt ?? promptForPort;
  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);
  const port = config.localRpcPort;

  if (await probe(port)) {
    log.info(`Detected app running on port ${port}`);
    return `http://localhost:${port}`;
  }

  log.warn(`No app found on port ${port}`);
  if (!interactive) return `http://localhost:${port}`;

  const chosen = parsePortAnswer(await prompt(port, options.signal), port);
  return `http://localhost:${chosen}`;
}

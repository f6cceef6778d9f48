import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import {
  CHECK_INTERVAL_SEC,
  DEFAULT_EXPLORER_API,
  DEFAULT_EXPLORER_API_KEY,
  DEFAULT_LOCAL_PORT,
  DEFAULT_REMOTE_RPC,
  MAX_RETRIES,
  PROVEN_SEARCH_WINDOW,
  REQUEST_TIMEOUT_SEC,
  RETRY_DELAY_SEC,
} from './constants.js';
import { ConfigError } from '../utils/errors.js';
import type { AppConfig } from '../types/index.js';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

type EnvSource = Record<string, string | undefined>;

function env(source: EnvSource, key: string, fallback: string): string {
  const val = source[key];
  return val === undefined || val.trim() === '' ? fallback : val.trim();
}

function envNum(source: EnvSource, key: string, fallback: number): number {
  const val = source[key];
  return val ? parseFloat(val) : fallback;
}

const httpUrl = z
  .string()
  .url()
  .refine(u => u.startsWith('http://') || u.startsWith('https://'), 'must be an http(s) URL');

const ConfigSchema = z.object({
  localRpcUrl: httpUrl.nullable(),
  localRpcPort: z.number().int().min(1).max(65535),
  remoteRpcUrl: httpUrl,
  explorerApiUrl: httpUrl,
  explorerApiKey: z.string().min(1),
  checkIntervalMs: z.number().int().positive(),
  maxRetries: z.number().int().min(1),
  retryDelayMs: z.number().int().nonnegative(),
  requestTimeoutMs: z.number().int().positive(),
  provenSearchWindow: z.number().int().min(1),
  reportFormat: z.enum(['text', 'json']),
});

/**
 * Build the monitor config from environment variables (after `.env` is loaded).
 * Throws ConfigError listing every invalid setting; the caller treats that as fatal.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const localRpcUrl = env(source, 'LOCAL_RPC_URL', '');

  const candidate = {
    localRpcUrl: localRpcUrl === '' ? null : localRpcUrl.replace(/\/+$/, ''),
    localRpcPort: envNum(source, 'LOCAL_RPC_PORT', DEFAULT_LOCAL_PORT),
    remoteRpcUrl: env(source, 'REMOTE_RPC_URL', DEFAULT_REMOTE_RPC),
    explorerApiUrl: env(source, 'EXPLORER_API_URL', DEFAULT_EXPLORER_API).replace(/\/+$/, ''),
    explorerApiKey: env(source, 'EXPLORER_API_KEY', DEFAULT_EXPLORER_API_KEY),
    checkIntervalMs: Math.round(envNum(source, 'CHECK_INTERVAL_SEC', CHECK_INTERVAL_SEC) * 1000),
    maxRetries: envNum(source, 'MAX_RETRIES', MAX_RETRIES),
    retryDelayMs: Math.round(envNum(source, 'RETRY_DELAY_SEC', RETRY_DELAY_SEC) * 1000),
    requestTimeoutMs: Math.round(envNum(source, 'REQUEST_TIMEOUT_SEC', REQUEST_TIMEOUT_SEC) * 1000),
    provenSearchWindow: envNum(source, 'PROVEN_SEARCH_WINDOW', PROVEN_SEARCH_WINDOW),
    reportFormat: env(source, 'REPORT_FORMAT', 'text'),
  };

  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return parsed.data;
}

/** Explorer URL with the API key path segment masked, for logs. */
export function redactExplorerUrl(config: Pick<AppConfig, 'explorerApiUrl'>): string {
  return `${config.explorerApiUrl}/<api-key>`;
}

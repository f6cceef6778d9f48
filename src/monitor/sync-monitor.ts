import { setTimeout as delay } from 'timers/promises';
import { classifySync } from '../analysis/sync-status.js';
import { RunningStats } from './running-stats.js';
import { SOURCE_TAGS, buildReport, renderReportJson, renderReportLines } from './report.js';
import { formatHeight, formatTimestamp } from '../utils/format.js';
import { createModuleLogger } from '../utils/logger.js';
import type { SyncCheckError } from '../utils/errors.js';
import type {
  CycleReport,
  Height,
  MonitorState,
  ProvenTipSource,
  RemoteResolution,
  ReportFormat,
  SourceFailure,
  StatsSnapshot,
  SyncSnapshot,
} from '../types/index.js';

const log = createModuleLogger('monitor');

export interface RemoteSource {
  resolve(signal?: AbortSignal): Promise<RemoteResolution>;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface SyncMonitorOptions {
  local: ProvenTipSource;
  remote: RemoteSource;
  checkIntervalMs: number;
  maxRetries: number;
  retryDelayMs: number;
  reportFormat?: ReportFormat;
  sleep?: Sleeper;
  now?: () => Date;
  /** Receives rendered report lines; stdout by default. */
  output?: (line: string) => void;
}

const defaultSleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Periodic local-vs-remote proven height check.
 *
 * Each completed cycle writes its report to `output`. Aborting the
 * signal passed to `run()` stops at the next network call or sleep without
 * finishing the cycle in progress.
 */
export class SyncMonitor {
  private readonly local: ProvenTipSource;
  private readonly remote: RemoteSource;
  private readonly checkIntervalMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly reportFormat: ReportFormat;
  private readonly sleep: Sleeper;
  private readonly now: () => Date;
  private readonly output: (line: string) => void;
  private readonly stats = new RunningStats();
  private state: MonitorState = 'idle';

  constructor(options: SyncMonitorOptions) {
    this.local = options.local;
    this.remote = options.remote;
    this.checkIntervalMs = options.checkIntervalMs;
    this.maxRetries = Math.max(1, options.maxRetries);
    this.retryDelayMs = options.retryDelayMs;
    this.reportFormat = options.reportFormat ?? 'text';
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.output = options.output ?? (line => console.log(line));
  }

  getState(): MonitorState {
    return this.state;
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  /** Loops until `signal` is aborted. Resolves (never rejects) on cancellation. */
  async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.runCycle(signal);

        this.state = 'sleeping';
        log.info(`Next check in ${this.checkIntervalMs / 1000} seconds... (Press Ctrl+C to stop)`);
        await this.sleep(this.checkIntervalMs, signal);
      }
    } catch (err) {
      if (!signal.aborted) throw err;
    } finally {
      this.state = signal.aborted ? 'cancelled' : 'idle';
    }
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    this.state = 'polling';
    const checkNumber = this.stats.beginCheck();
    const timestamp = this.now();
    log.info(`Check #${checkNumber} - ${formatTimestamp(timestamp)}`);

    const failures: SourceFailure[] = [];

    const localHeight = await this.queryLocal(failures, signal);
    if (localHeight === null) {
      log.error(`Local node not responding after ${this.maxRetries} retries. Please check if ${this.local.label} is running`);
      this.stats.recordError();
    }

    const resolution = await this.remote.resolve(signal);
    signal?.throwIfAborted();
    failures.push(...resolution.failures);

    const { remote } = resolution;
    if (remote.height === null) {
      log.error('All remote sources failed', { failures: resolution.failures.length });
      this.stats.recordError();
    } else {
      log.info(`Got remote block from ${SOURCE_TAGS[remote.source]}: ${formatHeight(remote.height)}`);
    }

    const state = classifySync(localHeight, remote.height);
    if (state.status === 'synced') this.stats.resetErrors();
    this.stats.recordSource(remote.source);

    const snapshot: SyncSnapshot = Object.freeze({
      checkNumber,
      localHeight,
      remoteHeight: remote.height,
      remoteSource: remote.source,
      timestamp,
    });

    const report = buildReport(snapshot, state, this.stats.snapshot(), failures);
    this.publish(report);
    return report;
  }

  private async queryLocal(failures: SourceFailure[], signal?: AbortSignal): Promise<Height> {
    let lastError: SyncCheckError | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const result = await this.local.getProvenHeight(signal);
      signal?.throwIfAborted();
      if (result.ok) return result.value;

      lastError = result.error;
      if (attempt < this.maxRetries) {
        log.warn(`Local node retry ${attempt}/${this.maxRetries}...`, { error: result.error.message });
        await this.sleep(this.retryDelayMs, signal);
      }
    }

    if (lastError) failures.push({ stage: lastError.stage, message: lastError.message });
    return null;
  }

  private publish(report: CycleReport): void {
    if (this.reportFormat === 'json') {
      this.output(renderReportJson(report));
    } else {
      for (const line of renderReportLines(report)) this.output(line);
    }
  }
}

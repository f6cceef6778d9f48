import type { SyncCheckError } from '../utils/errors.js';

// ─── Heights ──────────────────────────────────────────────────
/** Block number, or `null` when it could not be determined. Never 0 as a stand-in. */
export type Height = number | null;

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// ─── Sources ──────────────────────────────────────────────────
export type SourceIdentity = 'primary' | 'fallback' | 'none';

export type RemoteHeight =
  | { height: number; source: 'primary' | 'fallback' }
  | { height: null; source: 'none' };

/** Anything that can report a node's proven L2 tip. */
export interface ProvenTipSource {
  readonly label: string;
  getProvenHeight(signal?: AbortSignal): Promise<Result<number, SyncCheckError>>;
}

export interface BlockSummary {
  height: number;
  blockStatus: number;
}

/** One `from`/`to` page of explorer blocks. */
export interface BlockPageSource {
  fetchPage(from: number, to: number, signal?: AbortSignal): Promise<Result<BlockSummary[], SyncCheckError>>;
}

export interface SourceFailure {
  stage: SyncCheckError['stage'];
  message: string;
}

export interface RemoteResolution {
  remote: RemoteHeight;
  failures: SourceFailure[];
}

// ─── Classification ───────────────────────────────────────────
export type Milestone = 'near-complete' | 'good-progress';

export type SyncState =
  | { status: 'unknown' }
  | { status: 'synced' }
  | { status: 'ahead'; lead: number }
  | {
      status: 'syncing';
      /** Percent in hundredths, truncated (9020 = 90.20%). Null when remote is 0. */
      progressHundredths: number | null;
      milestone: Milestone | null;
      remaining: number;
    }
  | { status: 'invalid-data'; reason: string };

// ─── Monitor ──────────────────────────────────────────────────
export interface SyncSnapshot {
  readonly checkNumber: number;
  readonly localHeight: Height;
  readonly remoteHeight: Height;
  readonly remoteSource: SourceIdentity;
  readonly timestamp: Date;
}

export type MonitorState = 'idle' | 'polling' | 'sleeping' | 'cancelled';
export type CycleOutcome = 'success' | 'partial-failure' | 'total-failure';

export interface StatsSnapshot {
  totalChecks: number;
  errorChecks: number;
  successfulChecks: number;
  successRate: number;
  lastSource: SourceIdentity;
}

export interface CycleReport {
  snapshot: SyncSnapshot;
  state: SyncState;
  outcome: CycleOutcome;
  stats: StatsSnapshot;
  failures: SourceFailure[];
  display: {
    local: string;
    remote: string;
    source: string;
    progress: string;
  };
}

export type ReportFormat = 'text' | 'json';

export interface AppConfig {
  localRpcUrl: string | null;
  localRpcPort: number;
  remoteRpcUrl: string;
  explorerApiUrl: string;
  explorerApiKey: string;
  checkIntervalMs: number;
  maxRetries: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
  provenSearchWindow: number;
  reportFormat: ReportFormat;
}

import { formatHeight, formatPercent, formatTimestamp, progressHundredths } from '../utils/format.js';
import type {
  CycleOutcome,
  CycleReport,
  SourceFailure,
  SourceIdentity,
  StatsSnapshot,
  SyncSnapshot,
  SyncState,
} from '../types/index.js';

export const SOURCE_TAGS: Record<SourceIdentity, string> = {
  primary: 'RPC',
  fallback: 'AztecScan',
  none: 'None',
};

export function cycleOutcome(snapshot: SyncSnapshot): CycleOutcome {
  const known = [snapshot.localHeight, snapshot.remoteHeight].filter(h => h !== null).length;
  if (known === 2) return 'success';
  return known === 1 ? 'partial-failure' : 'total-failure';
}

export function buildReport(
  snapshot: SyncSnapshot,
  state: SyncState,
  stats: StatsSnapshot,
  failures: SourceFailure[],
): CycleReport {
  return {
    snapshot,
    state,
    outcome: cycleOutcome(snapshot),
    stats,
    failures,
    display: {
      local: formatHeight(snapshot.localHeight),
      remote: formatHeight(snapshot.remoteHeight),
      source: SOURCE_TAGS[snapshot.remoteSource],
      progress: formatPercent(progressHundredths(snapshot.localHeight, snapshot.remoteHeight)),
    },
  };
}

function statusLines(report: CycleReport): string[] {
  const { state, display, stats } = report;

  switch (state.status) {
    case 'unknown':
      return [
        'Cannot determine sync status due to connection errors',
        `Error count: ${stats.errorChecks} (out of ${stats.totalChecks} checks)`,
      ];
    case 'invalid-data':
      return [`Invalid block numbers received: ${state.reason}`];
    case 'synced':
      return ['Your node is fully synced!'];
    case 'ahead':
      return [`Your node is ahead of the remote by ${formatHeight(state.lead)} blocks (local: ${display.local}, remote: ${display.remote})`];
    case 'syncing': {
      const lines = [`Still syncing... (${display.local} / ${display.remote}, ${formatHeight(state.remaining)} to go)`];
      if (state.milestone === 'near-complete') lines.push('Almost there! More than 90% synced!');
      if (state.milestone === 'good-progress') lines.push('Good progress! More than 50% synced!');
      return lines;
    }
  }
}

/** Human-readable block for one cycle. */
export function renderReportLines(report: CycleReport): string[] {
  const { snapshot, display, stats } = report;
  const lines = [
    `Sync Status (check #${snapshot.checkNumber} at ${formatTimestamp(snapshot.timestamp)}):`,
    `   Local block:  ${display.local}`,
    `   Remote block: ${display.remote} (via ${display.source})`,
  ];
  if (display.progress !== 'N/A') {
    lines.push(`   Progress:     ${display.progress}%`);
  }
  for (const failure of report.failures) {
    lines.push(`   ! ${failure.stage}: ${failure.message}`);
  }

  lines.push(...statusLines(report).map(l => `   ${l}`));

  lines.push(
    'Statistics:',
    `   Successful checks: ${stats.successfulChecks}`,
    `   Error count: ${stats.errorChecks}`,
    `   Success rate: ${stats.successRate}%`,
    `   Last remote source: ${SOURCE_TAGS[stats.lastSource]}`,
  );
  return lines;
}

/** One JSON line per cycle for machine consumers. */
export function renderReportJson(report: CycleReport): string {
  return JSON.stringify({
    check: report.snapshot.checkNumber,
    timestamp: report.snapshot.timestamp.toISOString(),
    local: report.snapshot.localHeight,
    remote: report.snapshot.remoteHeight,
    source: report.snapshot.remoteSource,
    status: report.state.status,
    progress: report.display.progress === 'N/A' ? null : report.display.progress,
    milestone: report.state.status === 'syncing' ? report.state.milestone : null,
    outcome: report.outcome,
    failures: report.failures,
    stats: report.stats,
  });
}

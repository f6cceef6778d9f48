import { describe, it, expect } from 'vitest';
import { buildReport, cycleOutcome, renderReportLines } from '../monitor/report.js';
import { classifySync } from '../analysis/sync-status.js';
import type { StatsSnapshot, SyncSnapshot } from '../types/index.js';

const TIMESTAMP = new Date(2026, 0, 2, 3, 4, 5);

function snapshot(overrides: Partial<SyncSnapshot> = {}): SyncSnapshot {
  return {
    checkNumber: 3,
    localHeight: 450,
    remoteHeight: 500,
    remoteSource: 'fallback',
    timestamp: TIMESTAMP,
    ...overrides,
  };
}

const STATS: StatsSnapshot = {
  totalChecks: 3,
  errorChecks: 1,
  successfulChecks: 2,
  successRate: 66,
  lastSource: 'fallback',
};

describe('cycleOutcome', () => {
  it('classifies by how many heights are known', () => {
    expect(cycleOutcome(snapshot())).toBe('success');
    expect(cycleOutcome(snapshot({ localHeight: null }))).toBe('partial-failure');
    expect(cycleOutcome(snapshot({ remoteHeight: null, remoteSource: 'none' }))).toBe('partial-failure');
    expect(cycleOutcome(snapshot({ localHeight: null, remoteHeight: null, remoteSource: 'none' }))).toBe('total-failure');
  });
});

describe('renderReportLines', () => {
  it('renders a syncing cycle with failures and statistics', () => {
    const snap = snapshot();
    const report = buildReport(snap, classifySync(450, 500), STATS, [
      { stage: 'primary', message: 'request to http://rpc.test failed: boom' },
    ]);

    expect(renderReportLines(report)).toEqual([
      'Sync Status (check #3 at 2026-01-02 03:04:05):',
      '   Local block:  450',
      '   Remote block: 500 (via AztecScan)',
      '   Progress:     90.00%',
      '   ! primary: request to http://rpc.test failed: boom',
      '   Still syncing... (450 / 500, 50 to go)',
      '   Good progress! More than 50% synced!',
      'Statistics:',
      '   Successful checks: 2',
      '   Error count: 1',
      '   Success rate: 66%',
      '   Last remote source: AztecScan',
    ]);
  });

  it('omits progress and explains unknown state', () => {
    const snap = snapshot({ localHeight: null });
    const report = buildReport(snap, classifySync(null, 500), STATS, []);

    const lines = renderReportLines(report);

    expect(lines.slice(0, 5)).toEqual([
      'Sync Status (check #3 at 2026-01-02 03:04:05):',
      '   Local block:  N/A',
      '   Remote block: 500 (via AztecScan)',
      '   Cannot determine sync status due to connection errors',
      '   Error count: 1 (out of 3 checks)',
    ]);
  });

  it('shows the lead when the node is ahead', () => {
    const snap = snapshot({ localHeight: 1500, remoteHeight: 1200, remoteSource: 'primary' });
    const report = buildReport(snap, classifySync(1500, 1200), STATS, []);

    const lines = renderReportLines(report);

    expect(report.display.progress).toBe('125.00');
    expect(lines[4]).toBe('   Your node is ahead of the remote by 300 blocks (local: 1,500, remote: 1,200)');
  });

  it('celebrates near completion', () => {
    const snap = snapshot({ localHeight: 999, remoteHeight: 1000 });
    const report = buildReport(snap, classifySync(999, 1000), STATS, []);

    const lines = renderReportLines(report);

    expect(lines[3]).toBe('   Progress:     99.90%');
    expect(lines[5]).toBe('   Almost there! More than 90% synced!');
  });

  it('confirms a synced node', () => {
    const snap = snapshot({ localHeight: 500, remoteHeight: 500 });
    const report = buildReport(snap, classifySync(500, 500), STATS, []);

    expect(renderReportLines(report)[4]).toBe('   Your node is fully synced!');
  });
});

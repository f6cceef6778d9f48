import { successRate } from '../utils/format.js';
import type { SourceIdentity, StatsSnapshot } from '../types/index.js';

/**
 * Counters for the lifetime of the process. Written only by the monitor loop,
 * once per cycle; there is no reset other than a restart (and the error reset
 * that follows a synced result).
 */
export class RunningStats {
  private totalChecks = 0;
  private errorChecks = 0;
  private lastSource: SourceIdentity = 'none';

  beginCheck(): number {
    this.totalChecks++;
    return this.totalChecks;
  }

  recordError(): void {
    this.errorChecks++;
  }

  resetErrors(): void {
    this.errorChecks = 0;
  }

  recordSource(source: SourceIdentity): void {
    this.lastSource = source;
  }

  snapshot(): StatsSnapshot {
    return {
      totalChecks: this.totalChecks,
      errorChecks: this.errorChecks,
      successfulChecks: this.totalChecks - this.errorChecks,
      successRate: successRate(this.totalChecks, this.errorChecks),
      lastSource: this.lastSource,
    };
  }
}

import { createModuleLogger } from '../utils/logger.js';
import type { SyncCheckError } from '../utils/errors.js';
import type { ProvenTipSource, RemoteResolution, Result, SourceFailure } from '../types/index.js';

const log = createModuleLogger('remote');

/** The backward explorer search, as seen by the fallback chain. */
export interface ProvenSearch {
  resolve(signal?: AbortSignal): Promise<Result<number, SyncCheckError>>;
}

/**
 * Primary RPC once, then the explorer search. Strictly sequential: the explorer
 * is only contacted after the primary has fully failed.
 */
export class RemoteHeightResolver {
  private readonly primary: ProvenTipSource;
  private readonly fallback: ProvenSearch;

  constructor(primary: ProvenTipSource, fallback: ProvenSearch) {
    this.primary = primary;
    this.fallback = fallback;
  }

  async resolve(signal?: AbortSignal): Promise<RemoteResolution> {
    const failures: SourceFailure[] = [];

    log.info(`Trying ${this.primary.label}`);
    const primary = await this.primary.getProvenHeight(signal);
    if (primary.ok) {
      return { remote: { height: primary.value, source: 'primary' }, failures };
    }
    failures.push({ stage: primary.error.stage, message: primary.error.message });
    signal?.throwIfAborted();

    log.warn('Remote RPC failed, trying AztecScan fallback', { error: primary.error.message });
    const fallback = await this.fallback.resolve(signal);
    if (fallback.ok) {
      return { remote: { height: fallback.value, source: 'fallback' }, failures };
    }
    failures.push({ stage: fallback.error.stage, message: fallback.error.message });

    return { remote: { height: null, source: 'none' }, failures };
  }
}

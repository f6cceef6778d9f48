import { BlockStatus, PROVEN_SEARCH_WINDOW } from '../config/constants.js';
import { FetchError, ResolutionExhaustedError, type SyncCheckError } from '../utils/errors.js';
import { createModuleLogger } from '../utils/logger.js';
import type { BlockPageSource, BlockSummary, Result } from '../types/index.js';

const log = createModuleLogger('proven-resolver');

/**
 * Newest proven block in a page, or null. Entries are ordered by height
 * descending first so "first match" is the highest proven height.
 */
export function highestProven(blocks: BlockSummary[]): number | null {
  const descending = [...blocks].sort((a, b) => b.height - a.height);
  const match = descending.find(b => b.blockStatus === BlockStatus.PROVEN);
  return match ? match.height : null;
}

/**
 * Walks the explorer backwards from the chain tip in fixed windows and returns
 * the highest proven block of the first window that contains one. Later (lower)
 * windows are never consulted once a window hits, even if proven blocks are not
 * a contiguous suffix of the chain.
 */
export class ProvenHeightResolver {
  private readonly source: BlockPageSource;
  private readonly windowSize: number;

  constructor(source: BlockPageSource, windowSize: number = PROVEN_SEARCH_WINDOW) {
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`window size must be a positive integer, got ${windowSize}`);
    }
    this.source = source;
    this.windowSize = windowSize;
  }

  async resolve(signal?: AbortSignal): Promise<Result<number, SyncCheckError>> {
    const tipPage = await this.source.fetchPage(0, 0, signal);
    if (!tipPage.ok) return tipPage;

    const tip = tipPage.value.at(0)?.height;
    if (tip === undefined) {
      return { ok: false, error: new FetchError('explorer', 'tip page is empty') };
    }

    let current = tip;
    let pages = 0;

    while (current >= 0) {
      signal?.throwIfAborted();

      const from = Math.max(0, current - this.windowSize + 1);
      const page = await this.source.fetchPage(from, current, signal);
      pages++;
      if (!page.ok) return page;

      const proven = highestProven(page.value);
      if (proven !== null) {
        log.debug('Proven block found', { tip, height: proven, pages });
        return { ok: true, value: proven };
      }

      current = from - 1;
    }

    log.warn('Backward search exhausted without a proven block', { tip, pages });
    return { ok: false, error: new ResolutionExhaustedError(tip, pages) };
  }
}

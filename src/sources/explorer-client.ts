import axios from 'axios';
import { z } from 'zod';
import { EXPLORER_BLOCKS_PATH } from '../config/constants.js';
import { FetchError, ParseError, describeError } from '../utils/errors.js';
import { parseHeightField } from '../utils/height.js';
import { createModuleLogger } from '../utils/logger.js';
import type { BlockPageSource, BlockSummary, Result } from '../types/index.js';

const log = createModuleLogger('explorer');

const BlockRowSchema = z.object({
  height: z.union([z.number(), z.string()]),
  blockStatus: z.number().int(),
});

const BlocksPageSchema = z.array(BlockRowSchema);

export interface ExplorerClientOptions {
  apiUrl: string;
  apiKey: string;
  timeoutMs: number;
}

/**
 * AztecScan `blocks-for-table` endpoint. The API key is a path segment,
 * so the full URL must never be logged.
 */
export class ExplorerClient implements BlockPageSource {
  private readonly blocksUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ExplorerClientOptions) {
    this.blocksUrl = `${options.apiUrl}/${encodeURIComponent(options.apiKey)}/${EXPLORER_BLOCKS_PATH}`;
    this.timeoutMs = options.timeoutMs;
  }

  async fetchPage(from: number, to: number, signal?: AbortSignal): Promise<Result<BlockSummary[], FetchError | ParseError>> {
    let data: unknown;
    try {
      const resp = await axios.get<unknown>(this.blocksUrl, {
        params: { from, to },
        timeout: this.timeoutMs,
        signal,
      });
      data = resp.data;
    } catch (err) {
      log.debug('Explorer page failed', { from, to, error: describeError(err) });
      return { ok: false, error: new FetchError('explorer', `blocks page ${from}-${to} failed: ${describeError(err)}`, { cause: err }) };
    }

    const parsed = BlocksPageSchema.safeParse(data);
    if (!parsed.success) {
      return { ok: false, error: new FetchError('explorer', `blocks page ${from}-${to} is not a block list`) };
    }

    const blocks: BlockSummary[] = [];
    for (const row of parsed.data) {
      const height = parseHeightField(row.height);
      if (height === null) {
        return { ok: false, error: new ParseError('explorer', `block height ${JSON.stringify(row.height)} is not a block number`) };
      }
      blocks.push({ height, blockStatus: row.blockStatus });
    }

    log.debug('Explorer page fetched', { from, to, blocks: blocks.length });
    return { ok: true, value: blocks };
  }
}

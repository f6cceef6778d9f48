import axios from 'axios';
import { z } from 'zod';
import { L2_TIPS_REQUEST } from '../config/constants.js';
import { FetchError, ParseError, describeError, type ErrorStage } from '../utils/errors.js';
import { parseHeightField, type HeightParseMode } from '../utils/height.js';
import { createModuleLogger } from '../utils/logger.js';
import type { ProvenTipSource, Result } from '../types/index.js';

const log = createModuleLogger('node-rpc');

const RpcEnvelopeSchema = z.object({
  result: z.unknown().optional(),
  error: z.unknown().optional(),
});

const L2TipsResultSchema = z.object({
  proven: z.object({
    number: z.unknown(),
  }),
});

export interface NodeRpcClientOptions {
  endpoint: string;
  timeoutMs: number;
  /** Stage reported on failures: the local node or the remote primary. */
  stage: Extract<ErrorStage, 'local' | 'primary'>;
  /** Lenient parsing strips decorations like thousands separators from the height. */
  parseMode?: HeightParseMode;
}

/**
 * Reads the proven L2 tip from an Aztec node via `node_getL2Tips`.
 * One POST per call; retry policy belongs to the caller.
 */
export class NodeRpcClient implements ProvenTipSource {
  readonly label: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly stage: 'local' | 'primary';
  private readonly parseMode: HeightParseMode;

  constructor(options: NodeRpcClientOptions) {
    this.endpoint = options.endpoint;
    this.timeoutMs = options.timeoutMs;
    this.stage = options.stage;
    this.parseMode = options.parseMode ?? 'strict';
    this.label = `${options.stage === 'local' ? 'local node' : 'remote RPC'} ${options.endpoint}`;
  }

  async getProvenHeight(signal?: AbortSignal): Promise<Result<number, FetchError | ParseError>> {
    let body: string;
    try {
      const resp = await axios.post<string>(this.endpoint, L2_TIPS_REQUEST, {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.timeoutMs,
        responseType: 'text',
        signal,
      });
      body = typeof resp.data === 'string' ? resp.data : '';
    } catch (err) {
      return this.fail(new FetchError(this.stage, `request to ${this.endpoint} failed: ${describeError(err)}`, { cause: err }));
    }

    if (body.trim() === '') {
      return this.fail(new FetchError(this.stage, `empty response from ${this.endpoint}`));
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      return this.fail(new FetchError(this.stage, `malformed JSON from ${this.endpoint}`, { cause: err }));
    }

    const envelope = RpcEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      return this.fail(new FetchError(this.stage, `unexpected JSON-RPC envelope from ${this.endpoint}`));
    }
    if (envelope.data.error !== undefined && envelope.data.error !== null) {
      return this.fail(new FetchError(this.stage, `node returned error: ${rpcErrorMessage(envelope.data.error)}`));
    }

    const tips = L2TipsResultSchema.safeParse(envelope.data.result);
    if (!tips.success) {
      return this.fail(new ParseError(this.stage, 'response has no result.proven.number'));
    }

    const height = parseHeightField(tips.data.proven.number, this.parseMode);
    if (height === null) {
      return this.fail(
        new ParseError(this.stage, `result.proven.number is not a block number: ${JSON.stringify(tips.data.proven.number)}`),
      );
    }

    log.debug('Proven tip received', { stage: this.stage, height });
    return { ok: true, value: height };
  }

  private fail<E extends FetchError | ParseError>(error: E): Result<number, E> {
    log.debug('Proven tip unavailable', { stage: this.stage, error: error.message });
    return { ok: false, error };
  }
}

function rpcErrorMessage(error: unknown): string {
  const parsed = z.object({ message: z.string() }).safeParse(error);
  return parsed.success ? parsed.data.message : JSON.stringify(error);
}

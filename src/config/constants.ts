// ─── Upstream Defaults ───────────────────────────────────────
export const DEFAULT_REMOTE_RPC = 'https://aztec-rpc.cerberusnode.com';
export const DEFAULT_EXPLORER_API = 'https://api.testnet.aztecscan.xyz/v1';
export const DEFAULT_EXPLORER_API_KEY = 'temporary-api-key';
export const EXPLORER_BLOCKS_PATH = 'l2/ui/blocks-for-table';

// ─── JSON-RPC ────────────────────────────────────────────────
export const L2_TIPS_REQUEST = {
  jsonrpc: '2.0',
  method: 'node_getL2Tips',
  params: [],
  id: 1,
} as const;

// ─── Explorer Block Lifecycle ────────────────────────────────
export const BlockStatus = {
  PROVEN: 4,
} as const;

// ─── Monitor Defaults ────────────────────────────────────────
export const DEFAULT_LOCAL_PORT = 8080;
export const CHECK_INTERVAL_SEC = 10;
export const MAX_RETRIES = 3;
export const RETRY_DELAY_SEC = 1;
export const REQUEST_TIMEOUT_SEC = 5;
export const PROVEN_SEARCH_WINDOW = 20;
export const PORT_PROBE_TIMEOUT_MS = 1000;

// ─── Milestones (integer percent, strict >) ──────────────────
export const NEAR_COMPLETE_ABOVE_PCT = 90;
export const GOOD_PROGRESS_ABOVE_PCT = 50;

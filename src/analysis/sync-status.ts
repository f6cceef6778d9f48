import { GOOD_PROGRESS_ABOVE_PCT, NEAR_COMPLETE_ABOVE_PCT } from '../config/constants.js';
import { percentWholePart, progressHundredths } from '../utils/format.js';
import { isValidHeight } from '../utils/height.js';
import type { Height, Milestone, SyncState } from '../types/index.js';

export function milestoneFor(hundredths: number | null): Milestone | null {
  if (hundredths === null) return null;
  const whole = percentWholePart(hundredths);
  if (whole > NEAR_COMPLETE_ABOVE_PCT) return 'near-complete';
  if (whole > GOOD_PROGRESS_ABOVE_PCT) return 'good-progress';
  return null;
}

/**
 * Classify a local height against the remote proven height.
 *
 * Unknown on either side wins over everything else. A value that is not a
 * non-negative safe integer is reported as `invalid-data`, never coerced.
 */
export function classifySync(local: Height, remote: Height): SyncState {
  if (local === null || remote === null) return { status: 'unknown' };

  if (!isValidHeight(local) || !isValidHeight(remote)) {
    return {
      status: 'invalid-data',
      reason: `invalid block numbers received (local: ${local}, remote: ${remote})`,
    };
  }

  if (local === remote) return { status: 'synced' };
  if (local > remote) return { status: 'ahead', lead: local - remote };

  const progress = progressHundredths(local, remote);
  return {
    status: 'syncing',
    progressHundredths: progress,
    milestone: milestoneFor(progress),
    remaining: remote - local,
  };
}

import type { Height } from '../types/index.js';

export type HeightParseMode = 'strict' | 'lenient';

const DIGITS_ONLY = /^\d+$/;

/**
 * Parse a raw block-number field as received from an upstream.
 *
 * `strict` accepts a JSON integer or an all-digit string. `lenient` also accepts
 * decorated strings ("1,234", "#1234") by dropping every non-digit character.
 * Returns null when no non-negative safe integer can be read.
 */
export function parseHeightField(value: unknown, mode: HeightParseMode = 'strict'): Height {
  if (typeof value === 'number') {
    return isValidHeight(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const digits = mode === 'lenient' ? value.replace(/\D/g, '') : value.trim();
  if (!DIGITS_ONLY.test(digits)) return null;

  const parsed = Number(digits);
  return isValidHeight(parsed) ? parsed : null;
}

export function isValidHeight(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

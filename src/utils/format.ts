import { isValidHeight } from './height.js';
import type { Height } from '../types/index.js';

export const NOT_AVAILABLE = 'N/A';

/** 1234567 -> "1,234,567"; unknown -> "N/A" */
export function formatHeight(height: Height): string {
  if (height === null) return NOT_AVAILABLE;
  return String(height).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * local*100/remote truncated to two decimals, as integer hundredths
 * (450/500 -> 9000). BigInt keeps the truncation exact for any safe integer input.
 */
export function progressHundredths(local: Height, remote: Height): number | null {
  if (local === null || remote === null || remote === 0) return null;
  if (!isValidHeight(local) || !isValidHeight(remote)) return null;
  return Number((BigInt(local) * 10_000n) / BigInt(remote));
}

/** 9020 -> "90.20" */
export function formatPercent(hundredths: number | null): string {
  if (hundredths === null) return NOT_AVAILABLE;
  const whole = Math.floor(hundredths / 100);
  const fraction = String(hundredths % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
}

export function percentWholePart(hundredths: number): number {
  return Math.floor(hundredths / 100);
}

export function successRate(total: number, errors: number): number {
  if (total === 0) return 0;
  return Math.trunc(((total - errors) * 100) / total);
}

/** Local wall-clock time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

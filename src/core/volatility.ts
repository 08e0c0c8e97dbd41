import type { AlertLevel, Direction } from "../contracts";

/** |move| below this is noise. */
export const MINOR_THRESHOLD_PCT = 0.1;
/** |move| at or above this is a major alert; also the terminal alert threshold. */
export const MAJOR_THRESHOLD_PCT = 0.5;
export const DEFAULT_LOOKBACK = 5;

/**
 * Percentage change between the last close and the close `lookback` bars from
 * the end (index `length - lookback`), e.g. 0.85 means +0.85%.
 * Returns 0 when there are fewer than `lookback` closes or the base price is unusable.
 */
export function calculatePercentChange(closes: readonly number[], lookback: number = DEFAULT_LOOKBACK): number {
  if (!Number.isInteger(lookback) || lookback < 1) throw new RangeError(`lookback must be a positive integer, got ${lookback}`);
  if (closes.length < lookback) return 0;
  const current = closes[closes.length - 1];
  const old = closes[closes.length - lookback];
  if (!Number.isFinite(old) || !Number.isFinite(current) || old === 0) return 0;
  return ((current - old) / old) * 100;
}

export function classifyAlert(pct: number): AlertLevel | null {
  const a = Math.abs(pct);
  if (!(a >= MINOR_THRESHOLD_PCT)) return null;
  if (a < MAJOR_THRESHOLD_PCT) return "minor";
  return "major";
}

export function shouldAlert(pct: number, threshold: number = MAJOR_THRESHOLD_PCT): boolean {
  return Math.abs(pct) >= threshold;
}

export function direction(pct: number): Direction {
  return pct > 0 ? "up" : "down";
}

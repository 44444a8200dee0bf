import { breakSetSchema } from '@shared/schema';
import { ContourConfigError, type BreakGenerator } from '@/types/field';

const ROUNDING = 1e10;

function roundStep(value: number): number {
  return Math.round(value * ROUNDING) / ROUNDING;
}

function seq(start: number, end: number, step: number): number[] {
  const out: number[] = [];
  const count = Math.round((end - start) / step);
  for (let k = 0; k <= count; k++) out.push(roundStep(start + k * step));
  return out;
}

/**
 * Sort, de-duplicate and drop non-finite thresholds
 */
export function normalizeBreaks(breaks: readonly number[]): number[] {
  return Array.from(new Set(breaks.filter(b => Number.isFinite(b)))).sort((a, b) => a - b);
}

/**
 * Breaks every `binwidth`, aligned on multiples of it. Without a width the range
 * is split into `bins` equal bins.
 */
export function makeBreaks(binwidth?: number, bins = 10): BreakGenerator {
  return (range, callerBinwidth) => {
    const [min, max] = range;
    const span = max - min;
    const width = binwidth ?? callerBinwidth ?? span / bins;
    if (!(width > 0) || !Number.isFinite(width)) return [min];
    return seq(Math.floor(min / width) * width, Math.ceil(max / width) * width, width);
  };
}

/**
 * Roughly `n` intervals on 1, 2 or 5 × 10^k steps covering the range
 */
export function prettyBreaks(n = 5): BreakGenerator {
  return range => {
    const [min, max] = range;
    const span = max - min;
    if (!(span > 0)) return [min];
    const raw = span / Math.max(1, n);
    const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
    const norm = raw / magnitude;
    const step = (norm < 1.5 ? 1 : norm < 3 ? 2 : norm < 7 ? 5 : 10) * magnitude;
    return seq(Math.floor(min / step) * step, Math.ceil(max / step) * step, step);
  };
}

export function resolveBreaks(
  breaks: readonly number[] | BreakGenerator,
  range: [number, number],
  binwidth?: number,
): number[] {
  if (typeof breaks !== 'function') return normalizeBreaks(breaks);
  const parsed = breakSetSchema.safeParse(breaks(range, binwidth));
  if (!parsed.success) {
    throw new ContourConfigError('Break generator must return an array of numbers', parsed.error.issues);
  }
  return normalizeBreaks(parsed.data);
}

/**
 * Interval a value falls in: the largest i with breaks[i] <= value, so a value
 * sitting exactly on a break belongs to the interval above it. -1 below the
 * first break.
 */
export function bandIndex(value: number, breaks: readonly number[]): number {
  let lo = 0;
  let hi = breaks.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (breaks[mid] <= value) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

import {
  MalformedGridError,
  UnsupportedPolicyError,
  type Aggregator,
  type FieldGrid,
  type NaFillPolicy,
} from '@/types/field';
import { assertCompleteGrid, cloneGrid, gridIndex } from './grid';
import { naturalCubicSpline } from './spline';

export const aggregators = {
  mean: (values: number[]): number => {
    if (values.length === 0) return NaN;
    let sum = 0;
    for (const v of values) sum += v;
    return sum / values.length;
  },
  median: (values: number[]): number => {
    if (values.length === 0) return NaN;
    const sorted = values.slice().sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
  },
  // no Math.min(...values): argument lists overflow the stack near a million values
  min: (values: number[]): number => {
    if (values.length === 0) return NaN;
    let best = values[0];
    for (const v of values) if (v < best) best = v;
    return best;
  },
  max: (values: number[]): number => {
    if (values.length === 0) return NaN;
    let best = values[0];
    for (const v of values) if (v > best) best = v;
    return best;
  },
} satisfies Record<string, Aggregator>;

export type NaFillInput = NaFillPolicy | boolean | number | Aggregator | undefined;

function describePolicy(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'kind' in input) {
    return `kind "${String(input.kind)}"`;
  }
  return typeof input;
}

/**
 * Normalise the caller's naFill value into a policy.
 *   false / undefined → reject, true → spline, number → constant, function → aggregate
 */
export function resolveNaFill(input: unknown): NaFillPolicy {
  if (input === undefined || input === false) return { kind: 'reject' };
  if (input === true) return { kind: 'spline' };
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new UnsupportedPolicyError(`Constant fill value must be finite, got ${input}`);
    }
    return { kind: 'constant', value: input };
  }
  if (typeof input === 'function') {
    return { kind: 'aggregate', fn: (values: number[]) => Number(input(values)) };
  }
  if (typeof input === 'object' && input !== null && 'kind' in input) {
    switch (input.kind) {
      case 'reject':
        return { kind: 'reject' };
      case 'spline':
        return { kind: 'spline' };
      case 'constant':
        if ('value' in input && typeof input.value === 'number' && Number.isFinite(input.value)) {
          return { kind: 'constant', value: input.value };
        }
        break;
      case 'aggregate':
        if ('fn' in input && typeof input.fn === 'function') {
          const fn = input.fn;
          return { kind: 'aggregate', fn: (values: number[]) => Number(fn(values)) };
        }
        break;
    }
  }
  throw new UnsupportedPolicyError(`Unsupported naFill policy: ${describePolicy(input)}`, { input });
}

function knownValues(grid: FieldGrid): number[] {
  const out: number[] = [];
  for (const v of grid.values) if (!Number.isNaN(v)) out.push(v);
  return out;
}

function fillWith(grid: FieldGrid, value: number): FieldGrid {
  const out = cloneGrid(grid);
  for (let k = 0; k < out.values.length; k++) {
    if (Number.isNaN(out.values[k])) out.values[k] = value;
  }
  return out;
}

type LineEstimator = (t: number) => number;

function lineEstimator(ts: number[], vs: number[]): LineEstimator | null {
  if (ts.length === 0) return null;
  return naturalCubicSpline(ts, vs);
}

/**
 * Separable spline estimate: a natural cubic spline along the cell's row and
 * one along its column, averaged when both exist.
 */
function splineFill(grid: FieldGrid): FieldGrid {
  const nx = grid.xs.length;
  const ny = grid.ys.length;
  const out = cloneGrid(grid);
  const known = knownValues(grid);
  const fallback = aggregators.mean(known);

  const rows: Array<LineEstimator | null> = [];
  for (let j = 0; j < ny; j++) {
    const ts: number[] = [];
    const vs: number[] = [];
    for (let i = 0; i < nx; i++) {
      const v = grid.values[gridIndex(i, j, grid)];
      if (!Number.isNaN(v)) {
        ts.push(grid.xs[i]);
        vs.push(v);
      }
    }
    rows.push(lineEstimator(ts, vs));
  }

  const cols: Array<LineEstimator | null> = [];
  for (let i = 0; i < nx; i++) {
    const ts: number[] = [];
    const vs: number[] = [];
    for (let j = 0; j < ny; j++) {
      const v = grid.values[gridIndex(i, j, grid)];
      if (!Number.isNaN(v)) {
        ts.push(grid.ys[j]);
        vs.push(v);
      }
    }
    cols.push(lineEstimator(ts, vs));
  }

  for (let j = 0; j < ny; j++) {
    for (let i = 0; i < nx; i++) {
      const k = gridIndex(i, j, grid);
      if (!Number.isNaN(grid.values[k])) continue;
      const estimates: number[] = [];
      const row = rows[j];
      const col = cols[i];
      if (row) estimates.push(row(grid.xs[i]));
      if (col) estimates.push(col(grid.ys[j]));
      out.values[k] = estimates.length ? aggregators.mean(estimates) : fallback;
    }
  }
  return out;
}

/**
 * Return a complete copy of the grid with every missing cell filled according to
 * the policy. A grid with nothing to fill is returned as a copy for every policy.
 */
export function imputeGrid(grid: FieldGrid, policy: NaFillPolicy): FieldGrid {
  switch (policy.kind) {
    case 'reject':
      assertCompleteGrid(grid);
      return cloneGrid(grid);
    case 'constant':
      return fillWith(grid, policy.value);
    case 'aggregate': {
      const known = knownValues(grid);
      if (known.length === 0) {
        throw new MalformedGridError('Cannot aggregate a grid with no known values');
      }
      const value = policy.fn(known);
      if (!Number.isFinite(value)) {
        throw new UnsupportedPolicyError(`Aggregate fill function returned a non-finite value (${value})`);
      }
      return fillWith(grid, value);
    }
    case 'spline': {
      if (knownValues(grid).length === 0) {
        throw new MalformedGridError('Cannot interpolate a grid with no known values');
      }
      return splineFill(grid);
    }
    default: {
      const unknownPolicy: never = policy;
      throw new UnsupportedPolicyError(`Unsupported naFill policy: ${describePolicy(unknownPolicy)}`);
    }
  }
}

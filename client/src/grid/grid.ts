import {
  MalformedGridError,
  type FieldGrid,
  type FieldMapping,
  type FieldRow,
  type GridPoint,
  type GridReport,
} from '@/types/field';

const MAX_LISTED_POINTS = 10;

export function gridIndex(i: number, j: number, grid: FieldGrid): number {
  return i + j * grid.xs.length;
}

export function cloneGrid(grid: FieldGrid): FieldGrid {
  return { xs: grid.xs.slice(), ys: grid.ys.slice(), values: new Float64Array(grid.values) };
}

function toNumber(cell: FieldRow[string]): number {
  if (typeof cell === 'number') return cell;
  if (typeof cell === 'string' && cell.trim() !== '') return Number(cell);
  return NaN;
}

function sortedDistinct(values: Iterable<number>): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

function describePoints(points: GridPoint[]): string {
  const shown = points.slice(0, MAX_LISTED_POINTS).map(p => `(${p.x}, ${p.y})`).join(', ');
  return points.length > MAX_LISTED_POINTS ? `${shown}, … (${points.length} total)` : shown;
}

/**
 * Collect rows into a rectangular lattice over the distinct x and y values.
 * Cells with no row, or whose z is not a finite number, are NaN.
 * Duplicated (x, y) pairs and non-numeric coordinates are rejected here since
 * no imputation policy can repair them.
 */
export function buildFieldGrid(rows: FieldRow[], mapping: FieldMapping): FieldGrid {
  const coords: Array<{ x: number; y: number; z: number }> = [];
  for (const row of rows) {
    const x = toNumber(row[mapping.x]);
    const y = toNumber(row[mapping.y]);
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new MalformedGridError(
        `Row has non-numeric coordinates: ${mapping.x}=${String(row[mapping.x])}, ${mapping.y}=${String(row[mapping.y])}`,
        [],
        [],
        { row },
      );
    }
    coords.push({ x, y, z: toNumber(row[mapping.z]) });
  }

  const xs = sortedDistinct(coords.map(c => c.x));
  const ys = sortedDistinct(coords.map(c => c.y));
  const xIndex = new Map(xs.map((x, i) => [x, i]));
  const yIndex = new Map(ys.map((y, j) => [y, j]));

  const values = new Float64Array(xs.length * ys.length).fill(NaN);
  const seen = new Uint8Array(values.length);
  const duplicates: GridPoint[] = [];

  for (const c of coords) {
    const i = xIndex.get(c.x);
    const j = yIndex.get(c.y);
    if (i === undefined || j === undefined) continue;
    const k = i + j * xs.length;
    if (seen[k]) {
      duplicates.push({ x: c.x, y: c.y });
      continue;
    }
    seen[k] = 1;
    values[k] = Number.isFinite(c.z) ? c.z : NaN;
  }

  if (duplicates.length > 0) {
    throw new MalformedGridError(
      `Grid has ${duplicates.length} duplicated cell(s): ${describePoints(duplicates)}`,
      [],
      duplicates,
    );
  }

  return { xs, ys, values };
}

/**
 * Report every lattice cell without a finite value
 */
export function validateGrid(grid: FieldGrid): GridReport {
  const missing: GridPoint[] = [];
  for (let j = 0; j < grid.ys.length; j++) {
    for (let i = 0; i < grid.xs.length; i++) {
      if (Number.isNaN(grid.values[gridIndex(i, j, grid)])) {
        missing.push({ x: grid.xs[i], y: grid.ys[j] });
      }
    }
  }
  return { missing };
}

export function assertCompleteGrid(grid: FieldGrid): void {
  const { missing } = validateGrid(grid);
  if (missing.length > 0) {
    throw new MalformedGridError(
      `Grid is missing ${missing.length} cell(s): ${describePoints(missing)}`,
      missing,
    );
  }
}

/**
 * Finite [min, max] of the grid values, or null when there are none
 */
export function gridRange(grid: FieldGrid): [number, number] | null {
  let min = Infinity;
  let max = -Infinity;
  for (const v of grid.values) {
    if (!Number.isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min <= max ? [min, max] : null;
}

/**
 * Map a fractional lattice index onto its axis, piecewise-linearly.
 * Indices outside [0, n - 1] are clamped to the axis ends.
 */
export function axisPosition(axis: number[], index: number): number {
  const n = axis.length;
  if (n === 0) return NaN;
  if (index <= 0) return axis[0];
  if (index >= n - 1) return axis[n - 1];
  const i = Math.floor(index);
  const t = index - i;
  return t === 0 ? axis[i] : axis[i] + t * (axis[i + 1] - axis[i]);
}

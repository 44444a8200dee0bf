// Field, contour and primitive types shared across the contour-fill pipeline

export type Pair = [number, number];
export type Ring = Pair[];
// polygon-clipping layout: [outer, ...holes]
export type PolygonRings = Ring[];
export type MultiPolygonRings = PolygonRings[];

export type FieldCell = string | number | boolean | null | undefined;
export type FieldRow = Record<string, FieldCell>;

export interface FieldMapping {
  x: string;
  y: string;
  z: string;
  group?: string;
}

export interface GridPoint {
  x: number;
  y: number;
}

export interface FieldGrid {
  xs: number[]; // ascending
  ys: number[]; // ascending
  // row-major: values[j * xs.length + i] is the sample at (xs[i], ys[j]); NaN = missing
  values: Float64Array;
}

export interface GridReport {
  missing: GridPoint[];
}

export type Aggregator = (values: number[]) => number;

export type NaFillPolicy =
  | { kind: 'reject' }
  | { kind: 'constant'; value: number }
  | { kind: 'aggregate'; fn: Aggregator }
  | { kind: 'spline' };

export type BreakGenerator = (range: [number, number], binwidth?: number) => number[];

export interface ContourRegion {
  level: number;
  levelHigh: number;
  interiorValue: number;
  component: number;
  // lattice index space; sample (i, j) sits at [i, j]
  rings: PolygonRings;
}

export interface PolygonPrimitive {
  id: string;
  group: string | null;
  level: number;
  levelHigh: number;
  interiorValue: number;
  fill: number;
  order: number;
  rings: PolygonRings; // data coordinates
}

// ============================================================================
// Error Types
// ============================================================================

export class MalformedGridError extends Error {
  code = 'MALFORMED_GRID';
  recoverable = false;

  constructor(
    message: string,
    public missing: GridPoint[] = [],
    public duplicates: GridPoint[] = [],
    public details?: unknown,
  ) {
    super(message);
    this.name = 'MalformedGridError';
  }
}

export class UnsupportedPolicyError extends Error {
  code = 'UNSUPPORTED_POLICY';
  recoverable = false;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'UnsupportedPolicyError';
  }
}

export class ContourConfigError extends Error {
  code = 'CONTOUR_CONFIG';
  recoverable = false;

  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ContourConfigError';
  }
}

/**
 * Contour Fill Module - Public API
 *
 * Rows of (x, y, z) samples in, ordered polygon primitives out.
 */

// Pipeline
export { computeContourFill } from './pipeline';
export type { ContourFillOptions, ContourFillResult, GroupSummary } from './pipeline';

// Stages
export { breakContours, superlevelSet } from './breaker';
export { emitPolygons, latticeToData, regionKey } from './emit';
export type { EmitOptions } from './emit';
export { bandIndex, makeBreaks, normalizeBreaks, prettyBreaks, resolveBreaks } from './breaks';
export { tanakaEdges } from './tanaka';
export type { TanakaOptions, TanakaSegment } from './tanaka';

// Grid validation and imputation
export { buildFieldGrid, validateGrid, assertCompleteGrid, gridRange, axisPosition } from '@/grid/grid';
export { imputeGrid, resolveNaFill, aggregators } from '@/grid/impute';
export type { NaFillInput } from '@/grid/impute';

// Axis helpers
export {
  wrapLongitude,
  formatLongitude,
  formatLatitude,
  pressureTransform,
  pressureBreaks,
} from '@/lib/geo-scales';
export type { AxisTransform } from '@/lib/geo-scales';

// Types and errors
export { MalformedGridError, UnsupportedPolicyError, ContourConfigError } from '@/types/field';
export type {
  Aggregator,
  BreakGenerator,
  ContourRegion,
  FieldGrid,
  FieldMapping,
  FieldRow,
  GridPoint,
  GridReport,
  NaFillPolicy,
  PolygonPrimitive,
  PolygonRings,
} from '@/types/field';

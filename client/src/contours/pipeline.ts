import { contourFillOptionsSchema, type ContourFillOptionsInput } from '@shared/schema';
import { buildFieldGrid, gridRange, validateGrid } from '@/grid/grid';
import { imputeGrid, resolveNaFill, type NaFillInput } from '@/grid/impute';
import { log } from '@/lib/log';
import { ContourConfigError, type FieldCell, type FieldRow, type PolygonPrimitive } from '@/types/field';
import { breakContours } from './breaker';
import { resolveBreaks } from './breaks';
import { emitPolygons } from './emit';

export interface ContourFillOptions extends Omit<ContourFillOptionsInput, 'naFill'> {
  naFill?: NaFillInput;
}

export interface GroupSummary {
  group: string | null;
  breaks: number[];
  imputedCells: number;
  regions: number;
}

export interface ContourFillResult {
  polygons: PolygonPrimitive[];
  groups: GroupSummary[];
}

interface GroupRows {
  label: string | null;
  rows: FieldRow[];
}

/**
 * Rows bucketed by the raw group cell. Distinct cells that print alike (null and
 * "null", 1 and "1") would share a label and an id prefix, so they are refused.
 */
function splitByGroup(rows: FieldRow[], column?: string): GroupRows[] {
  if (column === undefined) return rows.length > 0 ? [{ label: null, rows }] : [];

  const groups = new Map<FieldCell, GroupRows>();
  const cellByLabel = new Map<string, FieldCell>();
  for (const row of rows) {
    const cell = row[column];
    const bucket = groups.get(cell);
    if (bucket) {
      bucket.rows.push(row);
      continue;
    }
    const label = String(cell);
    if (cellByLabel.has(label)) {
      throw new ContourConfigError(
        `Group column "${column}" holds distinct values that both read as "${label}"`,
        { column, values: [cellByLabel.get(label), cell] },
      );
    }
    cellByLabel.set(label, cell);
    groups.set(cell, { label, rows: [row] });
  }
  return Array.from(groups.values());
}

/**
 * Rows in, ordered polygon primitives out: validate the lattice, impute only
 * when cells are missing, break into regions per interval, emit.
 * Each group (facet) is contoured on its own grid.
 */
export function computeContourFill(rows: FieldRow[], options: ContourFillOptions): ContourFillResult {
  const parsed = contourFillOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const summary = parsed.error.issues.map(i => `${i.path.join('.') || 'options'}: ${i.message}`).join('; ');
    throw new ContourConfigError(`Invalid contour fill options: ${summary}`, parsed.error.issues);
  }
  const policy = resolveNaFill(options.naFill);
  const { mapping, breaks, binwidth, exclude } = parsed.data;

  const polygons: PolygonPrimitive[] = [];
  const groups: GroupSummary[] = [];

  for (const { label: group, rows: groupRows } of splitByGroup(rows, mapping.group)) {
    const source = group === null ? 'contour-fill' : `contour-fill:${group}`;
    const raw = buildFieldGrid(groupRows, mapping);
    const { missing } = validateGrid(raw);
    const grid = missing.length > 0 ? imputeGrid(raw, policy) : raw;
    if (missing.length > 0) {
      log.debug(`Imputed ${missing.length} cell(s) with ${policy.kind} policy`, source);
    }

    const range = gridRange(grid);
    const levels = range ? resolveBreaks(breaks, range, binwidth) : [];
    const regions = breakContours(grid, levels);
    const emitted = emitPolygons(regions, grid, { exclude, group, orderOffset: polygons.length });
    polygons.push(...emitted);

    log.debug(
      `${grid.xs.length}x${grid.ys.length} grid, ${levels.length} break(s), ${emitted.length} polygon(s)`,
      source,
    );
    groups.push({ group, breaks: levels, imputedCells: missing.length, regions: emitted.length });
  }

  return { polygons, groups };
}

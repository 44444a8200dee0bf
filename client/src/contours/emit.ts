import { axisPosition } from '@/grid/grid';
import type { ContourRegion, FieldGrid, Pair, PolygonPrimitive, PolygonRings } from '@/types/field';

export interface EmitOptions {
  exclude?: readonly number[];
  group?: string | null;
  // first draw order to hand out; lets several groups share one ordering
  orderOffset?: number;
}

export function regionKey(region: ContourRegion, group: string | null = null): string {
  const key = `${region.level}:${region.interiorValue}:${region.component}`;
  return group === null ? key : `${group}/${key}`;
}

export function latticeToData(rings: PolygonRings, grid: FieldGrid): PolygonRings {
  return rings.map(ring => ring.map(([i, j]): Pair => [axisPosition(grid.xs, i), axisPosition(grid.ys, j)]));
}

/**
 * One polygon primitive per region, filled by interior value rather than level
 * so same-level regions with different content stay distinguishable. Regions
 * at excluded levels are skipped.
 */
export function emitPolygons(
  regions: readonly ContourRegion[],
  grid: FieldGrid,
  options: EmitOptions = {},
): PolygonPrimitive[] {
  const excluded = new Set(options.exclude ?? []);
  const group = options.group ?? null;
  let order = options.orderOffset ?? 0;

  const out: PolygonPrimitive[] = [];
  for (const region of regions) {
    if (excluded.has(region.level)) continue;
    out.push({
      id: regionKey(region, group),
      group,
      level: region.level,
      levelHigh: region.levelHigh,
      interiorValue: region.interiorValue,
      fill: region.interiorValue,
      order: order++,
      rings: latticeToData(region.rings, grid),
    });
  }
  return out;
}

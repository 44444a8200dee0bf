/**
 * Filled-contour construction.
 *
 * Each break's superlevel set {z >= b} is traced with marching squares, and the
 * interval [b_i, b_i+1) is the difference of two consecutive superlevel sets.
 * Every polygon of that difference is one connected region. Outside the lattice
 * counts as below every break, so regions touching the grid boundary are closed
 * along the grid edge.
 */

import { contours } from 'd3-contour';
import polygonClipping from 'polygon-clipping';
import { assertCompleteGrid, gridIndex } from '@/grid/grid';
import { log } from '@/lib/log';
import { getRingBounds, locatePointInPolygon, sanitizeRing } from '@/lib/polygon-utils';
import type { ContourRegion, FieldGrid, MultiPolygonRings, Pair, PolygonRings } from '@/types/field';
import { bandIndex, normalizeBreaks } from './breaks';

interface LatticeSample {
  point: Pair;
  value: number;
}

function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Trace {z >= threshold} in lattice index space (sample (i, j) at [i, j]).
 * Marching squares puts samples at cell centres, hence the half-cell shift.
 */
export function superlevelSet(grid: FieldGrid, threshold: number): MultiPolygonRings {
  const nx = grid.xs.length;
  const ny = grid.ys.length;
  const geometry = contours()
    .size([nx, ny])
    .smooth(true)
    .contour(Array.from(grid.values), threshold);

  const out: MultiPolygonRings = [];
  for (const polygon of geometry.coordinates) {
    const rings: PolygonRings = [];
    for (const ring of polygon) {
      const lattice = sanitizeRing(
        ring.map((p): Pair => [clamp(p[0] - 0.5, 0, nx - 1), clamp(p[1] - 0.5, 0, ny - 1)]),
      );
      // a polygon whose outer ring collapsed is dropped with its holes
      if (lattice.length === 0 && rings.length === 0) break;
      if (lattice.length > 0) rings.push(lattice);
    }
    if (rings.length > 0) out.push(rings);
  }
  if (out.length === 0) return [];
  return polygonClipping.union(out);
}

function bandGeometry(lower: MultiPolygonRings, upper: MultiPolygonRings | null): MultiPolygonRings {
  if (lower.length === 0) return [];
  if (!upper || upper.length === 0) return lower;
  return polygonClipping.difference(lower, upper);
}

function interiorValueOf(polygon: PolygonRings, samples: LatticeSample[]): number | null {
  const bounds = getRingBounds(polygon[0]);
  let best: number | null = null;
  for (const s of samples) {
    const [x, y] = s.point;
    if (x < bounds.minX || x > bounds.maxX || y < bounds.minY || y > bounds.maxY) continue;
    if (locatePointInPolygon(s.point, polygon) === 'outside') continue;
    if (best === null || s.value > best) best = s.value;
  }
  return best;
}

/**
 * Partition a complete grid into contour regions, ordered by ascending level and
 * then by discovery order within a level.
 */
export function breakContours(grid: FieldGrid, breaks: readonly number[]): ContourRegion[] {
  assertCompleteGrid(grid);
  const levels = normalizeBreaks(breaks);
  const nx = grid.xs.length;
  const ny = grid.ys.length;

  if (levels.length === 0) return [];
  if (nx < 2 || ny < 2) {
    log.warn(`Grid of ${nx}x${ny} has no area to contour`, 'contour-breaker');
    return [];
  }

  const samplesByBand: LatticeSample[][] = levels.map(() => []);
  for (let j = 0; j < ny; j++) {
    for (let i = 0; i < nx; i++) {
      const value = grid.values[gridIndex(i, j, grid)];
      const band = bandIndex(value, levels);
      if (band >= 0) samplesByBand[band].push({ point: [i, j], value });
    }
  }

  const superSets = levels.map(level => superlevelSet(grid, level));
  const regions: ContourRegion[] = [];

  for (let b = 0; b < levels.length; b++) {
    const level = levels[b];
    const isTop = b === levels.length - 1;
    const levelHigh = isTop ? Infinity : levels[b + 1];
    const geometry = bandGeometry(superSets[b], isTop ? null : superSets[b + 1]);

    geometry.forEach((polygon, component) => {
      let interiorValue = interiorValueOf(polygon, samplesByBand[b]);
      if (interiorValue === null) {
        interiorValue = isTop ? level : (level + levelHigh) / 2;
        log.debug(
          `Region ${component} of [${level}, ${levelHigh}) holds no samples; interior value set to ${interiorValue}`,
          'contour-breaker',
        );
      }
      regions.push({ level, levelHigh, interiorValue, component, rings: polygon });
    });
  }

  log.debug(`Broke ${nx}x${ny} grid into ${regions.length} region(s) over ${levels.length} break(s)`, 'contour-breaker');
  return regions;
}

/**
 * Illuminated ("Tanaka") contour edges.
 *
 * Each contour line segment gets a brightness from the angle between its
 * downhill normal and the light direction: slopes facing the light draw as
 * light edges, the others as shadows, with width growing with |light|.
 */

import { tanakaOptionsSchema, type TanakaOptionsInput } from '@shared/schema';
import { axisPosition } from '@/grid/grid';
import { isRingClockwise } from '@/lib/polygon-utils';
import { ContourConfigError, type FieldGrid, type Ring } from '@/types/field';
import { normalizeBreaks } from './breaks';
import { superlevelSet } from './breaker';

// lightAngle: degrees, counter-clockwise from +x
// range: linewidth at |light| = 0 and at |light| = 1
export type TanakaOptions = TanakaOptionsInput;

export interface TanakaSegment {
  level: number;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  light: number;
  kind: 'light' | 'shadow';
  linewidth: number;
}

const DEFAULT_LIGHT_ANGLE = 60;
const DEFAULT_RANGE: [number, number] = [0.01, 0.5];

function onGridEdge(a: [number, number], b: [number, number], nx: number, ny: number): boolean {
  return (
    (a[0] === 0 && b[0] === 0) ||
    (a[0] === nx - 1 && b[0] === nx - 1) ||
    (a[1] === 0 && b[1] === 0) ||
    (a[1] === ny - 1 && b[1] === ny - 1)
  );
}

export function tanakaEdges(
  grid: FieldGrid,
  breaks: readonly number[],
  options: TanakaOptions = {},
): TanakaSegment[] {
  const parsed = tanakaOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ContourConfigError('Invalid Tanaka options', parsed.error.issues);
  }
  const nx = grid.xs.length;
  const ny = grid.ys.length;
  if (nx < 2 || ny < 2) return [];

  const angle = ((parsed.data.lightAngle ?? DEFAULT_LIGHT_ANGLE) * Math.PI) / 180;
  const sun: [number, number] = [Math.cos(angle), Math.sin(angle)];
  const [minWidth, maxWidth] = parsed.data.range ?? DEFAULT_RANGE;

  const segments: TanakaSegment[] = [];
  for (const level of normalizeBreaks(breaks)) {
    for (const polygon of superlevelSet(grid, level)) {
      polygon.forEach((ring, r) => {
        // outer rings counter-clockwise, holes clockwise: the set is on the left
        const wantClockwise = r > 0;
        const oriented: Ring = isRingClockwise(ring) === wantClockwise ? ring : ring.slice().reverse();

        for (let k = 0; k < oriented.length; k++) {
          const a = oriented[k];
          const b = oriented[(k + 1) % oriented.length];
          if (onGridEdge(a, b, nx, ny)) continue;

          const x1 = axisPosition(grid.xs, a[0]);
          const y1 = axisPosition(grid.ys, a[1]);
          const x2 = axisPosition(grid.xs, b[0]);
          const y2 = axisPosition(grid.ys, b[1]);
          const length = Math.hypot(x2 - x1, y2 - y1);
          if (length === 0) continue;

          // left normal points uphill, into {z >= level}
          const uphill: [number, number] = [-(y2 - y1) / length, (x2 - x1) / length];
          const light = -(uphill[0] * sun[0] + uphill[1] * sun[1]);
          segments.push({
            level,
            x1,
            y1,
            x2,
            y2,
            light,
            kind: light >= 0 ? 'light' : 'shadow',
            linewidth: minWidth + Math.abs(light) * (maxWidth - minWidth),
          });
        }
      });
    }
  }
  return segments;
}

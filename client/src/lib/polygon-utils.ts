// Polygon utility functions for contour region geometry

import type { Pair, PolygonRings, Ring } from '@/types/field';

const ON_EDGE_EPSILON = 1e-9;

export type PointLocation = 'inside' | 'boundary' | 'outside';

/**
 * Signed ring area using the shoelace formula (positive = counter-clockwise).
 * Works for open and closed rings.
 */
export function signedRingArea(ring: Ring): number {
  let area = 0;
  const n = ring.length;

  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += ring[i][0] * ring[j][1];
    area -= ring[j][0] * ring[i][1];
  }

  return area / 2;
}

/**
 * Area of a polygon with holes: |outer| minus every |hole|
 */
export function calculatePolygonArea(polygon: PolygonRings): number {
  if (polygon.length === 0) return 0;
  const outer = Math.abs(signedRingArea(polygon[0]));
  let holes = 0;
  for (let i = 1; i < polygon.length; i++) holes += Math.abs(signedRingArea(polygon[i]));
  return Math.max(0, outer - holes);
}

/**
 * Check if ring is clockwise
 */
export function isRingClockwise(ring: Ring): boolean {
  return signedRingArea(ring) < 0;
}

function pointsAlmostEqual(a: Pair, b: Pair): boolean {
  return Math.abs(a[0] - b[0]) <= ON_EDGE_EPSILON && Math.abs(a[1] - b[1]) <= ON_EDGE_EPSILON;
}

/**
 * Drop repeated consecutive vertices and non-finite points, and close the ring.
 * Returns an empty ring when fewer than three distinct vertices remain.
 */
export function sanitizeRing(ring: Ring): Ring {
  const out: Ring = [];
  for (const point of ring) {
    if (!Number.isFinite(point[0]) || !Number.isFinite(point[1])) continue;
    const last = out[out.length - 1];
    if (last && pointsAlmostEqual(last, point)) continue;
    out.push([point[0], point[1]]);
  }
  if (out.length > 1 && pointsAlmostEqual(out[0], out[out.length - 1])) out.pop();
  if (out.length < 3) return [];
  out.push([out[0][0], out[0][1]]);
  return out;
}

function onSegment(p: Pair, a: Pair, b: Pair): boolean {
  const cross = (b[0] - a[0]) * (p[1] - a[1]) - (b[1] - a[1]) * (p[0] - a[0]);
  const length = Math.hypot(b[0] - a[0], b[1] - a[1]);
  if (Math.abs(cross) > ON_EDGE_EPSILON * Math.max(1, length)) return false;
  return (
    p[0] >= Math.min(a[0], b[0]) - ON_EDGE_EPSILON &&
    p[0] <= Math.max(a[0], b[0]) + ON_EDGE_EPSILON &&
    p[1] >= Math.min(a[1], b[1]) - ON_EDGE_EPSILON &&
    p[1] <= Math.max(a[1], b[1]) + ON_EDGE_EPSILON
  );
}

/**
 * Locate a point against a single ring (even-odd crossing test)
 */
export function locatePointInRing(point: Pair, ring: Ring): PointLocation {
  const n = ring.length;
  if (n < 3) return 'outside';

  let inside = false;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const a = ring[j];
    const b = ring[i];
    if (onSegment(point, a, b)) return 'boundary';
    if ((b[1] > point[1]) !== (a[1] > point[1])) {
      const xCross = b[0] + ((point[1] - b[1]) * (a[0] - b[0])) / (a[1] - b[1]);
      if (point[0] < xCross) inside = !inside;
    }
  }
  return inside ? 'inside' : 'outside';
}

/**
 * Locate a point against a polygon with holes. Points on a hole edge are on the
 * polygon boundary; points strictly inside a hole are outside.
 */
export function locatePointInPolygon(point: Pair, polygon: PolygonRings): PointLocation {
  if (polygon.length === 0) return 'outside';
  const outer = locatePointInRing(point, polygon[0]);
  if (outer !== 'inside') return outer;

  for (let i = 1; i < polygon.length; i++) {
    const hole = locatePointInRing(point, polygon[i]);
    if (hole === 'boundary') return 'boundary';
    if (hole === 'inside') return 'outside';
  }
  return 'inside';
}

/**
 * Find bounding box of a ring
 */
export function getRingBounds(ring: Ring): {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
} {
  if (ring.length === 0) {
    return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
  }

  let minX = ring[0][0];
  let minY = ring[0][1];
  let maxX = ring[0][0];
  let maxY = ring[0][1];

  for (const [x, y] of ring) {
    minX = Math.min(minX, x);
    minY = Math.min(minY, y);
    maxX = Math.max(maxX, x);
    maxY = Math.max(maxY, y);
  }

  return { minX, minY, maxX, maxY };
}

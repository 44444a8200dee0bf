/**
 * Contour Fill Pipeline Tests
 *
 * End to end: rows → validated grid → (imputed grid) → regions → primitives.
 */

import { computeContourFill } from '../pipeline';
import { prettyBreaks } from '../breaks';
import { aggregators } from '@/grid/impute';
import {
  ContourConfigError,
  MalformedGridError,
  UnsupportedPolicyError,
  type FieldRow,
} from '@/types/field';

const mapping = { x: 'lon', y: 'lat', z: 'hgt' };

function fieldRows(
  nx: number,
  ny: number,
  f: (i: number, j: number) => number | null,
  extra: FieldRow = {},
): FieldRow[] {
  const rows: FieldRow[] = [];
  for (let j = 0; j < ny; j++) {
    for (let i = 0; i < nx; i++) rows.push({ ...extra, lon: i * 10, lat: j * 5, hgt: f(i, j) });
  }
  return rows;
}

function twoPeaks(i: number, j: number): number {
  if (i === 2 && j === 2) return 180;
  if (i === 7 && j === 7) return 220;
  return 100;
}

describe('computeContourFill', () => {
  it('should contour a complete grid without imputing', () => {
    const result = computeContourFill(fieldRows(6, 6, (i, j) => i + j), {
      mapping,
      breaks: [0, 4, 8],
      naFill: { kind: 'spline' },
    });

    expect(result.groups).toEqual([{ group: null, breaks: [0, 4, 8], imputedCells: 0, regions: 3 }]);
  });

  it('should emit two level-150 polygons filled by their interior values', () => {
    const { polygons } = computeContourFill(fieldRows(10, 10, twoPeaks), { mapping, breaks: [100, 150] });

    const peaks = polygons.filter(p => p.level === 150);
    expect(peaks).toHaveLength(2);
    expect(peaks.map(p => p.fill).sort((a, b) => a - b)).toEqual([180, 220]);
    expect(new Set(peaks.map(p => p.id)).size).toBe(2);
  });

  it('should place polygons in data coordinates', () => {
    const { polygons } = computeContourFill(fieldRows(10, 4, i => i), { mapping, breaks: [5] });

    expect(polygons).toHaveLength(1);
    const outer = polygons[0].rings[0];
    expect(Math.min(...outer.map(p => p[0]))).toBeCloseTo(50, 9);
    expect(Math.max(...outer.map(p => p[0]))).toBe(90);
    expect(Math.max(...outer.map(p => p[1]))).toBe(15);
  });

  it('should tag every polygon with a member of the generated break set', () => {
    const result = computeContourFill(fieldRows(8, 8, (i, j) => i * j * 1.7), {
      mapping,
      breaks: prettyBreaks(5),
    });

    const breaks = result.groups[0].breaks;
    expect(breaks).toEqual([0, 20, 40, 60, 80, 100]);
    result.polygons.forEach(p => expect(breaks).toContain(p.level));
  });

  it('should forward the bin width to break generators', () => {
    const result = computeContourFill(fieldRows(4, 4, i => i), {
      mapping,
      binwidth: 1.5,
      breaks: (range, binwidth) => [range[0], range[0] + (binwidth ?? 0)],
    });
    expect(result.groups[0].breaks).toEqual([0, 1.5]);
  });

  it('should be idempotent', () => {
    const rows = fieldRows(10, 10, twoPeaks);
    const options = { mapping, breaks: [100, 150, 200] };
    expect(computeContourFill(rows, options)).toEqual(computeContourFill(rows, options));
  });

  it('should suppress excluded levels', () => {
    const { polygons } = computeContourFill(fieldRows(10, 10, twoPeaks), {
      mapping,
      breaks: [100, 150],
      exclude: [100],
    });
    expect(polygons.map(p => p.level)).toEqual([150, 150]);
    expect(polygons.map(p => p.order)).toEqual([0, 1]);
  });

  describe('missing cells', () => {
    it('should impute with the configured policy and report the count', () => {
      const rows = fieldRows(10, 10, (i, j) => (i === 5 && j === 5 ? null : 10));
      const result = computeContourFill(rows, { mapping, breaks: [10], naFill: aggregators.mean });

      expect(result.groups[0].imputedCells).toBe(1);
      expect(result.polygons).toHaveLength(1);
      expect(result.polygons[0].interiorValue).toBe(10);
    });

    it('should raise MalformedGridError naming a missing edge row under reject', () => {
      const rows = fieldRows(4, 3, (i, j) => (j === 2 ? null : i));

      try {
        computeContourFill(rows, { mapping, breaks: [1], naFill: false });
        expect.unreachable('reject must not fill the row');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedGridError);
        if (error instanceof MalformedGridError) {
          expect(error.missing).toEqual([
            { x: 0, y: 10 },
            { x: 10, y: 10 },
            { x: 20, y: 10 },
            { x: 30, y: 10 },
          ]);
        }
      }
    });

    it('should reject an unusable policy even for a complete grid', () => {
      const rows = fieldRows(3, 3, () => 1);
      expect(() => computeContourFill(rows, { mapping, breaks: [0], naFill: Infinity })).toThrow(
        UnsupportedPolicyError,
      );
    });
  });

  describe('groups', () => {
    it('should contour each group on its own grid', () => {
      const rows = [
        ...fieldRows(5, 5, i => i, { run: 'a' }),
        ...fieldRows(5, 5, i => 4 - i, { run: 'b' }),
      ];
      const result = computeContourFill(rows, { mapping: { ...mapping, group: 'run' }, breaks: [2] });

      expect(result.groups.map(g => g.group)).toEqual(['a', 'b']);
      expect(result.polygons.map(p => p.group)).toEqual(['a', 'b']);
      expect(result.polygons.map(p => p.order)).toEqual([0, 1]);
      expect(result.polygons[0].id).toBe('a/2:4:0');
    });

    it('should label numeric groups by their printed value', () => {
      const rows = [...fieldRows(3, 3, i => i, { g: 1 }), ...fieldRows(3, 3, i => i, { g: 2 })];
      const result = computeContourFill(rows, { mapping: { ...mapping, group: 'g' }, breaks: [1] });

      expect(result.groups.map(g => g.group)).toEqual(['1', '2']);
      expect(result.polygons.map(p => p.id)).toEqual(['1/1:2:0', '2/1:2:0']);
    });

    it('should refuse distinct group values that print alike instead of merging their grids', () => {
      const grouped = { mapping: { ...mapping, group: 'g' }, breaks: [1] };
      const nullRows = [...fieldRows(3, 3, i => i, { g: null }), ...fieldRows(3, 3, i => i, { g: 'null' })];
      const oneRows = [...fieldRows(3, 3, i => i, { g: 1 }), ...fieldRows(3, 3, i => i, { g: '1' })];

      expect(() => computeContourFill(nullRows, grouped)).toThrow(ContourConfigError);
      expect(() => computeContourFill(oneRows, grouped)).toThrow(
        'Group column "g" holds distinct values that both read as "1"',
      );
    });
  });

  describe('configuration', () => {
    it('should reject invalid options with ContourConfigError', () => {
      const rows = fieldRows(3, 3, () => 1);
      expect(() => computeContourFill(rows, { mapping: { ...mapping, z: '' }, breaks: [0] })).toThrow(
        ContourConfigError,
      );
      expect(() => computeContourFill(rows, { mapping, breaks: [0], binwidth: -1 })).toThrow(ContourConfigError);
    });

    it('should return nothing for an empty table', () => {
      expect(computeContourFill([], { mapping, breaks: [0] })).toEqual({ polygons: [], groups: [] });
    });
  });
});

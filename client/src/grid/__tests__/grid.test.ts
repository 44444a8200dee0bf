/**
 * Grid Validator Tests
 *
 * Rows are collected into a rectangular lattice; absent rows and NA values
 * are reported as missing cells, duplicates and bad coordinates are rejected.
 */

import {
  assertCompleteGrid,
  axisPosition,
  buildFieldGrid,
  gridIndex,
  gridRange,
  validateGrid,
} from '../grid';
import { MalformedGridError, type FieldRow } from '@/types/field';

const mapping = { x: 'lon', y: 'lat', z: 'hgt' };

function gridRows(nx: number, ny: number, f: (i: number, j: number) => number | null): FieldRow[] {
  const rows: FieldRow[] = [];
  for (let j = 0; j < ny; j++) {
    for (let i = 0; i < nx; i++) rows.push({ lon: i, lat: j, hgt: f(i, j) });
  }
  return rows;
}

describe('buildFieldGrid', () => {
  it('should sort axes and place values row-major', () => {
    const rows: FieldRow[] = [
      { lon: 20, lat: 1, hgt: 4 },
      { lon: 10, lat: 1, hgt: 3 },
      { lon: 20, lat: 0, hgt: 2 },
      { lon: 10, lat: 0, hgt: 1 },
    ];

    const grid = buildFieldGrid(rows, mapping);

    expect(grid.xs).toEqual([10, 20]);
    expect(grid.ys).toEqual([0, 1]);
    expect(Array.from(grid.values)).toEqual([1, 2, 3, 4]);
  });

  it('should accept numeric strings as coordinates and values', () => {
    const grid = buildFieldGrid(
      [
        { lon: '0', lat: '0', hgt: '1.5' },
        { lon: '1', lat: '0', hgt: '2.5' },
      ],
      mapping,
    );

    expect(grid.xs).toEqual([0, 1]);
    expect(Array.from(grid.values)).toEqual([1.5, 2.5]);
  });

  it('should treat null, undefined and NaN values as missing cells', () => {
    const grid = buildFieldGrid(
      [
        { lon: 0, lat: 0, hgt: null },
        { lon: 1, lat: 0, hgt: undefined },
        { lon: 0, lat: 1, hgt: NaN },
        { lon: 1, lat: 1, hgt: 7 },
      ],
      mapping,
    );

    expect(validateGrid(grid).missing).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 0, y: 1 },
    ]);
  });

  it('should reject duplicated cells and list them', () => {
    const rows = gridRows(2, 2, () => 1);
    rows.push({ lon: 1, lat: 1, hgt: 5 });

    try {
      buildFieldGrid(rows, mapping);
      expect.unreachable('duplicates must be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedGridError);
      if (error instanceof MalformedGridError) {
        expect(error.code).toBe('MALFORMED_GRID');
        expect(error.duplicates).toEqual([{ x: 1, y: 1 }]);
      }
    }
  });

  it('should reject rows with non-numeric coordinates', () => {
    expect(() => buildFieldGrid([{ lon: 'east', lat: 0, hgt: 1 }], mapping)).toThrow(MalformedGridError);
  });
});

describe('validateGrid', () => {
  it('should report no missing cells for a complete grid', () => {
    const grid = buildFieldGrid(gridRows(4, 3, (i, j) => i + j), mapping);
    expect(validateGrid(grid).missing).toEqual([]);
    expect(() => assertCompleteGrid(grid)).not.toThrow();
  });

  it('should report cells whose rows are absent', () => {
    const rows = gridRows(3, 3, () => 1).filter(r => !(r.lon === 1 && r.lat === 2));
    const grid = buildFieldGrid(rows, mapping);

    expect(validateGrid(grid).missing).toEqual([{ x: 1, y: 2 }]);
  });

  it('should name every coordinate of a missing edge row', () => {
    const grid = buildFieldGrid(gridRows(5, 5, (i, j) => (j === 4 ? null : i * j)), mapping);

    try {
      assertCompleteGrid(grid);
      expect.unreachable('incomplete grid must be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedGridError);
      if (error instanceof MalformedGridError) {
        expect(error.missing).toEqual([
          { x: 0, y: 4 },
          { x: 1, y: 4 },
          { x: 2, y: 4 },
          { x: 3, y: 4 },
          { x: 4, y: 4 },
        ]);
        expect(error.message).toBe('Grid is missing 5 cell(s): (0, 4), (1, 4), (2, 4), (3, 4), (4, 4)');
      }
    }
  });
});

describe('grid helpers', () => {
  it('should index row-major', () => {
    const grid = buildFieldGrid(gridRows(4, 3, (i, j) => 10 * j + i), mapping);
    expect(grid.values[gridIndex(3, 2, grid)]).toBe(23);
  });

  it('should return the finite range, or null for an empty grid', () => {
    const grid = buildFieldGrid(gridRows(3, 2, (i, j) => (i === 0 ? null : i - j * 4)), mapping);
    expect(gridRange(grid)).toEqual([-3, 2]);
    expect(gridRange({ xs: [], ys: [], values: new Float64Array(0) })).toBeNull();
  });

  it('should map fractional indices piecewise-linearly and clamp at the ends', () => {
    const axis = [0, 10, 30];
    expect(axisPosition(axis, 0)).toBe(0);
    expect(axisPosition(axis, 0.5)).toBe(5);
    expect(axisPosition(axis, 1.5)).toBe(20);
    expect(axisPosition(axis, 2)).toBe(30);
    expect(axisPosition(axis, -1)).toBe(0);
    expect(axisPosition(axis, 7)).toBe(30);
  });
});

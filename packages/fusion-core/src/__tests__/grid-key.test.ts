import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  DEFAULT_GRID_DENSITY,
  roundHalfAwayFromZero,
  gridCell,
  cellKey,
  gridKey,
} from '../fusion/index.js';

describe('roundHalfAwayFromZero', () => {
  it('rounds halves away from zero on both sides', () => {
    expect(roundHalfAwayFromZero(0.5)).toBe(1);
    expect(roundHalfAwayFromZero(-0.5)).toBe(-1);
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(1.49)).toBe(1);
  });

  it('folds negative zero into zero', () => {
    expect(Object.is(roundHalfAwayFromZero(-0.2), 0)).toBe(true);
    expect(Object.is(roundHalfAwayFromZero(-0), 0)).toBe(true);
  });
});

describe('gridCell', () => {
  it('quantizes to centimetres by default', () => {
    expect(DEFAULT_GRID_DENSITY).toBe(100);
    expect(gridCell({ x: 0.123, y: -0.456, z: 1.0 })).toEqual({ i: 12, j: -46, k: 100 });
  });

  it('honours a custom density', () => {
    expect(gridCell({ x: 0.123, y: 0, z: 0 }, 10)).toEqual({ i: 1, j: 0, k: 0 });
  });
});

describe('gridKey', () => {
  it('encodes the cell triple', () => {
    expect(cellKey({ i: 1, j: -2, k: 3 })).toBe('1,-2,3');
    expect(gridKey({ x: 0.01, y: -0.02, z: 0.03 })).toBe('1,-2,3');
  });

  it('collapses points less than one cell apart inside a cell', () => {
    expect(gridKey({ x: 0.001, y: 0.002, z: -0.003 })).toBe(gridKey({ x: 0.004, y: -0.004, z: 0.004 }));
  });

  it('separates points one cell apart across a rounding boundary', () => {
    expect(gridKey({ x: 0.004, y: 0, z: 0 })).not.toBe(gridKey({ x: 0.014, y: 0, z: 0 }));
    expect(gridKey({ x: 0, y: 0, z: -0.004 })).not.toBe(gridKey({ x: 0, y: 0, z: -0.006 }));
  });

  it('treats -0 and 0 as the same cell', () => {
    expect(gridKey({ x: -0.001, y: 0, z: 0 })).toBe('0,0,0');
  });

  it('is equal exactly when the integer cells are equal (property-based)', () => {
    const cell = fc.record({
      i: fc.integer({ min: -1e9, max: 1e9 }),
      j: fc.integer({ min: -1e9, max: 1e9 }),
      k: fc.integer({ min: -1e9, max: 1e9 }),
    });
    fc.assert(
      fc.property(cell, cell, (a, b) => {
        const same = a.i === b.i && a.j === b.j && a.k === b.k;
        return (cellKey(a) === cellKey(b)) === same;
      }),
    );
  });

  it('places grid centres in their own cell (property-based)', () => {
    const int = fc.integer({ min: -100000, max: 100000 });
    fc.assert(
      fc.property(int, int, int, (i, j, k) => {
        const key = gridKey({ x: i / 100, y: j / 100, z: k / 100 });
        return key === cellKey({ i, j, k });
      }),
    );
  });
});

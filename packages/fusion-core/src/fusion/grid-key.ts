// ---------------------------------------------------------------------------
// Fusion: Grid Keys
// ---------------------------------------------------------------------------
// A world position is quantized to an integer cell (i, j, k) at `density`
// cells per metre. The key is the decimal encoding of the full triple, so two
// positions share a key exactly when their cells are equal; there is no
// coordinate range outside which distinct cells alias.
// ---------------------------------------------------------------------------

import type { Vector3 } from '../types.js';

/** Default quantization: 100 cells per metre (1 cm cells). */
export const DEFAULT_GRID_DENSITY = 100;

/** Integer cell coordinates. */
export interface GridCell {
  i: number;
  j: number;
  k: number;
}

/** Cell identifier, "i,j,k". */
export type GridKey = `${number},${number},${number}`;

/** Round half away from zero; folds -0 into 0. */
export function roundHalfAwayFromZero(v: number): number {
  const r = Math.sign(v) * Math.round(Math.abs(v));
  return r === 0 ? 0 : r;
}

/** Quantize a position to its grid cell. */
export function gridCell(position: Vector3, density: number = DEFAULT_GRID_DENSITY): GridCell {
  return {
    i: roundHalfAwayFromZero(position.x * density),
    j: roundHalfAwayFromZero(position.y * density),
    k: roundHalfAwayFromZero(position.z * density),
  };
}

/** Key of an integer cell. */
export function cellKey(cell: GridCell): GridKey {
  return `${cell.i},${cell.j},${cell.k}`;
}

/** Key of the cell containing `position`. */
export function gridKey(position: Vector3, density: number = DEFAULT_GRID_DENSITY): GridKey {
  return cellKey(gridCell(position, density));
}

// ---------------------------------------------------------------------------
// Color: Limited-range YCbCr (BT.601) to RGBA
// ---------------------------------------------------------------------------

import type { RGBA } from '../types.js';
import type { ChromaSampler, ScalarSampler } from '../planes/plane-sampler.js';

function clampByte(v: number): number {
  return Math.max(0, Math.min(255, v));
}

/**
 * Convert one 8-bit limited-range YCbCr sample to RGBA in [0, 1].
 * Alpha is always 1. Defined for every 8-bit input.
 */
export function decodeYCbCr(y: number, cb: number, cr: number): RGBA {
  const yp = y - 16;
  const cbp = cb - 128;
  const crp = cr - 128;

  const r = 1.164 * yp + 1.596 * crp;
  const g = 1.164 * yp - 0.392 * cbp - 0.813 * crp;
  const b = 1.164 * yp + 2.017 * cbp;

  return {
    r: clampByte(r) / 255,
    g: clampByte(g) / 255,
    b: clampByte(b) / 255,
    a: 1,
  };
}

/** Read and decode the colour at luma pixel (col, row) of a 4:2:0 image. */
export function sampleColor(
  luma: ScalarSampler,
  chroma: ChromaSampler,
  col: number,
  row: number,
): RGBA {
  return decodeYCbCr(luma.at(col, row), chroma.cb(col, row), chroma.cr(col, row));
}

// ---------------------------------------------------------------------------
// Planes: Typed Samplers over Strided Planes
// ---------------------------------------------------------------------------
// Layout is validated once when a sampler is created; per-sample reads do no
// bounds checking. Callers guarantee 0 <= col < width and 0 <= row < height
// (in luma resolution for chroma samplers).
// ---------------------------------------------------------------------------

import { PLANE_ELEMENT_SIZE } from './pixel-buffer.js';
import type { PlaneDescriptor, PlaneFormat } from './pixel-buffer.js';

/** Raised when a plane descriptor cannot describe its own samples. */
export class PlaneLayoutError extends Error {
  constructor(
    public readonly format: PlaneFormat,
    message: string,
  ) {
    super(`Invalid ${format} plane: ${message}`);
    this.name = 'PlaneLayoutError';
  }
}

/** Scalar sample reader. */
export interface ScalarSampler {
  readonly width: number;
  readonly height: number;
  at(col: number, row: number): number;
}

/** Interleaved 4:2:0 chroma reader, addressed in luma coordinates. */
export interface ChromaSampler {
  /** Width/height of the subsampled plane (in CbCr pairs). */
  readonly width: number;
  readonly height: number;
  cb(col: number, row: number): number;
  cr(col: number, row: number): number;
}

/** Minimum number of bytes a plane occupies: full strides for all rows but the last. */
export function requiredPlaneBytes(
  width: number,
  height: number,
  bytesPerRow: number,
  format: PlaneFormat,
): number {
  if (width === 0 || height === 0) return 0;
  return bytesPerRow * (height - 1) + width * PLANE_ELEMENT_SIZE[format];
}

function validate(plane: PlaneDescriptor, expected: PlaneFormat): void {
  const { width, height, bytesPerRow, byteOffset, format } = plane;
  if (format !== expected) {
    throw new PlaneLayoutError(expected, `expected ${expected} samples, got ${format}`);
  }
  for (const [name, value] of [
    ['width', width],
    ['height', height],
    ['bytesPerRow', bytesPerRow],
    ['byteOffset', byteOffset],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw new PlaneLayoutError(format, `${name} must be a non-negative integer`);
    }
  }
  if (bytesPerRow < width * PLANE_ELEMENT_SIZE[format]) {
    throw new PlaneLayoutError(format, `row stride ${bytesPerRow} is shorter than ${width} samples`);
  }
  const needed = byteOffset + requiredPlaneBytes(width, height, bytesPerRow, format);
  if (plane.data.byteLength < needed) {
    throw new PlaneLayoutError(format, `needs ${needed} bytes, buffer has ${plane.data.byteLength}`);
  }
}

/** Little-endian float32 plane (depth maps). */
export function createFloat32Sampler(plane: PlaneDescriptor): ScalarSampler {
  validate(plane, 'float32');
  const view = new DataView(
    plane.data.buffer,
    plane.data.byteOffset + plane.byteOffset,
    plane.data.byteLength - plane.byteOffset,
  );
  const stride = plane.bytesPerRow;
  return {
    width: plane.width,
    height: plane.height,
    at: (col, row) => view.getFloat32(row * stride + col * 4, true),
  };
}

/** 8-bit plane (confidence codes, luma). */
export function createUint8Sampler(plane: PlaneDescriptor): ScalarSampler {
  validate(plane, 'uint8');
  const bytes = plane.data;
  const base = plane.byteOffset;
  const stride = plane.bytesPerRow;
  return {
    width: plane.width,
    height: plane.height,
    at: (col, row) => bytes[base + row * stride + col]!,
  };
}

/** Interleaved CbCr plane at half resolution on both axes. */
export function createCbCrSampler(plane: PlaneDescriptor): ChromaSampler {
  validate(plane, 'cbcr8');
  const bytes = plane.data;
  const base = plane.byteOffset;
  const stride = plane.bytesPerRow;
  const index = (col: number, row: number): number =>
    base + (row >> 1) * stride + (col >> 1) * 2;
  return {
    width: plane.width,
    height: plane.height,
    cb: (col, row) => bytes[index(col, row)]!,
    cr: (col, row) => bytes[index(col, row) + 1]!,
  };
}

// ---------------------------------------------------------------------------
// @depthfuse/fusion-core: Shared Types and Vector/Matrix Utilities
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Vector types
// ---------------------------------------------------------------------------

/** 3D vector. */
export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

/** 4D vector / homogeneous coordinate. */
export interface Vec4 {
  x: number;
  y: number;
  z: number;
  w: number;
}

/** Colour with channels in [0, 1]. */
export interface RGBA {
  r: number;
  g: number;
  b: number;
  a: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Raised when a matrix has no inverse (pivot below tolerance). */
export class SingularMatrixError extends Error {
  constructor(public readonly size: 3 | 4) {
    super(`Matrix${size}x${size} is singular or near-singular`);
    this.name = 'SingularMatrixError';
  }
}

const PIVOT_EPSILON = 1e-15;

// ---------------------------------------------------------------------------
// Matrix4x4: 16-element Float64Array, column-major (graphics convention)
// ---------------------------------------------------------------------------

/** 4x4 matrix stored as a 16-element Float64Array in column-major order.
 *
 * Layout: [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 * i.e. element at row r, col c is at index c*4 + r.
 */
export type Matrix4x4 = Float64Array;

/** Create a 4x4 identity matrix. */
export function mat4Identity(): Matrix4x4 {
  const m = new Float64Array(16);
  m[0] = 1;
  m[5] = 1;
  m[10] = 1;
  m[15] = 1;
  return m;
}

/** Build a column-major 4x4 matrix from four row tuples (reads like the printed matrix). */
export function mat4FromRows(
  rows: readonly [
    readonly [number, number, number, number],
    readonly [number, number, number, number],
    readonly [number, number, number, number],
    readonly [number, number, number, number],
  ],
): Matrix4x4 {
  const m = new Float64Array(16);
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      m[c * 4 + r] = rows[r]![c]!;
    }
  }
  return m;
}

/** Translation-only 4x4 transform. */
export function mat4Translation(tx: number, ty: number, tz: number): Matrix4x4 {
  const m = mat4Identity();
  m[12] = tx;
  m[13] = ty;
  m[14] = tz;
  return m;
}

/** Rotation of `angle` radians about the +Z axis (counter-clockwise looking down -Z). */
export function mat4RotationZ(angle: number): Matrix4x4 {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const m = mat4Identity();
  m[0] = c;
  m[1] = s;
  m[4] = -s;
  m[5] = c;
  return m;
}

/** Multiply two 4x4 matrices: C = A * B (column-major). */
export function mat4Multiply(A: Matrix4x4, B: Matrix4x4): Matrix4x4 {
  const C = new Float64Array(16);
  for (let col = 0; col < 4; col++) {
    for (let row = 0; row < 4; row++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += A[k * 4 + row]! * B[col * 4 + k]!;
      }
      C[col * 4 + row] = sum;
    }
  }
  return C;
}

/** Invert a 4x4 matrix via Gauss-Jordan elimination with partial pivoting. */
export function mat4Inverse(m: Matrix4x4): Matrix4x4 {
  // Augmented 4x8 matrix in row-major for convenience
  const aug = new Float64Array(4 * 8);
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      aug[r * 8 + c] = m[c * 4 + r]!;
    }
    aug[r * 8 + (4 + r)] = 1;
  }

  for (let col = 0; col < 4; col++) {
    let maxRow = col;
    let maxVal = Math.abs(aug[col * 8 + col]!);
    for (let row = col + 1; row < 4; row++) {
      const val = Math.abs(aug[row * 8 + col]!);
      if (val > maxVal) {
        maxVal = val;
        maxRow = row;
      }
    }
    if (maxRow !== col) {
      for (let j = 0; j < 8; j++) {
        const tmp = aug[col * 8 + j]!;
        aug[col * 8 + j] = aug[maxRow * 8 + j]!;
        aug[maxRow * 8 + j] = tmp;
      }
    }

    const pivot = aug[col * 8 + col]!;
    // NaN pivots fail this comparison too
    if (!(Math.abs(pivot) >= PIVOT_EPSILON)) {
      throw new SingularMatrixError(4);
    }

    for (let j = 0; j < 8; j++) {
      aug[col * 8 + j] = aug[col * 8 + j]! / pivot;
    }

    for (let row = 0; row < 4; row++) {
      if (row === col) continue;
      const factor = aug[row * 8 + col]!;
      for (let j = 0; j < 8; j++) {
        aug[row * 8 + j] = aug[row * 8 + j]! - factor * aug[col * 8 + j]!;
      }
    }
  }

  const inv = new Float64Array(16);
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      inv[c * 4 + r] = aug[r * 8 + (4 + c)]!;
    }
  }
  return inv;
}

/** Apply a 4x4 matrix to a homogeneous point (x, y, z, 1). No divide by w. */
export function mat4TransformPoint(m: Matrix4x4, p: Vector3): Vec4 {
  return {
    x: m[0]! * p.x + m[4]! * p.y + m[8]! * p.z + m[12]!,
    y: m[1]! * p.x + m[5]! * p.y + m[9]! * p.z + m[13]!,
    z: m[2]! * p.x + m[6]! * p.y + m[10]! * p.z + m[14]!,
    w: m[3]! * p.x + m[7]! * p.y + m[11]! * p.z + m[15]!,
  };
}

// ---------------------------------------------------------------------------
// Matrix3x3: 9-element Float64Array, column-major
// ---------------------------------------------------------------------------

/** 3x3 matrix stored as a 9-element Float64Array in column-major order.
 *
 * Element at row r, col c is at index c*3 + r.
 */
export type Matrix3x3 = Float64Array;

/** Create a 3x3 identity matrix. */
export function mat3Identity(): Matrix3x3 {
  const m = new Float64Array(9);
  m[0] = 1;
  m[4] = 1;
  m[8] = 1;
  return m;
}

/** Invert a 3x3 matrix via its adjugate. */
export function mat3Inverse(m: Matrix3x3): Matrix3x3 {
  const a = m[0]!, b = m[3]!, c = m[6]!;
  const d = m[1]!, e = m[4]!, f = m[7]!;
  const g = m[2]!, h = m[5]!, i = m[8]!;

  const A = e * i - f * h;
  const B = -(d * i - f * g);
  const C = d * h - e * g;
  const det = a * A + b * B + c * C;
  if (!(Math.abs(det) >= PIVOT_EPSILON)) {
    throw new SingularMatrixError(3);
  }

  const inv = new Float64Array(9);
  // Row 0
  inv[0] = A / det;
  inv[3] = -(b * i - c * h) / det;
  inv[6] = (b * f - c * e) / det;
  // Row 1
  inv[1] = B / det;
  inv[4] = (a * i - c * g) / det;
  inv[7] = -(a * f - c * d) / det;
  // Row 2
  inv[2] = C / det;
  inv[5] = -(a * h - b * g) / det;
  inv[8] = (a * e - b * d) / det;
  return inv;
}

/** Apply a 3x3 matrix to a column vector. */
export function mat3TransformVector(m: Matrix3x3, v: Vector3): Vector3 {
  return {
    x: m[0]! * v.x + m[3]! * v.y + m[6]! * v.z,
    y: m[1]! * v.x + m[4]! * v.y + m[7]! * v.z,
    z: m[2]! * v.x + m[5]! * v.y + m[8]! * v.z,
  };
}

// ---------------------------------------------------------------------------
// Camera
// ---------------------------------------------------------------------------

/** Pinhole parameters, in colour-image pixels. */
export interface PinholeParameters {
  /** Focal length in pixels (x-axis). */
  fx: number;
  /** Focal length in pixels (y-axis). */
  fy: number;
  /** Principal point x (pixels). */
  cx: number;
  /** Principal point y (pixels). */
  cy: number;
  /** Axis skew; 0 for square pixels. */
  skew?: number;
}

/**
 * Build the 3x3 projection matrix
 *
 *     | fx  s  cx |
 *     |  0 fy  cy |
 *     |  0  0   1 |
 */
export function intrinsicsMatrix(p: PinholeParameters): Matrix3x3 {
  const m = mat3Identity();
  m[0] = p.fx;
  m[3] = p.skew ?? 0;
  m[4] = p.fy;
  m[6] = p.cx;
  m[7] = p.cy;
  return m;
}

/** How the captured image was presented on the display. */
export type DisplayOrientation =
  | 'portrait'
  | 'portraitUpsideDown'
  | 'landscapeLeft'
  | 'landscapeRight';

export const DISPLAY_ORIENTATIONS: readonly DisplayOrientation[] = [
  'portrait',
  'portraitUpsideDown',
  'landscapeLeft',
  'landscapeRight',
];

/** Per-pixel depth confidence tiers as the sensor encodes them. */
export const ConfidenceLevel = {
  Low: 0,
  Medium: 1,
  High: 2,
} as const;

export type ConfidenceLevel = (typeof ConfidenceLevel)[keyof typeof ConfidenceLevel];

// ---------------------------------------------------------------------------
// Point cloud
// ---------------------------------------------------------------------------

/** A fused, coloured world-space point. Frozen once created. */
export interface Vertex {
  readonly position: Readonly<Vector3>;
  readonly color: Readonly<RGBA>;
}

/** Create an immutable vertex, copying the inputs. */
export function createVertex(position: Vector3, color: RGBA): Vertex {
  return Object.freeze({
    position: Object.freeze({ x: position.x, y: position.y, z: position.z }),
    color: Object.freeze({ r: color.r, g: color.g, b: color.b, a: color.a }),
  });
}

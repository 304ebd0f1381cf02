import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  AXIS_FLIP,
  orientationAngle,
  viewMatrix,
  buildCameraTransform,
} from '../camera/index.js';
import {
  DISPLAY_ORIENTATIONS,
  SingularMatrixError,
  mat4Identity,
  mat4Multiply,
  mat4RotationZ,
  mat4Translation,
  mat4TransformPoint,
} from '../types.js';
import type { Matrix4x4 } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function expectMatrixClose(actual: Matrix4x4, expected: Matrix4x4, digits = 9): void {
  expect(actual.length).toBe(16);
  for (let i = 0; i < 16; i++) {
    expect(actual[i]).toBeCloseTo(expected[i]!, digits);
  }
}

// ---------------------------------------------------------------------------
// orientationAngle
// ---------------------------------------------------------------------------

describe('orientationAngle', () => {
  it('maps each orientation to its compositor rotation', () => {
    expect(orientationAngle('landscapeRight')).toBe(0);
    expect(orientationAngle('landscapeLeft')).toBe(Math.PI);
    expect(orientationAngle('portrait')).toBe(Math.PI / 2);
    expect(orientationAngle('portraitUpsideDown')).toBe(-Math.PI / 2);
  });
});

// ---------------------------------------------------------------------------
// AXIS_FLIP / viewMatrix
// ---------------------------------------------------------------------------

describe('AXIS_FLIP', () => {
  it('negates Y and Z', () => {
    const p = mat4TransformPoint(AXIS_FLIP, { x: 1, y: 2, z: 3 });
    expect(p).toEqual({ x: 1, y: -2, z: -3, w: 1 });
  });
});

describe('viewMatrix', () => {
  it('is the inverse pose in landscape-right', () => {
    const pose = mat4Translation(1, 2, 3);
    expectMatrixClose(viewMatrix(pose, 'landscapeRight'), mat4Translation(-1, -2, -3));
  });

  it('rotates the view against the display rotation', () => {
    expectMatrixClose(viewMatrix(mat4Identity(), 'portrait'), mat4RotationZ(-Math.PI / 2));
  });
});

// ---------------------------------------------------------------------------
// buildCameraTransform
// ---------------------------------------------------------------------------

describe('buildCameraTransform', () => {
  it('reduces to the axis flip for an identity pose in every orientation', () => {
    for (const orientation of DISPLAY_ORIENTATIONS) {
      expectMatrixClose(buildCameraTransform(mat4Identity(), orientation), AXIS_FLIP);
    }
  });

  it('places a point one metre ahead of a translated camera', () => {
    const t = buildCameraTransform(mat4Translation(1, 2, 3), 'portrait');
    const p = mat4TransformPoint(t, { x: 0, y: 0, z: 1 });
    expect(p.x).toBeCloseTo(1, 9);
    expect(p.y).toBeCloseTo(2, 9);
    expect(p.z).toBeCloseTo(2, 9);
    expect(p.w).toBeCloseTo(1, 12);
  });

  it('maps sensor-down to world-down', () => {
    // +Y in sensor space points down the image
    const t = buildCameraTransform(mat4Identity(), 'landscapeLeft');
    const p = mat4TransformPoint(t, { x: 0, y: 1, z: 0 });
    expect(p.y).toBeCloseTo(-1, 9);
  });

  it('equals pose * AXIS_FLIP for rigid poses (property-based)', () => {
    const angle = fc.double({ min: -Math.PI, max: Math.PI, noNaN: true });
    const coord = fc.double({ min: -50, max: 50, noNaN: true });
    const orientation = fc.constantFrom(...DISPLAY_ORIENTATIONS);
    fc.assert(
      fc.property(angle, coord, coord, coord, orientation, (a, tx, ty, tz, o) => {
        const pose = mat4Multiply(mat4Translation(tx, ty, tz), mat4RotationZ(a));
        const actual = buildCameraTransform(pose, o);
        const expected = mat4Multiply(pose, AXIS_FLIP);
        for (let i = 0; i < 16; i++) {
          if (Math.abs(actual[i]! - expected[i]!) > 1e-9) return false;
        }
        return true;
      }),
    );
  });

  it('throws for a singular pose', () => {
    expect(() => buildCameraTransform(new Float64Array(16), 'portrait')).toThrow(SingularMatrixError);
  });
});

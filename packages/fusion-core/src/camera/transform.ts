// ---------------------------------------------------------------------------
// Camera: Camera-to-World Transform
// ---------------------------------------------------------------------------
// Unprojected points live in the sensor's camera space (+X right, +Y down,
// +Z forward). World space is right-handed with +Y up and the camera looking
// down -Z. The display may show the image rotated; the view matrix for an
// orientation carries that rotation, and the orientation rotation applied
// after the axis flip undoes it again for the unprojected rays.
// ---------------------------------------------------------------------------

import type { DisplayOrientation, Matrix4x4 } from '../types.js';
import {
  mat4FromRows,
  mat4Inverse,
  mat4Multiply,
  mat4RotationZ,
} from '../types.js';

/** Converts sensor camera space (Y down, Z forward) to Y up, Z backward. */
export const AXIS_FLIP: Matrix4x4 = mat4FromRows([
  [1, 0, 0, 0],
  [0, -1, 0, 0],
  [0, 0, -1, 0],
  [0, 0, 0, 1],
]);

/** Rotation about the viewing axis the compositor applies for each orientation. */
export function orientationAngle(orientation: DisplayOrientation): number {
  switch (orientation) {
    case 'landscapeRight':
      return 0;
    case 'landscapeLeft':
      return Math.PI;
    case 'portrait':
      return Math.PI / 2;
    case 'portraitUpsideDown':
      return -Math.PI / 2;
  }
}

/**
 * World-to-view matrix for the image as displayed in `orientation`.
 *
 * @param pose Camera-to-world transform of the sensor (column-major).
 * @throws SingularMatrixError when the pose cannot be inverted.
 */
export function viewMatrix(pose: Matrix4x4, orientation: DisplayOrientation): Matrix4x4 {
  return mat4Multiply(mat4RotationZ(-orientationAngle(orientation)), mat4Inverse(pose));
}

/**
 * Transform taking an unprojected sensor-space point to world space:
 * `inverse(view) * AXIS_FLIP * Rz(angle)`.
 *
 * Must be rebuilt every frame since the pose changes every frame.
 *
 * @throws SingularMatrixError when the pose cannot be inverted.
 */
export function buildCameraTransform(
  pose: Matrix4x4,
  orientation: DisplayOrientation,
): Matrix4x4 {
  const rotateToCamera = mat4Multiply(AXIS_FLIP, mat4RotationZ(orientationAngle(orientation)));
  return mat4Multiply(mat4Inverse(viewMatrix(pose, orientation)), rotateToCamera);
}

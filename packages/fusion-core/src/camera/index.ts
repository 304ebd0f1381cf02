// ---------------------------------------------------------------------------
// Camera: barrel export
// ---------------------------------------------------------------------------

export {
  AXIS_FLIP,
  orientationAngle,
  viewMatrix,
  buildCameraTransform,
} from './transform.js';

// ---------------------------------------------------------------------------
// Planes: barrel export
// ---------------------------------------------------------------------------

export {
  PixelBuffer,
  LockScope,
  withReadLock,
  BufferNotLockedError,
  PLANE_ELEMENT_SIZE,
  type PlaneDescriptor,
  type PlaneFormat,
} from './pixel-buffer.js';

export {
  createFloat32Sampler,
  createUint8Sampler,
  createCbCrSampler,
  requiredPlaneBytes,
  PlaneLayoutError,
  type ScalarSampler,
  type ChromaSampler,
} from './plane-sampler.js';

import { PixelBuffer } from '../planes/pixel-buffer.js';
import type { PlaneDescriptor } from '../planes/pixel-buffer.js';
import type { CapturedFrame } from '../fusion/frame.js';
import type { DisplayOrientation, Matrix3x3, Matrix4x4 } from '../types.js';
import { intrinsicsMatrix, mat4Identity } from '../types.js';

// ---------------------------------------------------------------------------
// Synthetic frame builders shared by the fusion tests
// ---------------------------------------------------------------------------

type PixelFn = (col: number, row: number) => number;

/** Float32 plane with optional row padding. */
export function float32Plane(width: number, height: number, value: PixelFn, padding = 0): PlaneDescriptor {
  const bytesPerRow = width * 4 + padding;
  const data = new Uint8Array(bytesPerRow * height);
  const view = new DataView(data.buffer);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      view.setFloat32(row * bytesPerRow + col * 4, value(col, row), true);
    }
  }
  return { data, byteOffset: 0, width, height, bytesPerRow, format: 'float32' };
}

/** 8-bit plane with optional row padding. */
export function uint8Plane(width: number, height: number, value: PixelFn, padding = 0): PlaneDescriptor {
  const bytesPerRow = width + padding;
  const data = new Uint8Array(bytesPerRow * height);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      data[row * bytesPerRow + col] = value(col, row);
    }
  }
  return { data, byteOffset: 0, width, height, bytesPerRow, format: 'uint8' };
}

/** Interleaved CbCr plane for a `lumaWidth` x `lumaHeight` image; values in chroma coordinates. */
export function cbcrPlane(
  lumaWidth: number,
  lumaHeight: number,
  cb: PixelFn,
  cr: PixelFn,
): PlaneDescriptor {
  const width = Math.ceil(lumaWidth / 2);
  const height = Math.ceil(lumaHeight / 2);
  const bytesPerRow = width * 2;
  const data = new Uint8Array(bytesPerRow * height);
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      data[row * bytesPerRow + col * 2] = cb(col, row);
      data[row * bytesPerRow + col * 2 + 1] = cr(col, row);
    }
  }
  return { data, byteOffset: 0, width, height, bytesPerRow, format: 'cbcr8' };
}

export interface SyntheticFrameSpec {
  depthWidth?: number;
  depthHeight?: number;
  depth?: PixelFn;
  confidence?: PixelFn;
  confidenceWidth?: number;
  confidenceHeight?: number;
  imageWidth?: number;
  imageHeight?: number;
  luma?: PixelFn;
  cb?: PixelFn;
  cr?: PixelFn;
  intrinsics?: Matrix3x3;
  pose?: Matrix4x4;
  orientation?: DisplayOrientation;
}

/**
 * 2x2 depth map at 1 m, all high confidence, 4x4 mid-grey image,
 * fx = fy = 100 with the principal point at the origin, identity pose.
 */
export function syntheticFrame(spec: SyntheticFrameSpec = {}): CapturedFrame {
  const depthWidth = spec.depthWidth ?? 2;
  const depthHeight = spec.depthHeight ?? 2;
  const imageWidth = spec.imageWidth ?? 4;
  const imageHeight = spec.imageHeight ?? 4;

  return {
    timestamp: 0,
    depth: new PixelBuffer([float32Plane(depthWidth, depthHeight, spec.depth ?? (() => 1))]),
    confidence: new PixelBuffer([
      uint8Plane(
        spec.confidenceWidth ?? depthWidth,
        spec.confidenceHeight ?? depthHeight,
        spec.confidence ?? (() => 2),
      ),
    ]),
    image: new PixelBuffer([
      uint8Plane(imageWidth, imageHeight, spec.luma ?? (() => 128)),
      cbcrPlane(imageWidth, imageHeight, spec.cb ?? (() => 128), spec.cr ?? (() => 128)),
    ]),
    intrinsics: spec.intrinsics ?? intrinsicsMatrix({ fx: 100, fy: 100, cx: 0, cy: 0 }),
    cameraPose: spec.pose ?? mat4Identity(),
    orientation: spec.orientation ?? 'portrait',
  };
}

/** Every buffer attached to a frame. */
export function frameBuffers(frame: CapturedFrame): PixelBuffer[] {
  return [frame.depth, frame.smoothedDepth, frame.confidence, frame.image].filter(
    (b): b is PixelBuffer => b !== undefined,
  );
}

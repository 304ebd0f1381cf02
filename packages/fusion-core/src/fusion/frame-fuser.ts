// ---------------------------------------------------------------------------
// Fusion: Frame to Point Cloud
// ---------------------------------------------------------------------------
// Every high-confidence, in-range depth pixel is unprojected through the
// inverse intrinsics, moved to world space with the per-frame camera
// transform, quantized to a grid cell, and stored with its colour unless the
// cell is already occupied. Pixels are visited row-major; within a frame the
// first pixel to reach a cell wins.
// ---------------------------------------------------------------------------

import type { Matrix3x3, Matrix4x4 } from '../types.js';
import { SingularMatrixError, createVertex, mat3Inverse } from '../types.js';
import { buildCameraTransform } from '../camera/transform.js';
import { sampleColor } from '../color/ycbcr.js';
import { LockScope } from '../planes/pixel-buffer.js';
import type { PlaneDescriptor } from '../planes/pixel-buffer.js';
import {
  PlaneLayoutError,
  createCbCrSampler,
  createFloat32Sampler,
  createUint8Sampler,
} from '../planes/plane-sampler.js';
import type { ChromaSampler, ScalarSampler } from '../planes/plane-sampler.js';
import type { PointStore } from '../store/point-store.js';
import { gridKey } from './grid-key.js';
import { DEFAULT_FUSION_OPTIONS } from './frame.js';
import type { CapturedFrame, FusionOptions, FusionResult, SkipReason } from './frame.js';

interface FrameSamplers {
  depth: ScalarSampler;
  confidence: ScalarSampler;
  luma: ScalarSampler;
  chroma: ChromaSampler;
}

function skipped(reason: SkipReason): FusionResult {
  return { status: 'skipped', reason };
}

/** Clamp a rounded pixel index into [0, size - 1]. */
function clampIndex(v: number, size: number): number {
  return v < 0 ? 0 : v >= size ? size - 1 : v;
}

function createSamplers(
  depthPlane: PlaneDescriptor,
  confidencePlane: PlaneDescriptor,
  lumaPlane: PlaneDescriptor,
  chromaPlane: PlaneDescriptor,
): FrameSamplers | null {
  try {
    const samplers: FrameSamplers = {
      depth: createFloat32Sampler(depthPlane),
      confidence: createUint8Sampler(confidencePlane),
      luma: createUint8Sampler(lumaPlane),
      chroma: createCbCrSampler(chromaPlane),
    };
    const { depth, confidence, luma, chroma } = samplers;
    // Nearest-pixel lookups need at least one sample to land on
    if (depth.width > 0 && depth.height > 0) {
      if (confidence.width === 0 || confidence.height === 0) return null;
      if (luma.width === 0 || luma.height === 0) return null;
    }
    if (chroma.width < Math.ceil(luma.width / 2) || chroma.height < Math.ceil(luma.height / 2)) {
      return null;
    }
    return samplers;
  } catch (err) {
    if (err instanceof PlaneLayoutError) return null;
    throw err;
  }
}

/**
 * Fuse one frame into `store`.
 *
 * Never throws for a frame whose buffers are readable: frames missing a
 * required plane, with malformed plane layouts, or with non-invertible
 * intrinsics or pose are skipped whole without touching the store. Every
 * buffer lock taken here is released before returning.
 */
export function fuseFrame(
  frame: CapturedFrame,
  store: PointStore,
  options: FusionOptions = DEFAULT_FUSION_OPTIONS,
): FusionResult {
  const depthBuffer = options.preferSmoothedDepth
    ? (frame.smoothedDepth ?? frame.depth)
    : (frame.depth ?? frame.smoothedDepth);

  if (depthBuffer === undefined) return skipped('missing-depth');
  if (frame.confidence === undefined) return skipped('missing-confidence');
  if (frame.image === undefined) return skipped('missing-color');

  let inverseIntrinsics: Matrix3x3;
  let cameraTransform: Matrix4x4;
  try {
    inverseIntrinsics = mat3Inverse(frame.intrinsics);
  } catch (err) {
    if (err instanceof SingularMatrixError) return skipped('singular-intrinsics');
    throw err;
  }
  try {
    cameraTransform = buildCameraTransform(frame.cameraPose, frame.orientation);
  } catch (err) {
    if (err instanceof SingularMatrixError) return skipped('singular-pose');
    throw err;
  }

  const scope = new LockScope();
  try {
    const depthPlanes = scope.acquire(depthBuffer);
    if (depthPlanes === null || depthPlanes[0] === undefined) return skipped('missing-depth');

    const confidencePlanes = scope.acquire(frame.confidence);
    if (confidencePlanes === null || confidencePlanes[0] === undefined) {
      return skipped('missing-confidence');
    }

    const imagePlanes = scope.acquire(frame.image);
    if (imagePlanes === null || imagePlanes[0] === undefined || imagePlanes[1] === undefined) {
      return skipped('missing-color');
    }

    const samplers = createSamplers(depthPlanes[0], confidencePlanes[0], imagePlanes[0], imagePlanes[1]);
    if (samplers === null) return skipped('invalid-layout');

    return integrate(samplers, inverseIntrinsics, cameraTransform, store, options);
  } finally {
    scope.releaseAll();
  }
}

function integrate(
  samplers: FrameSamplers,
  kInv: Matrix3x3,
  t: Matrix4x4,
  store: PointStore,
  options: FusionOptions,
): FusionResult {
  const { depth, confidence, luma, chroma } = samplers;
  const { density, maxDepth, requiredConfidence, minHomogeneousW } = options;

  const depthW = depth.width;
  const depthH = depth.height;
  const imageW = luma.width;
  const imageH = luma.height;
  const confW = confidence.width;
  const confH = confidence.height;
  const coRegistered = confW === depthW && confH === depthH;

  // Hoist matrix entries out of the pixel loop (column-major)
  const k00 = kInv[0]!, k10 = kInv[1]!, k20 = kInv[2]!;
  const k01 = kInv[3]!, k11 = kInv[4]!, k21 = kInv[5]!;
  const k02 = kInv[6]!, k12 = kInv[7]!, k22 = kInv[8]!;

  const t00 = t[0]!, t10 = t[1]!, t20 = t[2]!, t30 = t[3]!;
  const t01 = t[4]!, t11 = t[5]!, t21 = t[6]!, t31 = t[7]!;
  const t02 = t[8]!, t12 = t[9]!, t22 = t[10]!, t32 = t[11]!;
  const t03 = t[12]!, t13 = t[13]!, t23 = t[14]!, t33 = t[15]!;

  const rejected = { confidence: 0, range: 0, degenerate: 0 };
  let accepted = 0;
  let inserted = 0;

  // An empty depth map has no pixels; its other dimension is not a loop bound
  if (depthW === 0 || depthH === 0) {
    return { status: 'fused', examined: 0, accepted, inserted, rejected };
  }

  for (let row = 0; row < depthH; row++) {
    const v = row / depthH;
    const sy = v * imageH;

    for (let col = 0; col < depthW; col++) {
      const u = col / depthW;

      const code = coRegistered
        ? confidence.at(col, row)
        : confidence.at(
            clampIndex(Math.round(u * confW), confW),
            clampIndex(Math.round(v * confH), confH),
          );
      if (code !== requiredConfidence) {
        rejected.confidence++;
        continue;
      }

      const d = depth.at(col, row);
      if (!Number.isFinite(d)) {
        rejected.degenerate++;
        continue;
      }
      if (d > maxDepth) {
        rejected.range++;
        continue;
      }

      // Unproject (sx, sy, 1) at depth d
      const sx = u * imageW;
      const lx = (k00 * sx + k01 * sy + k02) * d;
      const ly = (k10 * sx + k11 * sy + k12) * d;
      const lz = (k20 * sx + k21 * sy + k22) * d;

      const w = t30 * lx + t31 * ly + t32 * lz + t33;
      if (!Number.isFinite(w) || w <= minHomogeneousW) {
        rejected.degenerate++;
        continue;
      }
      const x = (t00 * lx + t01 * ly + t02 * lz + t03) / w;
      const y = (t10 * lx + t11 * ly + t12 * lz + t13) / w;
      const z = (t20 * lx + t21 * ly + t22 * lz + t23) / w;
      if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
        rejected.degenerate++;
        continue;
      }

      accepted++;
      const position = { x, y, z };
      const key = gridKey(position, density);
      if (store.has(key)) continue;

      const color = sampleColor(
        luma,
        chroma,
        clampIndex(Math.round(sx), imageW),
        clampIndex(Math.round(sy), imageH),
      );
      if (store.insertIfAbsent(key, createVertex(position, color))) {
        inserted++;
      }
    }
  }

  return {
    status: 'fused',
    examined: depthW * depthH,
    accepted,
    inserted,
    rejected,
  };
}

// ---------------------------------------------------------------------------
// Fusion: Frame Input and Options
// ---------------------------------------------------------------------------

import type { ConfidenceLevel, DisplayOrientation, Matrix3x3, Matrix4x4 } from '../types.js';
import type { PixelBuffer } from '../planes/pixel-buffer.js';
import { DEFAULT_GRID_DENSITY } from './grid-key.js';

/**
 * One synchronised capture. Any buffer may be missing; fusion skips frames
 * that lack a depth source, a confidence map or a colour image.
 */
export interface CapturedFrame {
  /** Capture time in seconds. */
  timestamp: number;
  /** Raw depth, float32 metres (one plane). */
  depth?: PixelBuffer;
  /** Temporally smoothed depth, same layout as `depth`. */
  smoothedDepth?: PixelBuffer;
  /** Confidence tier codes, uint8 (one plane). */
  confidence?: PixelBuffer;
  /** 4:2:0 colour image: plane 0 luma (uint8), plane 1 interleaved CbCr. */
  image?: PixelBuffer;
  /** 3x3 projection matrix in colour-image pixels (column-major). */
  intrinsics: Matrix3x3;
  /** Camera-to-world transform of the sensor (column-major). */
  cameraPose: Matrix4x4;
  orientation: DisplayOrientation;
}

/** Tunables for a fusion pass. */
export interface FusionOptions {
  /** Grid cells per metre. */
  density: number;
  /** Depths strictly greater than this (metres) are dropped. */
  maxDepth: number;
  /** The only confidence tier accepted. */
  requiredConfidence: ConfidenceLevel;
  /** Homogeneous divisors at or below this are treated as degenerate. */
  minHomogeneousW: number;
  /** Use `smoothedDepth` when a frame carries it. */
  preferSmoothedDepth: boolean;
}

export const DEFAULT_FUSION_OPTIONS: Readonly<FusionOptions> = {
  density: DEFAULT_GRID_DENSITY,
  maxDepth: 2.0,
  requiredConfidence: 2,
  minHomogeneousW: 1e-6,
  preferSmoothedDepth: true,
};

/** Why a whole frame was skipped. */
export type SkipReason =
  | 'missing-depth'
  | 'missing-confidence'
  | 'missing-color'
  | 'invalid-layout'
  | 'singular-intrinsics'
  | 'singular-pose';

/** Per-pixel rejection tallies. */
export interface RejectionCounts {
  confidence: number;
  range: number;
  degenerate: number;
}

export type FusionResult =
  | {
      status: 'fused';
      /** Depth pixels visited. */
      examined: number;
      /** Pixels that produced a valid world point (new or duplicate). */
      accepted: number;
      /** Vertices added to the store. */
      inserted: number;
      rejected: RejectionCounts;
    }
  | {
      status: 'skipped';
      reason: SkipReason;
    };

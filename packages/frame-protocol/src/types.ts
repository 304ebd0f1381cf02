/**
 * Frame protocol types for the binary capture-frame format.
 *
 * Wire format:
 *   [4B magic "DFRM"] [1B version] [1B orientation] [1B plane mask] [1B reserved]
 *   [8B timestamp f64] [9 x f64 intrinsics] [16 x f64 camera pose]
 *   then per present plane: [4B width] [4B height] [4B bytesPerRow] [4B byteLength] [bytes]
 *
 * Matrices are column-major. All multi-byte values are little-endian.
 */

import type { DisplayOrientation, Matrix3x3, Matrix4x4, PlaneFormat } from '@depthfuse/fusion-core'

// ─── Header ─────────────────────────────────────────────────────────────────

export const FRAME_MAGIC = [0x44, 0x46, 0x52, 0x4d] as const // "DFRM"
export const FRAME_VERSION = 1 as const

export const HEADER_SIZE = 216       // 8 + 8 + 9*8 + 16*8
export const PLANE_HEADER_SIZE = 16  // width, height, bytesPerRow, byteLength

export const TIMESTAMP_OFFSET = 8
export const INTRINSICS_OFFSET = 16
export const POSE_OFFSET = 88

// ─── Orientation Codes ──────────────────────────────────────────────────────

export const ORIENT_PORTRAIT             = 1 as const
export const ORIENT_PORTRAIT_UPSIDE_DOWN = 2 as const
export const ORIENT_LANDSCAPE_LEFT       = 3 as const
export const ORIENT_LANDSCAPE_RIGHT      = 4 as const

export type OrientationCode =
  | typeof ORIENT_PORTRAIT
  | typeof ORIENT_PORTRAIT_UPSIDE_DOWN
  | typeof ORIENT_LANDSCAPE_LEFT
  | typeof ORIENT_LANDSCAPE_RIGHT

export function orientationToCode(orientation: DisplayOrientation): OrientationCode {
  switch (orientation) {
    case 'portrait':           return ORIENT_PORTRAIT
    case 'portraitUpsideDown': return ORIENT_PORTRAIT_UPSIDE_DOWN
    case 'landscapeLeft':      return ORIENT_LANDSCAPE_LEFT
    case 'landscapeRight':     return ORIENT_LANDSCAPE_RIGHT
  }
}

export function codeToOrientation(code: number): DisplayOrientation | undefined {
  switch (code) {
    case ORIENT_PORTRAIT:             return 'portrait'
    case ORIENT_PORTRAIT_UPSIDE_DOWN: return 'portraitUpsideDown'
    case ORIENT_LANDSCAPE_LEFT:       return 'landscapeLeft'
    case ORIENT_LANDSCAPE_RIGHT:      return 'landscapeRight'
    default:                          return undefined
  }
}

// ─── Plane Mask ─────────────────────────────────────────────────────────────

export const PLANE_DEPTH          = 0x01 as const
export const PLANE_SMOOTHED_DEPTH = 0x02 as const
export const PLANE_CONFIDENCE     = 0x04 as const
export const PLANE_LUMA           = 0x08 as const
export const PLANE_CHROMA         = 0x10 as const
export const PLANE_MASK_ALL       = 0x1f

export type PlaneSlot = 'depth' | 'smoothedDepth' | 'confidence' | 'luma' | 'chroma'

/** Planes in wire order with their mask bit and sample format. */
export const PLANE_SLOTS: readonly { slot: PlaneSlot; bit: number; format: PlaneFormat }[] = [
  { slot: 'depth',         bit: PLANE_DEPTH,          format: 'float32' },
  { slot: 'smoothedDepth', bit: PLANE_SMOOTHED_DEPTH, format: 'float32' },
  { slot: 'confidence',    bit: PLANE_CONFIDENCE,     format: 'uint8' },
  { slot: 'luma',          bit: PLANE_LUMA,           format: 'uint8' },
  { slot: 'chroma',        bit: PLANE_CHROMA,         format: 'cbcr8' },
]

// ─── Messages ───────────────────────────────────────────────────────────────

/** One plane as carried on the wire; `data` starts at the first row. */
export interface WirePlane {
  width: number
  height: number
  bytesPerRow: number
  data: Uint8Array
}

/** Decoded frame. Absent planes are simply missing. */
export interface FrameMessage {
  timestamp: number
  orientation: DisplayOrientation
  intrinsics: Matrix3x3
  cameraPose: Matrix4x4
  depth?: WirePlane
  smoothedDepth?: WirePlane
  confidence?: WirePlane
  luma?: WirePlane
  chroma?: WirePlane
}

/**
 * Binary decoder: Uint8Array → FrameMessage via DataView.
 *
 * Reads the wire format produced by encoder.ts. Plane bytes are views into
 * the input, not copies.
 */

import { requiredPlaneBytes } from '@depthfuse/fusion-core'
import { frameMetadataSchema } from '@depthfuse/shared'
import type { FrameMessage, PlaneSlot, WirePlane } from './types'
import {
  FRAME_MAGIC, FRAME_VERSION, HEADER_SIZE, PLANE_HEADER_SIZE, PLANE_MASK_ALL, PLANE_SLOTS,
  TIMESTAMP_OFFSET, INTRINSICS_OFFSET, POSE_OFFSET,
  codeToOrientation,
} from './types'

// ─── Errors ─────────────────────────────────────────────────────────────────

export type FrameDecodeFailure =
  | 'bad-magic'
  | 'unsupported-version'
  | 'unknown-orientation'
  | 'unknown-planes'
  | 'invalid-metadata'
  | 'truncated'
  | 'short-plane'
  | 'trailing-bytes'

export class FrameDecodeError extends Error {
  constructor(
    public readonly reason: FrameDecodeFailure,
    message: string,
  ) {
    super(message)
    this.name = 'FrameDecodeError'
  }
}

// ─── Header decoder ─────────────────────────────────────────────────────────

function readMatrix(view: DataView, offset: number, size: number): number[] {
  const values: number[] = []
  for (let i = 0; i < size; i++) {
    values.push(view.getFloat64(offset + i * 8, true))
  }
  return values
}

function readHeader(bytes: Uint8Array, view: DataView): {
  mask: number
  metadata: Pick<FrameMessage, 'timestamp' | 'orientation' | 'intrinsics' | 'cameraPose'>
} {
  if (bytes.length < HEADER_SIZE) {
    throw new FrameDecodeError('truncated', `Frame header needs ${HEADER_SIZE} bytes, got ${bytes.length}`)
  }
  for (let i = 0; i < FRAME_MAGIC.length; i++) {
    if (bytes[i] !== FRAME_MAGIC[i]) {
      throw new FrameDecodeError('bad-magic', 'Not a depth frame (bad magic)')
    }
  }

  const version = view.getUint8(4)
  if (version !== FRAME_VERSION) {
    throw new FrameDecodeError('unsupported-version', `Unsupported frame version ${version}`)
  }

  const orientationCode = view.getUint8(5)
  const orientation = codeToOrientation(orientationCode)
  if (orientation === undefined) {
    throw new FrameDecodeError('unknown-orientation', `Unknown orientation code ${orientationCode}`)
  }

  const mask = view.getUint8(6)
  if ((mask & ~PLANE_MASK_ALL) !== 0) {
    throw new FrameDecodeError('unknown-planes', `Unknown plane bits in mask 0x${mask.toString(16)}`)
  }

  const parsed = frameMetadataSchema.safeParse({
    timestamp: view.getFloat64(TIMESTAMP_OFFSET, true),
    orientation,
    intrinsics: readMatrix(view, INTRINSICS_OFFSET, 9),
    cameraPose: readMatrix(view, POSE_OFFSET, 16),
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? issue.path.join('.') : 'header'
    throw new FrameDecodeError('invalid-metadata', `Invalid frame metadata at ${where}`)
  }

  return {
    mask,
    metadata: {
      timestamp: parsed.data.timestamp,
      orientation,
      intrinsics: Float64Array.from(parsed.data.intrinsics),
      cameraPose: Float64Array.from(parsed.data.cameraPose),
    },
  }
}

// ─── Decode frame ───────────────────────────────────────────────────────────

/**
 * Decode one frame. Every byte of `bytes` must belong to the frame.
 * @throws FrameDecodeError when the input is not a well-formed frame.
 */
export function decodeFrame(bytes: Uint8Array): FrameMessage {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const { mask, metadata } = readHeader(bytes, view)

  const planes: Partial<Record<PlaneSlot, WirePlane>> = {}
  let offset = HEADER_SIZE

  for (const { slot, bit, format } of PLANE_SLOTS) {
    if ((mask & bit) === 0) continue

    if (offset + PLANE_HEADER_SIZE > bytes.length) {
      throw new FrameDecodeError('truncated', `Frame ends inside the ${slot} plane header`)
    }
    const width = view.getUint32(offset, true);       offset += 4
    const height = view.getUint32(offset, true);      offset += 4
    const bytesPerRow = view.getUint32(offset, true); offset += 4
    const byteLength = view.getUint32(offset, true);  offset += 4

    if (offset + byteLength > bytes.length) {
      throw new FrameDecodeError('truncated', `Frame ends inside the ${slot} plane data`)
    }
    if ((width === 0) !== (height === 0)) {
      throw new FrameDecodeError('short-plane', `The ${slot} plane is ${width}x${height}; an empty plane must be 0x0`)
    }
    const required = requiredPlaneBytes(width, height, bytesPerRow, format)
    if (byteLength < required) {
      throw new FrameDecodeError(
        'short-plane',
        `The ${slot} plane needs ${required} bytes for ${width}x${height}, got ${byteLength}`,
      )
    }

    planes[slot] = { width, height, bytesPerRow, data: bytes.subarray(offset, offset + byteLength) }
    offset += byteLength
  }

  if (offset !== bytes.length) {
    throw new FrameDecodeError('trailing-bytes', `${bytes.length - offset} unexpected bytes after the last plane`)
  }

  return { ...metadata, ...planes }
}

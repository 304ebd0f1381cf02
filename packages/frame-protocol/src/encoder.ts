/**
 * Binary encoder: FrameMessage → Uint8Array via DataView.
 */

import type { FrameMessage, WirePlane } from './types'
import {
  FRAME_MAGIC, FRAME_VERSION, HEADER_SIZE, PLANE_HEADER_SIZE, PLANE_SLOTS,
  TIMESTAMP_OFFSET, INTRINSICS_OFFSET, POSE_OFFSET,
  orientationToCode,
} from './types'

// ─── Size calculation ───────────────────────────────────────────────────────

/** Exact byte size of an encoded frame. */
export function encodedFrameSize(frame: FrameMessage): number {
  let size = HEADER_SIZE
  for (const { slot } of PLANE_SLOTS) {
    const plane = frame[slot]
    if (plane !== undefined) size += PLANE_HEADER_SIZE + plane.data.length
  }
  return size
}

// ─── Plane encoder ──────────────────────────────────────────────────────────

function writePlane(bytes: Uint8Array, view: DataView, offset: number, plane: WirePlane): number {
  view.setUint32(offset, plane.width, true);       offset += 4
  view.setUint32(offset, plane.height, true);      offset += 4
  view.setUint32(offset, plane.bytesPerRow, true); offset += 4
  view.setUint32(offset, plane.data.length, true); offset += 4
  bytes.set(plane.data, offset)
  return offset + plane.data.length
}

// ─── Encode frame ───────────────────────────────────────────────────────────

/** Encode a frame. Planes are written in wire order; absent ones are left out of the mask. */
export function encodeFrame(frame: FrameMessage): Uint8Array {
  if (frame.intrinsics.length !== 9) {
    throw new RangeError(`Intrinsics must have 9 entries, got ${frame.intrinsics.length}`)
  }
  if (frame.cameraPose.length !== 16) {
    throw new RangeError(`Camera pose must have 16 entries, got ${frame.cameraPose.length}`)
  }

  const bytes = new Uint8Array(encodedFrameSize(frame))
  const view = new DataView(bytes.buffer)

  bytes.set(FRAME_MAGIC, 0)
  view.setUint8(4, FRAME_VERSION)
  view.setUint8(5, orientationToCode(frame.orientation))

  let mask = 0
  for (const { slot, bit } of PLANE_SLOTS) {
    if (frame[slot] !== undefined) mask |= bit
  }
  view.setUint8(6, mask)
  view.setUint8(7, 0)

  view.setFloat64(TIMESTAMP_OFFSET, frame.timestamp, true)
  for (let i = 0; i < 9; i++) {
    view.setFloat64(INTRINSICS_OFFSET + i * 8, frame.intrinsics[i]!, true)
  }
  for (let i = 0; i < 16; i++) {
    view.setFloat64(POSE_OFFSET + i * 8, frame.cameraPose[i]!, true)
  }

  let offset = HEADER_SIZE
  for (const { slot } of PLANE_SLOTS) {
    const plane = frame[slot]
    if (plane !== undefined) offset = writePlane(bytes, view, offset, plane)
  }

  return bytes
}

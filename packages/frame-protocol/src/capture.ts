/**
 * Bridge between wire messages and the fusion pipeline's frame input.
 */

import { PixelBuffer } from '@depthfuse/fusion-core'
import type { CapturedFrame, PlaneDescriptor, PlaneFormat } from '@depthfuse/fusion-core'
import type { FrameMessage, WirePlane } from './types'
import { decodeFrame } from './decoder'

function descriptor(plane: WirePlane, format: PlaneFormat): PlaneDescriptor {
  return {
    data: plane.data,
    byteOffset: 0,
    width: plane.width,
    height: plane.height,
    bytesPerRow: plane.bytesPerRow,
    format,
  }
}

function singlePlane(plane: WirePlane | undefined, format: PlaneFormat): PixelBuffer | undefined {
  return plane === undefined ? undefined : new PixelBuffer([descriptor(plane, format)])
}

/**
 * Wrap a decoded message as a fusion input. The colour image is luma then
 * chroma; a frame without luma has no image.
 */
export function toCapturedFrame(message: FrameMessage): CapturedFrame {
  const { luma, chroma } = message
  let image: PixelBuffer | undefined
  if (luma !== undefined) {
    const planes = [descriptor(luma, 'uint8')]
    if (chroma !== undefined) planes.push(descriptor(chroma, 'cbcr8'))
    image = new PixelBuffer(planes)
  }

  return {
    timestamp: message.timestamp,
    depth: singlePlane(message.depth, 'float32'),
    smoothedDepth: singlePlane(message.smoothedDepth, 'float32'),
    confidence: singlePlane(message.confidence, 'uint8'),
    image,
    intrinsics: message.intrinsics,
    cameraPose: message.cameraPose,
    orientation: message.orientation,
  }
}

/** `decodeFrame` followed by `toCapturedFrame`. */
export function decodeCapturedFrame(bytes: Uint8Array): CapturedFrame {
  return toCapturedFrame(decodeFrame(bytes))
}

// Types
export type {
  OrientationCode, PlaneSlot, WirePlane, FrameMessage,
} from './types'

export {
  FRAME_MAGIC, FRAME_VERSION, HEADER_SIZE, PLANE_HEADER_SIZE,
  ORIENT_PORTRAIT, ORIENT_PORTRAIT_UPSIDE_DOWN, ORIENT_LANDSCAPE_LEFT, ORIENT_LANDSCAPE_RIGHT,
  PLANE_DEPTH, PLANE_SMOOTHED_DEPTH, PLANE_CONFIDENCE, PLANE_LUMA, PLANE_CHROMA, PLANE_MASK_ALL,
  PLANE_SLOTS,
  orientationToCode, codeToOrientation,
} from './types'

// Encoder
export { encodeFrame, encodedFrameSize } from './encoder'

// Decoder
export { decodeFrame, FrameDecodeError, type FrameDecodeFailure } from './decoder'

// Fusion input
export { toCapturedFrame, decodeCapturedFrame } from './capture'

import { encodeFrame, toCapturedFrame } from '@depthfuse/frame-protocol'
import type { FrameMessage, WirePlane } from '@depthfuse/frame-protocol'
import type { CapturedFrame } from '@depthfuse/fusion-core'
import { createLogger } from '../lib/logger'
import type { LogLevel, Logger } from '../lib/logger'

// ─── Frames ─────────────────────────────────────────────────────────────────

function uint8Wire(width: number, height: number, value: number): WirePlane {
  return { width, height, bytesPerRow: width, data: new Uint8Array(width * height).fill(value) }
}

function float32Wire(width: number, height: number, value: number): WirePlane {
  const data = new Uint8Array(width * height * 4)
  const view = new DataView(data.buffer)
  for (let i = 0; i < width * height; i++) view.setFloat32(i * 4, value, true)
  return { width, height, bytesPerRow: width * 4, data }
}

/**
 * 2x2 depth at 1 m, all high confidence, 4x4 mid-grey image, fx = fy = 100,
 * identity pose. Fuses to four distinct points.
 */
export function frameMessage(overrides: Partial<FrameMessage> = {}): FrameMessage {
  return {
    timestamp: 1,
    orientation: 'portrait',
    intrinsics: Float64Array.from([100, 0, 0, 0, 100, 0, 0, 0, 1]),
    cameraPose: Float64Array.from([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]),
    depth: float32Wire(2, 2, 1),
    confidence: uint8Wire(2, 2, 2),
    luma: uint8Wire(4, 4, 128),
    chroma: { width: 2, height: 2, bytesPerRow: 4, data: new Uint8Array(8).fill(128) },
    ...overrides,
  }
}

export function frameBytes(overrides: Partial<FrameMessage> = {}): Uint8Array {
  return encodeFrame(frameMessage(overrides))
}

export function capturedFrame(overrides: Partial<FrameMessage> = {}): CapturedFrame {
  return toCapturedFrame(frameMessage(overrides))
}

// ─── Logging ────────────────────────────────────────────────────────────────

export interface CapturedLog {
  log: Logger
  /** Parsed lines in write order, with the stream each went to. */
  entries: { stream: 'stdout' | 'stderr'; entry: unknown }[]
}

export function captureLog(level: LogLevel = 'debug'): CapturedLog {
  const entries: CapturedLog['entries'] = []
  const log = createLogger(level, {
    stdout: (line) => { entries.push({ stream: 'stdout', entry: JSON.parse(line) }) },
    stderr: (line) => { entries.push({ stream: 'stderr', entry: JSON.parse(line) }) },
  })
  return { log, entries }
}

/**
 * Capture session: the on/off capture flag and the busy gate in front of
 * the point cloud.
 *
 * At most one frame is fused at a time. A frame that arrives while a pass
 * is running is dropped rather than queued, so a slow pass never builds a
 * backlog of stale frames.
 */

import type { CapturedFrame, FusionResult, PointCloud } from '@depthfuse/fusion-core'
import type { Logger } from '../lib/logger'

export type DropReason = 'not-capturing' | 'busy'

export type SubmitOutcome =
  | { status: 'dropped'; reason: DropReason }
  | { status: 'processed'; result: FusionResult; totalPoints: number; durationMs: number }

export interface CaptureState {
  capturing: boolean
  processing: boolean
}

export interface CaptureSessionOptions {
  /** Start with capturing on. */
  capturing?: boolean
}

export class CaptureSession {
  private capturing: boolean
  private processing = false

  constructor(
    private readonly cloud: PointCloud,
    private readonly log: Logger,
    options: CaptureSessionOptions = {},
  ) {
    this.capturing = options.capturing ?? false
  }

  get state(): CaptureState {
    return { capturing: this.capturing, processing: this.processing }
  }

  /** Switch capturing on or off. An in-flight pass is not interrupted. */
  setCapturing(on: boolean): CaptureState {
    if (on !== this.capturing) {
      this.capturing = on
      this.log.info('capture_state_changed', { capturing: on })
    }
    return this.state
  }

  toggleCapturing(): CaptureState {
    return this.setCapturing(!this.capturing)
  }

  /** Fuse `frame` if capturing and idle; otherwise drop it. */
  async submit(frame: CapturedFrame): Promise<SubmitOutcome> {
    if (!this.capturing) return this.drop('not-capturing', frame)
    if (this.processing) return this.drop('busy', frame)

    this.processing = true
    const start = performance.now()
    try {
      const result = await this.cloud.process(frame)
      const totalPoints = await this.cloud.count()
      const durationMs = Number((performance.now() - start).toFixed(1))

      if (result.status === 'fused') {
        this.log.debug('frame_fused', {
          timestamp: frame.timestamp,
          inserted: result.inserted,
          accepted: result.accepted,
          examined: result.examined,
          totalPoints,
          durationMs,
        })
      } else {
        this.log.debug('frame_skipped', { timestamp: frame.timestamp, reason: result.reason })
      }

      return { status: 'processed', result, totalPoints, durationMs }
    } finally {
      this.processing = false
    }
  }

  private drop(reason: DropReason, frame: CapturedFrame): SubmitOutcome {
    this.log.debug('frame_dropped', { timestamp: frame.timestamp, reason })
    return { status: 'dropped', reason }
  }
}

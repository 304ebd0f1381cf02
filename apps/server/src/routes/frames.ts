import { Hono } from 'hono'
import { bodyLimit } from 'hono/body-limit'
import { decodeCapturedFrame, FrameDecodeError } from '@depthfuse/frame-protocol'
import type { CapturedFrame } from '@depthfuse/fusion-core'
import type { CaptureSession } from '../capture/session'

export interface FrameRouteOptions {
  /** Largest accepted frame body in bytes. */
  maxBytes: number
}

export function frameRoutes(session: CaptureSession, options: FrameRouteOptions) {
  const routes = new Hono()

  /** POST /frames: submit one binary frame for fusion */
  routes.post(
    '/',
    bodyLimit({
      maxSize: options.maxBytes,
      onError: (c) => c.json({ error: `Frame exceeds ${options.maxBytes} bytes.` }, 413),
    }),
    async (c) => {
      const bytes = new Uint8Array(await c.req.arrayBuffer())

      let frame: CapturedFrame
      try {
        frame = decodeCapturedFrame(bytes)
      } catch (err) {
        if (err instanceof FrameDecodeError) {
          return c.json({ error: err.message, reason: err.reason }, 400)
        }
        throw err
      }

      const outcome = await session.submit(frame)
      if (outcome.status === 'dropped') return c.json(outcome, 202)
      return c.json({ status: outcome.status, result: outcome.result, totalPoints: outcome.totalPoints })
    },
  )

  return routes
}

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import type { PointCloud } from '@depthfuse/fusion-core'
import type { CaptureSession } from './capture/session'
import type { Logger } from './lib/logger'
import { securityHeaders } from './lib/security-headers'
import { requestLogger } from './lib/request-logger'
import { rateLimit } from './lib/rate-limit'
import { captureRoutes } from './routes/capture'
import { frameRoutes } from './routes/frames'
import { pointRoutes } from './routes/points'

export const SERVICE_NAME = 'depthfuse'
export const SERVICE_VERSION = '0.1.0'

export interface AppDeps {
  cloud: PointCloud
  session: CaptureSession
  log: Logger
  corsOrigins: string[]
  maxFrameBytes: number
  previewStride: number
  production: boolean
}

export function createApp(deps: AppDeps) {
  const { cloud, session, log } = deps
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (err instanceof HTTPException && err.status < 500) return err.getResponse()
    log.error('unhandled_error', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: deps.production ? undefined : err.stack,
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(log))

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: deps.corsOrigins,
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      exposeHeaders: ['Content-Disposition'],
      maxAge: 86400,
    }),
  )

  // 3. Security headers
  app.use('*', securityHeaders({ hsts: deps.production }))

  // 4. Rate limiting per route group; frames arrive at camera rate
  app.use('/frames/*', rateLimit({ windowMs: 60_000, max: 6_000 }))
  app.use('/points/*', rateLimit({ windowMs: 60_000, max: 600 }))

  // ---------------------------------------------------------------------------
  // Health check (unthrottled)
  // ---------------------------------------------------------------------------

  app.get('/health', async (c) => c.json({ status: 'healthy', points: await cloud.count() }))

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/capture', captureRoutes(session))
  app.route('/frames', frameRoutes(session, { maxBytes: deps.maxFrameBytes }))
  app.route('/points', pointRoutes(cloud, { previewStride: deps.previewStride, log }))

  app.get('/', (c) => c.json({ name: SERVICE_NAME, version: SERVICE_VERSION }))

  return app
}

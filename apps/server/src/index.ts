import { serve } from '@hono/node-server'
import { PointCloud } from '@depthfuse/fusion-core'
import { resolveFlags, resolveFusionConfig } from '@depthfuse/config'
import { env } from './lib/env'
import { createLogger } from './lib/logger'
import { CaptureSession } from './capture/session'
import { fusionOptionsFrom } from './capture/fusion-options'
import { createApp } from './app'

const log = createLogger(env.LOG_LEVEL)
const config = resolveFusionConfig()
const flags = resolveFlags()

const cloud = new PointCloud(fusionOptionsFrom(config, flags))
const session = new CaptureSession(cloud, log, { capturing: flags.CAPTURE_ON_START })

const app = createApp({
  cloud,
  session,
  log,
  corsOrigins: env.CORS_ORIGINS,
  maxFrameBytes: env.MAX_FRAME_BYTES,
  previewStride: config.PREVIEW_STRIDE,
  production: env.NODE_ENV === 'production',
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log.info('server_started', {
    port: info.port,
    env: env.NODE_ENV,
    fusion: cloud.fusionOptions,
    capturing: session.state.capturing,
  })
})

function shutdown(signal: string) {
  log.info('shutdown', { signal })

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))

import { Hono } from 'hono'
import { PLY_FILE_NAME, PlyExportError, exportPly } from '@depthfuse/fusion-core'
import type { PointCloud } from '@depthfuse/fusion-core'
import { pointsQuerySchema } from '@depthfuse/shared'
import type { Logger } from '../lib/logger'
import { parseQuery, isResponse } from '../lib/validate'

export interface PointRouteOptions {
  /** Stride used by GET /points/preview. */
  previewStride: number
  log: Logger
}

export function pointRoutes(cloud: PointCloud, options: PointRouteOptions) {
  const routes = new Hono()

  /** GET /points/count: number of stored points */
  routes.get('/count', async (c) => c.json({ count: await cloud.count() }))

  /** GET /points: consistent snapshot, optionally thinned with ?stride=n */
  routes.get('/', async (c) => {
    const query = parseQuery(c, pointsQuerySchema)
    if (isResponse(query)) return query
    const vertices = await cloud.preview(query.stride)
    return c.json({ count: vertices.length, vertices })
  })

  /** GET /points/preview: snapshot thinned with the configured viewer stride */
  routes.get('/preview', async (c) => {
    const vertices = await cloud.preview(options.previewStride)
    return c.json({ count: vertices.length, vertices })
  })

  /** DELETE /points: empty the cloud */
  routes.delete('/', async (c) => {
    await cloud.clear()
    options.log.info('points_cleared')
    return c.json({ count: 0 })
  })

  /** GET /points/export.ply: ASCII PLY download of a snapshot */
  routes.get('/export.ply', async (c) => {
    const vertices = await cloud.snapshot()

    let bytes: Uint8Array
    try {
      bytes = exportPly(vertices)
    } catch (err) {
      if (err instanceof PlyExportError) {
        options.log.error('export_failed', { reason: err.reason, vertexIndex: err.vertexIndex })
        return c.json({ error: err.message }, 500)
      }
      throw err
    }

    options.log.info('points_exported', { count: vertices.length })
    return new Response(bytes, {
      status: 200,
      headers: {
        'Content-Type': 'application/octet-stream',
        'Content-Disposition': `attachment; filename="${PLY_FILE_NAME}"`,
        'Content-Length': String(bytes.byteLength),
      },
    })
  })

  return routes
}

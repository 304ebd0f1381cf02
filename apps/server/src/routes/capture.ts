import { Hono } from 'hono'
import { captureStateSchema } from '@depthfuse/shared'
import type { CaptureSession } from '../capture/session'
import { parseBody, isResponse } from '../lib/validate'

export function captureRoutes(session: CaptureSession) {
  const routes = new Hono()

  /** GET /capture: current capture state */
  routes.get('/', (c) => c.json(session.state))

  /** PUT /capture: switch capturing on or off */
  routes.put('/', async (c) => {
    const data = await parseBody(c, captureStateSchema)
    if (isResponse(data)) return data
    return c.json(session.setCapturing(data.capturing))
  })

  /** POST /capture/toggle: flip the capture flag */
  routes.post('/toggle', (c) => c.json(session.toggleCapturing()))

  return routes
}

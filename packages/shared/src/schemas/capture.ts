import { z } from 'zod'

export const captureStateSchema = z.object({
  capturing: z.boolean({ required_error: 'capturing is required' }),
})

export type CaptureStateInput = z.infer<typeof captureStateSchema>

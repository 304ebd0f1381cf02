import { z } from 'zod'

/** `?stride=n` on point reads: keep every n-th vertex. */
export const pointsQuerySchema = z.object({
  stride: z.coerce.number().int('Stride must be an integer').min(1, 'Stride must be at least 1').default(1),
})

export type PointsQuery = z.infer<typeof pointsQuerySchema>

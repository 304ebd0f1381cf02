import { z } from 'zod'

export const displayOrientationSchema = z.enum([
  'portrait',
  'portraitUpsideDown',
  'landscapeLeft',
  'landscapeRight',
])

const finite = z.number().finite('Matrix entries must be finite')

/**
 * Metadata carried in a binary frame header, checked after decoding.
 * Matrices are column-major.
 */
export const frameMetadataSchema = z.object({
  timestamp: z.number().finite(),
  orientation: displayOrientationSchema,
  intrinsics: z.array(finite).length(9),
  cameraPose: z.array(finite).length(16),
})

export type FrameMetadata = z.infer<typeof frameMetadataSchema>
export type DisplayOrientationName = z.infer<typeof displayOrientationSchema>

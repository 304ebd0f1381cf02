import type { FusionOptions } from '@depthfuse/fusion-core'
import type { FeatureFlags, FusionConfig } from '@depthfuse/config'

/** Map resolved configuration onto the options every fusion pass runs with. */
export function fusionOptionsFrom(config: FusionConfig, flags: FeatureFlags): Partial<FusionOptions> {
  return {
    density: config.GRID_DENSITY,
    maxDepth: config.MAX_DEPTH_METERS,
    minHomogeneousW: config.MIN_HOMOGENEOUS_W,
    preferSmoothedDepth: flags.PREFER_SMOOTHED_DEPTH,
  }
}

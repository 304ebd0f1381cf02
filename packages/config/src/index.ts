// Shared configuration: fusion tunables and feature flags, resolved from the
// environment with defaults.

export {
  resolveFlag,
  resolveFlags,
  readEnvFlag,
  DEFAULT_FLAGS,
  FEATURE_FLAG_KEYS,
  type FeatureFlags,
  type FeatureFlagKey,
  type Env,
} from './flags'

export {
  resolveFusionConfig,
  readEnvNumber,
  DEFAULT_FUSION_CONFIG,
  type FusionConfig,
} from './fusion'

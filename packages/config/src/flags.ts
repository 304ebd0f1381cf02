/** Feature flags for the capture pipeline. */
export interface FeatureFlags {
  /** Fuse the temporally smoothed depth plane when a frame carries one. */
  PREFER_SMOOTHED_DEPTH: boolean
  /** Start the capture session with capturing switched on. */
  CAPTURE_ON_START: boolean
}

export type FeatureFlagKey = keyof FeatureFlags

/** All flag keys for iteration. */
export const FEATURE_FLAG_KEYS: FeatureFlagKey[] = [
  'PREFER_SMOOTHED_DEPTH',
  'CAPTURE_ON_START',
]

export const DEFAULT_FLAGS: FeatureFlags = {
  PREFER_SMOOTHED_DEPTH: true,
  CAPTURE_ON_START: false,
}

export type Env = Record<string, string | undefined>

export function readEnvFlag(env: Env, key: string): boolean | undefined {
  const val = env[key]
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

/** Resolve a single flag: env override > default. */
export function resolveFlag(key: FeatureFlagKey, env: Env = process.env): boolean {
  return readEnvFlag(env, key) ?? DEFAULT_FLAGS[key]
}

/** Resolve every flag from `env`. */
export function resolveFlags(env: Env = process.env): FeatureFlags {
  return {
    PREFER_SMOOTHED_DEPTH: resolveFlag('PREFER_SMOOTHED_DEPTH', env),
    CAPTURE_ON_START: resolveFlag('CAPTURE_ON_START', env),
  }
}

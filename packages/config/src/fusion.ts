import type { Env } from './flags'

/** Numeric tunables of the fusion pipeline. */
export interface FusionConfig {
  /** Grid cells per metre. */
  GRID_DENSITY: number
  /** Depth cut-off in metres; deeper samples are dropped. */
  MAX_DEPTH_METERS: number
  /** Keep one point in this many when previewing. */
  PREVIEW_STRIDE: number
  /** Homogeneous divisors at or below this are degenerate. */
  MIN_HOMOGENEOUS_W: number
}

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  GRID_DENSITY: 100,
  MAX_DEPTH_METERS: 2.0,
  PREVIEW_STRIDE: 10,
  MIN_HOMOGENEOUS_W: 1e-6,
}

type NumberCheck = (value: number) => boolean

const isPositive: NumberCheck = (v) => Number.isFinite(v) && v > 0
const isPositiveInteger: NumberCheck = (v) => Number.isInteger(v) && v >= 1
const isNonNegative: NumberCheck = (v) => Number.isFinite(v) && v >= 0

/** Parse `env[key]` as a number; missing, unparseable or out-of-range values give `undefined`. */
export function readEnvNumber(env: Env, key: string, check: NumberCheck = Number.isFinite): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  const val = Number(raw)
  return check(val) ? val : undefined
}

/** Resolved fusion tunables (env overrides > defaults). */
export function resolveFusionConfig(env: Env = process.env): FusionConfig {
  return {
    GRID_DENSITY: readEnvNumber(env, 'GRID_DENSITY', isPositive) ?? DEFAULT_FUSION_CONFIG.GRID_DENSITY,
    MAX_DEPTH_METERS: readEnvNumber(env, 'MAX_DEPTH_METERS', isPositive) ?? DEFAULT_FUSION_CONFIG.MAX_DEPTH_METERS,
    PREVIEW_STRIDE: readEnvNumber(env, 'PREVIEW_STRIDE', isPositiveInteger) ?? DEFAULT_FUSION_CONFIG.PREVIEW_STRIDE,
    MIN_HOMOGENEOUS_W: readEnvNumber(env, 'MIN_HOMOGENEOUS_W', isNonNegative) ?? DEFAULT_FUSION_CONFIG.MIN_HOMOGENEOUS_W,
  }
}

/**
 * Environment variable validation: fail-fast on startup.
 *
 * Import this module early in the server entry point. A malformed value
 * throws immediately instead of surfacing as odd behaviour at runtime.
 */

import { LOG_LEVELS, type LogLevel } from './logger'

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function positiveInt(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined || raw === '') return fallback
  const val = Number(raw)
  if (!Number.isInteger(val) || val <= 0) {
    throw new Error(`Invalid environment variable ${key}: expected a positive integer, got "${raw}".`)
  }
  return val
}

function logLevel(key: string, fallback: LogLevel): LogLevel {
  const raw = process.env[key]
  if (raw === undefined || raw === '') return fallback
  const level = LOG_LEVELS.find((l) => l === raw)
  if (level === undefined) {
    throw new Error(`Invalid environment variable ${key}: expected one of ${LOG_LEVELS.join(', ')}, got "${raw}".`)
  }
  return level
}

export const env = {
  PORT: positiveInt('PORT', 4000),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(','),
  /** Largest accepted frame body. */
  MAX_FRAME_BYTES: positiveInt('MAX_FRAME_BYTES', 64 * 1024 * 1024),
  LOG_LEVEL: logLevel('LOG_LEVEL', 'info'),
} as const

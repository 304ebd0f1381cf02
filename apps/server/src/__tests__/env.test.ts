import { describe, it, expect, afterEach, vi } from 'vitest'

async function loadEnv() {
  vi.resetModules()
  const { env } = await import('../lib/env')
  return env
}

describe('env', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('falls back to defaults', async () => {
    vi.stubEnv('PORT', '')
    vi.stubEnv('MAX_FRAME_BYTES', '')
    vi.stubEnv('LOG_LEVEL', '')
    const env = await loadEnv()
    expect(env.PORT).toBe(4000)
    expect(env.MAX_FRAME_BYTES).toBe(64 * 1024 * 1024)
    expect(env.LOG_LEVEL).toBe('info')
  })

  it('reads overrides', async () => {
    vi.stubEnv('PORT', '8080')
    vi.stubEnv('LOG_LEVEL', 'debug')
    vi.stubEnv('CORS_ORIGINS', 'http://a.test,http://b.test')
    const env = await loadEnv()
    expect(env.PORT).toBe(8080)
    expect(env.LOG_LEVEL).toBe('debug')
    expect(env.CORS_ORIGINS).toEqual(['http://a.test', 'http://b.test'])
  })

  it('fails fast on a malformed number', async () => {
    vi.stubEnv('MAX_FRAME_BYTES', 'lots')
    await expect(loadEnv()).rejects.toThrow(/MAX_FRAME_BYTES/)
  })

  it('fails fast on an unknown log level', async () => {
    vi.stubEnv('LOG_LEVEL', 'verbose')
    await expect(loadEnv()).rejects.toThrow(/LOG_LEVEL/)
  })
})

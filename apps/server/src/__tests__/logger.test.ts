import { describe, it, expect } from 'vitest'
import { captureLog } from './helpers'

describe('createLogger', () => {
  it('writes one JSON object per line with ts, level and event', () => {
    const { log, entries } = captureLog('debug')
    log.info('frame_fused', { inserted: 3 })
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      stream: 'stdout',
      entry: { level: 'info', event: 'frame_fused', inserted: 3 },
    })
    expect(entries[0]?.entry).toHaveProperty('ts', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/))
  })

  it('routes warn and error to stderr', () => {
    const { log, entries } = captureLog('debug')
    log.debug('a')
    log.warn('b')
    log.error('c')
    expect(entries.map((e) => e.stream)).toEqual(['stdout', 'stderr', 'stderr'])
  })

  it('drops lines below the configured level', () => {
    const { log, entries } = captureLog('warn')
    log.debug('a')
    log.info('b')
    log.warn('c')
    expect(entries).toHaveLength(1)
    expect(entries[0]?.entry).toMatchObject({ event: 'c' })
    expect(log.level).toBe('warn')
  })
})

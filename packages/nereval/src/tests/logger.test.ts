import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, isLogLevel } from '../lib/logger.js'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createLogger', () => {
  it('prefixes messages with its tag', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    createLogger('NERCRF', 'info').info('oov: 3')
    expect(log).toHaveBeenCalledWith('[NERCRF]', 'oov: 3')
  })

  it('drops messages below its level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const logger = createLogger('NERCRF', 'warn')
    logger.info('hidden')
    logger.warn('shown')
    expect(log).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('[NERCRF]', 'shown')
  })

  it('stays quiet when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('NERCRF', 'silent').error('hidden')
    expect(error).not.toHaveBeenCalled()
  })
})

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
    expect(isLogLevel(3)).toBe(false)
  })
})

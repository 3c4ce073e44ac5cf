import { describe, it, expect, afterEach, vi } from 'vitest'
import { configure, getConfig, loadConfigFromEnv, resetConfig } from '../../src/config/index.js'
import { FallibleError } from '../../src/common/index.js'

describe('config', () => {
  afterEach(() => {
    resetConfig()
    vi.restoreAllMocks()
  })

  it('defaults to throwing and logging', () => {
    expect(getConfig()).toEqual({ onContractViolation: 'throw', logViolations: true })
  })

  it('configure merges a partial config', () => {
    configure({ logViolations: false })
    expect(getConfig()).toEqual({ onContractViolation: 'throw', logViolations: false })
    configure({ onContractViolation: 'abort' })
    expect(getConfig()).toEqual({ onContractViolation: 'abort', logViolations: false })
  })

  it('configure rejects an unknown mode with a CONFIG_ERROR', () => {
    try {
      configure({ onContractViolation: 'explode' })
      expect.unreachable('configure should throw')
    } catch (err) {
      expect(err).toBeInstanceOf(FallibleError)
      if (err instanceof FallibleError) {
        expect(err.kind).toBe('CONFIG_ERROR')
        expect(err.message.startsWith('invalid configuration: onContractViolation: ')).toBe(true)
      }
    }
    expect(getConfig().onContractViolation).toBe('throw')
  })

  it('configure rejects unknown keys', () => {
    expect(() => configure({ verbose: true })).toThrow(FallibleError)
  })

  it('resetConfig restores defaults', () => {
    configure({ onContractViolation: 'abort', logViolations: false })
    resetConfig()
    expect(getConfig()).toEqual({ onContractViolation: 'throw', logViolations: true })
  })

  it('loadConfigFromEnv reads both variables without applying them', () => {
    const loaded = loadConfigFromEnv({
      FALLIBLE_ON_CONTRACT_VIOLATION: ' ABORT ',
      FALLIBLE_LOG_VIOLATIONS: '0',
    })
    expect(loaded).toEqual({ onContractViolation: 'abort', logViolations: false })
    expect(getConfig()).toEqual({ onContractViolation: 'throw', logViolations: true })
  })

  it('loadConfigFromEnv warns about and skips invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const loaded = loadConfigFromEnv({
      FALLIBLE_ON_CONTRACT_VIOLATION: 'nope',
      FALLIBLE_LOG_VIOLATIONS: 'maybe',
    })
    expect(loaded).toEqual({ onContractViolation: 'throw', logViolations: true })
    expect(warn).toHaveBeenCalledWith('[config] ignoring FALLIBLE_ON_CONTRACT_VIOLATION="nope"')
    expect(warn).toHaveBeenCalledWith('[config] ignoring FALLIBLE_LOG_VIOLATIONS="maybe"')
  })

  it('loadConfigFromEnv with no variables returns the active config', () => {
    configure({ logViolations: false })
    expect(loadConfigFromEnv({})).toEqual({ onContractViolation: 'throw', logViolations: false })
  })
})

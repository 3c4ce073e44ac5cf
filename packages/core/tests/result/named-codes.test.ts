import { describe, it, expect } from 'vitest'
import { NamedCode, defineNamedCodes } from '../../src/result/index.js'

const STORE = defineNamedCodes(
  'store',
  { OK: 'ok', NOT_FOUND: 'record not found', CONFLICT: 'version conflict' },
  'OK',
)

describe('defineNamedCodes', () => {
  it('interns one code per key', () => {
    expect(STORE.code('NOT_FOUND')).toBe(STORE.code('NOT_FOUND'))
    expect(STORE.code('NOT_FOUND')).toBeInstanceOf(NamedCode)
  })

  it('codes print their description and expose the key as value', () => {
    const code = STORE.code('CONFLICT')
    expect(code.value()).toBe('CONFLICT')
    expect(code.print()).toBe('version conflict')
    expect(String(code)).toBe('version conflict')
  })

  it('none is the configured key', () => {
    expect(STORE.none()).toBe(STORE.code('OK'))
    expect(STORE.name).toBe('store')
  })

  it('owns only its own interned codes', () => {
    const other = defineNamedCodes('other', { OK: 'ok', NOT_FOUND: 'missing' }, 'OK')
    expect(STORE.owns(STORE.code('NOT_FOUND'))).toBe(true)
    expect(STORE.owns(other.code('NOT_FOUND'))).toBe(false)
    expect(STORE.owns(new NamedCode('NOT_FOUND', 'record not found'))).toBe(false)
    expect(STORE.owns('NOT_FOUND')).toBe(false)
  })

  it('revives known keys only', () => {
    expect(STORE.revive('CONFLICT')).toBe(STORE.code('CONFLICT'))
    expect(STORE.revive('NOPE')).toBeUndefined()
    expect(STORE.revive('toString')).toBeUndefined()
    expect(STORE.revive(1)).toBeUndefined()
  })
})

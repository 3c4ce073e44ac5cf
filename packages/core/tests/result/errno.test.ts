import { describe, it, expect, afterEach } from 'vitest'
import { constants } from 'node:os'
import {
  ERRNO,
  Errno,
  captureErrno,
  errno,
  errnoError,
  errnoFromException,
  errnoMessage,
  errnoName,
  errnoNumber,
  preserveErrno,
  setErrno,
} from '../../src/result/index.js'

const { ENOENT, EACCES, EIO } = constants.errno

enum LegacyError {
  None = 0,
  NotFound = 2,
}

describe('Errno', () => {
  afterEach(() => {
    setErrno(0)
  })

  it('defaults to 0, printed as success', () => {
    const code = new Errno()
    expect(code.value()).toBe(0)
    expect(code.print()).toBe('success')
  })

  it('converts to its raw number', () => {
    expect(Number(new Errno(13))).toBe(13)
    expect(new Errno(13).value()).toBe(13)
  })

  it('prints the platform description', () => {
    expect(new Errno(ENOENT).print()).toBe('no such file or directory')
    expect(new Errno(EACCES).print()).toBe('permission denied')
    expect(String(new Errno(ENOENT))).toBe('no such file or directory')
  })

  it('prints a fallback for unknown numbers', () => {
    expect(new Errno(99999).print()).toBe('unknown error 99999')
    expect(new Errno(99999).name()).toBeUndefined()
  })

  it('describes numbers missing from the libuv table', () => {
    expect(new Errno(constants.errno.ECHILD).print()).toBe('no child processes')
    expect(new Errno(constants.errno.EDOM).print()).toBe('numerical argument out of domain')
  })

  it('has a description for every number the platform defines', () => {
    for (const value of Object.values(constants.errno)) {
      expect(errnoMessage(value).startsWith('unknown error')).toBe(false)
    }
  })

  it('knows symbolic names', () => {
    expect(new Errno(ENOENT).name()).toBe('ENOENT')
    expect(errnoName(EACCES)).toBe('EACCES')
    expect(errnoNumber('ENOENT')).toBe(ENOENT)
    expect(errnoMessage(ENOENT)).toBe(new Errno(ENOENT).print())
  })

  it('reinterprets as a legacy numeric enum', () => {
    expect(new Errno(2).asLegacyEnum(LegacyError)).toBe(LegacyError.NotFound)
    expect(new Errno(0).asLegacyEnum(LegacyError)).toBe(LegacyError.None)
    expect(new Errno(7).asLegacyEnum(LegacyError)).toBeUndefined()
  })
})

describe('ERRNO domain', () => {
  it('none is Errno(0)', () => {
    expect(ERRNO.none().value()).toBe(0)
  })

  it('owns Errno instances only', () => {
    expect(ERRNO.owns(new Errno(1))).toBe(true)
    expect(ERRNO.owns(1)).toBe(false)
  })

  it('revives non-negative integers', () => {
    expect(ERRNO.revive(2)?.value()).toBe(2)
    expect(ERRNO.revive(-1)).toBeUndefined()
    expect(ERRNO.revive(1.5)).toBeUndefined()
    expect(ERRNO.revive('ENOENT')).toBeUndefined()
  })
})

describe('errno state', () => {
  afterEach(() => {
    setErrno(0)
  })

  it('set and read', () => {
    setErrno(ENOENT)
    expect(errno()).toBe(ENOENT)
  })

  it('preserveErrno restores the number after fn', () => {
    setErrno(ENOENT)
    const value = preserveErrno(() => {
      setErrno(EACCES)
      return 'done'
    })
    expect(value).toBe('done')
    expect(errno()).toBe(ENOENT)
  })

  it('preserveErrno restores the number when fn throws', () => {
    setErrno(ENOENT)
    expect(() =>
      preserveErrno(() => {
        setErrno(EACCES)
        throw new Error('inner')
      }),
    ).toThrow('inner')
    expect(errno()).toBe(ENOENT)
  })

  it('errnoError captures the current number', () => {
    setErrno(2)
    const result = errnoError().toResult()
    expect(Number(result.error.code)).toBe(2)
    expect(result.error.code.print()).toBe(errnoMessage(2))
    expect(result.error.message).toBe(errnoMessage(2))
  })
})

describe('errnoFromException', () => {
  it('maps a Node error code name', () => {
    expect(errnoFromException({ code: 'ENOENT', errno: -999 })).toBe(ENOENT)
  })

  it('falls back to the absolute libuv errno', () => {
    expect(errnoFromException({ errno: -13 })).toBe(13)
  })

  it('returns undefined for other exceptions', () => {
    expect(errnoFromException(new Error('plain'))).toBeUndefined()
    expect(errnoFromException(null)).toBeUndefined()
    expect(errnoFromException('ENOENT')).toBeUndefined()
  })

  it('captureErrno stores EIO when the exception carries no number', () => {
    expect(captureErrno(new Error('plain'))).toBe(EIO)
    expect(errno()).toBe(EIO)
    expect(captureErrno({ code: 'EACCES' })).toBe(EACCES)
    expect(errno()).toBe(EACCES)
    setErrno(0)
  })
})

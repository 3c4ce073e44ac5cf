/**
 * Errno, the default error code: a wrapper around a POSIX error number,
 * plus the ambient "last error number" state it is captured from.
 *
 * The state lives in this module instance. Each worker thread loads its own
 * copy of the module, so the number is per thread, like C's errno.
 */

import { constants } from 'node:os'
import { getSystemErrorMap } from 'node:util'
import { z } from 'zod'
import type { ErrorCode, ErrorCodeDomain } from './error-code.js'
import errnoDescriptions from './errno-descriptions.json' with { type: 'json' }

interface ErrnoTables {
  messages: Map<number, string>
  names: Map<number, string>
  numbers: Map<string, number>
}

let tables: ErrnoTables | undefined

const ErrnoDescriptionsSchema = z.record(z.string().min(1))

/** Descriptions for errno names the libuv table leaves out (ECHILD, EDOM, ...). */
function extraDescriptions(): Map<string, string> {
  return new Map(Object.entries(ErrnoDescriptionsSchema.parse(errnoDescriptions)))
}

function errnoTables(): ErrnoTables {
  if (tables) return tables

  // libuv keys its table by its own (negative) codes; join on the symbolic name instead
  const messagesByName = new Map<string, string>()
  for (const [name, message] of getSystemErrorMap().values()) {
    messagesByName.set(name, message)
  }
  const extras = extraDescriptions()

  const built: ErrnoTables = { messages: new Map(), names: new Map(), numbers: new Map() }
  for (const [name, code] of Object.entries(constants.errno)) {
    if (typeof code !== 'number') continue
    built.numbers.set(name, code)
    if (built.names.has(code)) continue
    built.names.set(code, name)
    built.messages.set(code, messagesByName.get(name) ?? extras.get(name) ?? name)
  }

  tables = built
  return built
}

/**
 * Platform description of an error number, in libuv's lowercase wording.
 * Numbers the platform does not define print as `unknown error N`.
 */
export function errnoMessage(value: number): string {
  if (value === 0) return 'success'
  return errnoTables().messages.get(value) ?? `unknown error ${value}`
}

/** Symbolic name (`ENOENT`) of an error number, if the platform knows it. */
export function errnoName(value: number): string | undefined {
  return errnoTables().names.get(value)
}

/** Error number for a symbolic name (`ENOENT`), if the platform knows it. */
export function errnoNumber(name: string): number | undefined {
  return errnoTables().numbers.get(name)
}

export class Errno implements ErrorCode<number> {
  private readonly val: number

  constructor(val = 0) {
    this.val = val
    Object.freeze(this)
  }

  value(): number {
    return this.val
  }

  valueOf(): number {
    return this.val
  }

  print(): string {
    return errnoMessage(this.val)
  }

  name(): string | undefined {
    return errnoName(this.val)
  }

  toString(): string {
    return this.print()
  }

  /**
   * Reinterpret the raw number as a member of a numeric enum.
   * Returns `undefined` when the enum has no member with this number.
   *
   * @deprecated Legacy shim for numeric error domains; compare `value()` instead.
   */
  asLegacyEnum<T extends number>(enumObject: Record<string, string | T>): T | undefined {
    return Object.values(enumObject).find((member): member is T => member === this.val)
  }
}

export const ERRNO: ErrorCodeDomain<Errno> = {
  name: 'errno',
  none: () => new Errno(0),
  owns: (candidate: unknown): candidate is Errno => candidate instanceof Errno,
  revive: (raw: unknown) =>
    typeof raw === 'number' && Number.isInteger(raw) && raw >= 0 ? new Errno(raw) : undefined,
}

// ── errno state ──

let current = 0

export function errno(): number {
  return current
}

export function setErrno(value: number): void {
  current = value
}

/** Run `fn` and put the error number back the way it was, whatever `fn` did to it. */
export function preserveErrno<T>(fn: () => T): T {
  const saved = current
  try {
    return fn()
  } finally {
    current = saved
  }
}

/**
 * Positive error number carried by a Node system error (`err.code` such as
 * `ENOENT`, else the libuv `err.errno`), or `undefined` for other exceptions.
 */
export function errnoFromException(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined
  if ('code' in err && typeof err.code === 'string') {
    const fromName = errnoNumber(err.code)
    if (fromName !== undefined) return fromName
  }
  if ('errno' in err && typeof err.errno === 'number' && err.errno !== 0) {
    return Math.abs(err.errno)
  }
  return undefined
}

/** Store the error number of a caught exception (EIO when it has none) and return it. */
export function captureErrno(err: unknown): number {
  const value = errnoFromException(err) ?? errnoNumber('EIO') ?? 5
  current = value
  return value
}

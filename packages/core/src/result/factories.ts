/**
 * Convenience producers of ErrorBuilder, mostly for the errno domain.
 */

import type { ErrorCode, ErrorCodeDomain } from './error-code.js'
import { ERRNO, Errno, errno, preserveErrno } from './errno.js'
import { ErrorBuilder } from './error-builder.js'
import { formatMessage } from './format.js'
import { ResultError } from './result-error.js'

/** `Error()` / `Error(code)` for errno codes. */
export function newError(code?: Errno | number): ErrorBuilder<Errno> {
  if (code === undefined) return ErrorBuilder.create(ERRNO)
  return ErrorBuilder.create(ERRNO, typeof code === 'number' ? new Errno(code) : code)
}

export function newErrorIn<E extends ErrorCode>(domain: ErrorCodeDomain<E>, code?: E): ErrorBuilder<E> {
  return ErrorBuilder.create(domain, code)
}

/** Builder carrying the current error number. Call it before anything else can change errno. */
export function errnoError(): ErrorBuilder<Errno> {
  return ErrorBuilder.create(ERRNO, new Errno(errno()))
}

/**
 * The code of the first ResultError among `args` whose code belongs to
 * `domain`; otherwise `code` itself.
 */
export function errorCode<E extends ErrorCode>(
  domain: ErrorCodeDomain<E>,
  code: E,
  ...args: unknown[]
): E {
  for (const arg of args) {
    if (arg instanceof ResultError && domain.owns(arg.code)) return arg.code
  }
  return code
}

/**
 * `Error() << format(fmt, args...)`. No code is attached, but a ResultError
 * among the arguments lends its code to the failure.
 */
export function errorf(fmt: string, ...args: unknown[]): ErrorBuilder<Errno> {
  return errorfIn(ERRNO, fmt, ...args)
}

export function errorfIn<E extends ErrorCode>(
  domain: ErrorCodeDomain<E>,
  fmt: string,
  ...args: unknown[]
): ErrorBuilder<E> {
  const message = preserveErrno(() => formatMessage(fmt, args))
  return ErrorBuilder.prefilled(domain, false, errorCode(domain, domain.none(), ...args), message)
}

/** `ErrnoError() << format(fmt, args...)`, with errno read before formatting starts. */
export function errnoErrorf(fmt: string, ...args: unknown[]): ErrorBuilder<Errno> {
  const code = new Errno(errno())
  const message = preserveErrno(() => formatMessage(fmt, args))
  return ErrorBuilder.prefilled(ERRNO, true, code, message)
}

/**
 * Unwrap-or-propagate protocol.
 *
 * `fail()` turns a failed Result into a Propagation, which yields either the
 * bare code or a failed Result of another success type carrying the same
 * ResultError. The code type E stays the same along a propagation chain.
 */

import { contractViolation } from '../common/contract.js'
import type { ErrorCode } from './error-code.js'
import type { Errno } from './errno.js'
import type { ResultError } from './result-error.js'
import { Err, unwrap, unwrapErr } from './result.js'
import type { Failed, Result } from './result.js'

export interface OkOrFail<V, T, F> {
  isOk(value: V): boolean
  unwrap(value: V): T
  fail(value: V): F
  errorMessage(value: V): string
}

export class Propagation<E extends ErrorCode = Errno> {
  readonly error: ResultError<E>

  constructor(error: ResultError<E>) {
    this.error = error
  }

  code(): E {
    return this.error.code
  }

  into(): Failed<E> {
    return Err(this.error)
  }
}

export function fail<T, E extends ErrorCode>(result: Result<T, E>): Propagation<E> {
  if (result.ok) {
    return contractViolation('fail called on a successful result')
  }
  return new Propagation(result.error)
}

export function okOrFail<T, E extends ErrorCode = Errno>(): OkOrFail<Result<T, E>, T, Propagation<E>> {
  return {
    isOk: (result) => result.ok,
    unwrap: (result) => unwrap(result),
    fail: (result) => fail(result),
    errorMessage: (result) => unwrapErr(result).message,
  }
}

/** Unwrap through `protocol`, treating a failure as fatal. */
export function orFatalWith<V, T, F>(value: V, protocol: OkOrFail<V, T, F>): T {
  if (!protocol.isOk(value)) {
    return contractViolation(protocol.errorMessage(value))
  }
  return protocol.unwrap(value)
}

export function orFatal<T, E extends ErrorCode>(result: Result<T, E>): T {
  return orFatalWith(result, okOrFail<T, E>())
}

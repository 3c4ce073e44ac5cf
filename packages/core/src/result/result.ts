/**
 * Result type for fallible operations.
 * Holds either a success value or a ResultError; set once and frozen.
 *
 * ```typescript
 * async function hasAWord(): Promise<Result<boolean>> {
 *   const content = await readFileToString('notes.txt')
 *   if (!content.ok) {
 *     return newError().append('failed to process: ', content.error).toResult()
 *   }
 *   return Ok(content.value.includes('happy'))
 * }
 * ```
 */

import { contractViolation } from '../common/contract.js'
import type { ErrorCode } from './error-code.js'
import type { Errno } from './errno.js'
import type { ResultError } from './result-error.js'

export type Ok<T> = { readonly ok: true; readonly value: T }
export type Failed<E extends ErrorCode = Errno> = { readonly ok: false; readonly error: ResultError<E> }
export type Result<T, E extends ErrorCode = Errno> = Ok<T> | Failed<E>

export function Ok(): Ok<void>
export function Ok<T>(value: T): Ok<T>
export function Ok<T>(value?: T): Ok<T | undefined> {
  const ok: Ok<T | undefined> = { ok: true, value }
  return Object.freeze(ok)
}

export function Err<E extends ErrorCode>(error: ResultError<E>): Failed<E> {
  const failed: Failed<E> = { ok: false, error }
  return Object.freeze(failed)
}

export function isOk<T, E extends ErrorCode>(result: Result<T, E>): result is Ok<T> {
  return result.ok
}

export function isErr<T, E extends ErrorCode>(result: Result<T, E>): result is Failed<E> {
  return !result.ok
}

export function unwrap<T, E extends ErrorCode>(result: Result<T, E>): T {
  if (result.ok) return result.value
  return contractViolation(`unwrap called on a failed result: ${result.error.message}`)
}

export function unwrapErr<T, E extends ErrorCode>(result: Result<T, E>): ResultError<E> {
  if (!result.ok) return result.error
  return contractViolation('unwrapErr called on a successful result')
}

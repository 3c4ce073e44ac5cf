/**
 * ErrorBuilder — the fluent accumulator behind every new failure.
 *
 * A builder is single-use: it collects text (and optionally a code), then is
 * turned into a failed Result exactly once with `toResult()`. The resulting
 * ResultError is a fresh frozen object, so nothing aliases the builder's state.
 *
 * ```typescript
 * return newError().append('failed to process: ', content.error).toResult()
 * return errnoError().append('failed to open ', path).toResult()
 * ```
 */

import { contractViolation } from '../common/contract.js'
import type { ErrorCode, ErrorCodeDomain } from './error-code.js'
import { preserveErrno } from './errno.js'
import type { Errno } from './errno.js'
import { ResultError } from './result-error.js'
import { Err } from './result.js'
import type { Failed } from './result.js'

export class ErrorBuilder<E extends ErrorCode = Errno> {
  private readonly domain: ErrorCodeDomain<E>
  private readonly hasCode: boolean
  private code: E
  private buffer = ''
  private consumed = false

  private constructor(domain: ErrorCodeDomain<E>, hasCode: boolean, code: E, message: string) {
    this.domain = domain
    this.hasCode = hasCode
    this.code = code
    this.append(message)
  }

  /** Empty builder; attaches `code` when one is given. */
  static create<E extends ErrorCode>(domain: ErrorCodeDomain<E>, code?: E): ErrorBuilder<E> {
    return code === undefined
      ? new ErrorBuilder(domain, false, domain.none(), '')
      : new ErrorBuilder(domain, true, code, '')
  }

  /** @internal Sets code and initial text in one step; used by the formatted factories. */
  static prefilled<E extends ErrorCode>(
    domain: ErrorCodeDomain<E>,
    hasCode: boolean,
    code: E,
    message: string,
  ): ErrorBuilder<E> {
    return new ErrorBuilder(domain, hasCode, code, message)
  }

  /**
   * Append parts to the message. A ResultError of this builder's domain also
   * hands over its code unless one was attached explicitly; with several such
   * parts the last one's code wins. `errorf` differs: there the first
   * ResultError argument supplies the code.
   */
  append(...parts: unknown[]): this {
    if (this.consumed) {
      contractViolation('append on an error builder that was already turned into a result')
    }
    for (const part of parts) {
      if (part instanceof ResultError && this.domain.owns(part.code)) {
        if (!this.hasCode) this.code = part.code
        this.buffer += part.message
        continue
      }
      preserveErrno(() => {
        this.buffer += String(part)
      })
    }
    return this
  }

  /** Final message: the text, then `": " + code.print()` when a code is attached. */
  str(): string {
    if (!this.hasCode) return this.buffer
    const description = this.code.print()
    return this.buffer.length === 0 ? description : `${this.buffer}: ${description}`
  }

  toString(): string {
    return this.str()
  }

  /** Freeze the builder's state into a payload. Consumes the builder. */
  toResultError(): ResultError<E> {
    if (this.consumed) {
      contractViolation('error builder was already turned into a result')
    }
    this.consumed = true
    return new ResultError(this.str(), this.code)
  }

  /** The failed Result for a `return` site; assignable to any `Result<T, E>`. */
  toResult(): Failed<E> {
    return Err(this.toResultError())
  }
}

/**
 * ResultError: the failure payload stored inside a Result, a message plus a typed code.
 * Only ErrorBuilder produces these for new failures.
 */

import { codesEqual } from './error-code.js'
import type { ErrorCode, ErrorCodeValue } from './error-code.js'
import type { Errno } from './errno.js'

export class ResultError<E extends ErrorCode = Errno> {
  readonly message: string
  readonly code: E

  constructor(message: string, code: E) {
    this.message = message
    this.code = code
    Object.freeze(this)
  }

  equals(other: ResultError<E>): boolean {
    return this.message === other.message && codesEqual(this.code, other.code)
  }

  /** Only the message: the builder already folded the code's text into it. */
  toString(): string {
    return this.message
  }

  toJSON(): { message: string; code: ErrorCodeValue } {
    return { message: this.message, code: this.code.value() }
  }
}

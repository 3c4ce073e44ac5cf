/**
 * Typed error class for failures that are not carried by a Result:
 * contract violations, malformed format strings and bad configuration.
 */

export type FallibleErrorKind =
  | 'CONTRACT_VIOLATION'
  | 'FORMAT_ERROR'
  | 'CONFIG_ERROR'

export class FallibleError extends Error {
  readonly kind: FallibleErrorKind

  constructor(kind: FallibleErrorKind, message: string) {
    super(message)
    this.name = 'FallibleError'
    this.kind = kind
  }

  static contract(message: string): FallibleError {
    return new FallibleError('CONTRACT_VIOLATION', message)
  }

  static format(message: string): FallibleError {
    return new FallibleError('FORMAT_ERROR', message)
  }

  static config(message: string): FallibleError {
    return new FallibleError('CONFIG_ERROR', message)
  }
}

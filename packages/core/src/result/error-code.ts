/**
 * The contract every error code type used with Result must satisfy.
 *
 * A code is a small immutable wrapper: `value()` is the raw identifier
 * (errno number, application key, ...) and `print()` its human-readable text.
 */

export type ErrorCodeValue = number | string

export interface ErrorCode<V extends ErrorCodeValue = ErrorCodeValue> {
  value(): V
  print(): string
}

/**
 * A family of codes. Builders need it to produce the "no error" default
 * and to recognise payloads of their own family at runtime.
 */
export interface ErrorCodeDomain<E extends ErrorCode> {
  readonly name: string
  none(): E
  owns(candidate: unknown): candidate is E
  /** Rebuild a code from its serialized `value()`, or `undefined` if it is not one of ours. */
  revive(raw: unknown): E | undefined
}

export function codesEqual(a: ErrorCode, b: ErrorCode): boolean {
  if (a === b) return true
  return Object.getPrototypeOf(a) === Object.getPrototypeOf(b) && a.value() === b.value()
}

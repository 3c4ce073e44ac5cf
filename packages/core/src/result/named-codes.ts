/**
 * Application-defined code domains keyed by string, e.g.
 *
 * ```typescript
 * const STORE = defineNamedCodes('store', {
 *   OK: 'ok',
 *   NOT_FOUND: 'record not found',
 *   CONFLICT: 'version conflict',
 * }, 'OK')
 *
 * return newErrorIn(STORE, STORE.code('NOT_FOUND')).append('order ', id).toResult()
 * ```
 */

import type { ErrorCode, ErrorCodeDomain } from './error-code.js'

export class NamedCode<K extends string = string> implements ErrorCode<K> {
  readonly key: K
  private readonly description: string

  constructor(key: K, description: string) {
    this.key = key
    this.description = description
    Object.freeze(this)
  }

  value(): K {
    return this.key
  }

  print(): string {
    return this.description
  }

  toString(): string {
    return this.description
  }
}

export interface NamedCodeDomain<K extends string> extends ErrorCodeDomain<NamedCode<K>> {
  code(key: K): NamedCode<K>
}

export function defineNamedCodes<K extends string>(
  name: string,
  descriptions: Record<K, string>,
  noneKey: NoInfer<K>,
): NamedCodeDomain<K> {
  const interned = new Map<string, NamedCode<K>>()

  const isKey = (raw: string): raw is K => Object.prototype.hasOwnProperty.call(descriptions, raw)

  const code = (key: K): NamedCode<K> => {
    let existing = interned.get(key)
    if (!existing) {
      existing = new NamedCode(key, descriptions[key])
      interned.set(key, existing)
    }
    return existing
  }

  return {
    name,
    code,
    none: () => code(noneKey),
    owns: (candidate: unknown): candidate is NamedCode<K> =>
      candidate instanceof NamedCode && interned.get(candidate.key) === candidate,
    revive: (raw: unknown) => (typeof raw === 'string' && isKey(raw) ? code(raw) : undefined),
  }
}

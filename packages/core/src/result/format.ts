/**
 * Eager `{}`-style message formatting for the formatted error factories.
 *
 * Supports automatic `{}` and positional `{0}` fields plus `{{` / `}}` escapes.
 * Arguments render through `String()`, so a ResultError renders as its message.
 * A malformed format string is a programmer error and throws.
 */

import { FallibleError } from '../common/errors.js'

export function formatMessage(fmt: string, args: readonly unknown[]): string {
  let out = ''
  let nextAuto = 0
  let numbering: 'auto' | 'manual' | undefined
  let i = 0

  while (i < fmt.length) {
    const ch = fmt[i]

    if (ch === '}') {
      if (fmt[i + 1] !== '}') {
        throw FallibleError.format(`unmatched '}' at offset ${i} in format string "${fmt}"`)
      }
      out += '}'
      i += 2
      continue
    }

    if (ch !== '{') {
      out += ch
      i += 1
      continue
    }

    if (fmt[i + 1] === '{') {
      out += '{'
      i += 2
      continue
    }

    const close = fmt.indexOf('}', i + 1)
    if (close === -1) {
      throw FallibleError.format(`unterminated '{' at offset ${i} in format string "${fmt}"`)
    }
    const field = fmt.slice(i + 1, close)

    let index: number
    if (field === '') {
      if (numbering === 'manual') {
        throw FallibleError.format(`cannot switch from manual to automatic field numbering in "${fmt}"`)
      }
      numbering = 'auto'
      index = nextAuto++
    } else if (/^\d+$/.test(field)) {
      if (numbering === 'auto') {
        throw FallibleError.format(`cannot switch from automatic to manual field numbering in "${fmt}"`)
      }
      numbering = 'manual'
      index = Number(field)
    } else {
      throw FallibleError.format(`invalid replacement field '{${field}}' in format string "${fmt}"`)
    }

    if (index >= args.length) {
      throw FallibleError.format(`argument index ${index} out of range (${args.length} given) in "${fmt}"`)
    }
    out += String(args[index])
    i = close + 1
  }

  return out
}

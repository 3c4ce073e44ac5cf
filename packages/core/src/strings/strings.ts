/**
 * Byte-oriented string helpers: splitting, joining, trimming and affix tests.
 * Case-insensitive variants fold ASCII letters only.
 */

import { contractViolation } from '../common/contract.js'

const WHITESPACE = new Set([' ', '\t', '\n', '\v', '\f', '\r'])

function indexOfAny(s: string, delimiters: string, from: number): number {
  for (let i = from; i < s.length; i++) {
    if (delimiters.includes(s[i])) return i
  }
  return -1
}

/**
 * Split at every occurrence of any character in `delimiters`.
 * Empty pieces are kept, so `split('', ',')` is `['']` and `join(split(s, d), d) === s`
 * for a single-character `d`.
 */
export function split(s: string, delimiters: string): string[] {
  if (delimiters.length === 0) contractViolation('split: empty delimiter list')

  const result: string[] = []
  let base = 0
  for (;;) {
    const found = indexOfAny(s, delimiters, base)
    if (found === -1) {
      result.push(s.slice(base))
      return result
    }
    result.push(s.slice(base, found))
    base = found + 1
  }
}

/** Like `split`, but only non-empty tokens. */
export function tokenize(s: string, delimiters: string): string[] {
  if (delimiters.length === 0) contractViolation('tokenize: empty delimiter list')
  return split(s, delimiters).filter((token) => token.length > 0)
}

export function trim(s: string): string {
  let start = 0
  let end = s.length
  while (start < end && WHITESPACE.has(s[start])) start++
  while (end > start && WHITESPACE.has(s[end - 1])) end--
  return s.slice(start, end)
}

export function join(things: Iterable<unknown>, separator: string | number): string {
  let out = ''
  let first = true
  for (const thing of things) {
    if (!first) out += String(separator)
    out += String(thing)
    first = false
  }
  return out
}

function asciiLower(s: string): string {
  return s.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32))
}

export function startsWith(s: string, prefix: string): boolean {
  return s.startsWith(prefix)
}

export function startsWithIgnoreCase(s: string, prefix: string): boolean {
  return s.length >= prefix.length && equalsIgnoreCase(s.slice(0, prefix.length), prefix)
}

export function endsWith(s: string, suffix: string): boolean {
  return s.endsWith(suffix)
}

export function endsWithIgnoreCase(s: string, suffix: string): boolean {
  return s.length >= suffix.length && equalsIgnoreCase(s.slice(s.length - suffix.length), suffix)
}

export function equalsIgnoreCase(lhs: string, rhs: string): boolean {
  return lhs.length === rhs.length && asciiLower(lhs) === asciiLower(rhs)
}

/** `s` without `prefix`, or `undefined` if `s` does not start with it. */
export function consumePrefix(s: string, prefix: string): string | undefined {
  return s.startsWith(prefix) ? s.slice(prefix.length) : undefined
}

/** `s` without `suffix`, or `undefined` if `s` does not end with it. */
export function consumeSuffix(s: string, suffix: string): string | undefined {
  return s.endsWith(suffix) ? s.slice(0, s.length - suffix.length) : undefined
}

/**
 * Replace `from` with `to` once, or every non-overlapping match left to right when `all` is set.
 * An empty `from` leaves `s` unchanged.
 */
export function stringReplace(s: string, from: string, to: string, all: boolean): string {
  if (from.length === 0) return s
  if (all) return s.split(from).join(to)
  const at = s.indexOf(from)
  return at === -1 ? s : s.slice(0, at) + to + s.slice(at + from.length)
}

/**
 * @fallible/core
 *
 * Result<T, E> values for recoverable failures, the fluent ErrorBuilder that
 * produces them, errno codes, and the small string and file helpers built on top.
 */

export * from './result/index.js'
export * from './strings/index.js'
export * from './io/index.js'
export * from './config/index.js'
export * from './common/index.js'

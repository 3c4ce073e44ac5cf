/**
 * Fail-fast path for programmer errors (unwrapping a failed Result, reusing a
 * consumed builder, ...). These are never encoded as another Result.
 */

import { getConfig } from '../config/config.js'
import { FallibleError } from './errors.js'

export function contractViolation(message: string): never {
  const config = getConfig()
  if (config.logViolations) {
    console.error(`[result] contract violation: ${message}`)
  }
  if (config.onContractViolation === 'abort') {
    process.abort()
  }
  throw FallibleError.contract(message)
}

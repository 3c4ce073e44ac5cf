/**
 * Common utilities — error class, contract violations, shared schemas.
 */

export { FallibleError } from './errors.js'
export type { FallibleErrorKind } from './errors.js'

export { contractViolation } from './contract.js'

export {
  ErrorCodeValueSchema,
  SerializedResultErrorSchema,
  SerializedResultSchema,
} from './schemas.js'
export type { SerializedResultError, SerializedResult } from './schemas.js'

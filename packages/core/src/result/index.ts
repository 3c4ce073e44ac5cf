export { codesEqual } from './error-code.js'
export type { ErrorCode, ErrorCodeDomain, ErrorCodeValue } from './error-code.js'

export {
  Errno,
  ERRNO,
  errno,
  setErrno,
  preserveErrno,
  errnoFromException,
  captureErrno,
  errnoMessage,
  errnoName,
  errnoNumber,
} from './errno.js'

export { NamedCode, defineNamedCodes } from './named-codes.js'
export type { NamedCodeDomain } from './named-codes.js'

export { ResultError } from './result-error.js'

export { Ok, Err, isOk, isErr, unwrap, unwrapErr } from './result.js'
export type { Result, Failed } from './result.js'

export { ErrorBuilder } from './error-builder.js'
export { formatMessage } from './format.js'
export {
  newError,
  newErrorIn,
  errnoError,
  errorCode,
  errorf,
  errorfIn,
  errnoErrorf,
} from './factories.js'

export { Propagation, fail, okOrFail, orFatal, orFatalWith } from './propagate.js'
export type { OkOrFail } from './propagate.js'

export { serializeResult, deserializeResultError, deserializeResult } from './serialization.js'

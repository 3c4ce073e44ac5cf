/**
 * Plain-data form of results, for sending failures across process or IPC boundaries.
 */

import type { z } from 'zod'
import { SerializedResultErrorSchema, SerializedResultSchema } from '../common/schemas.js'
import type { SerializedResult, SerializedResultError } from '../common/schemas.js'
import type { ErrorCode, ErrorCodeDomain } from './error-code.js'
import { errnoNumber } from './errno.js'
import type { ErrorBuilder } from './error-builder.js'
import type { Errno } from './errno.js'
import { newError } from './factories.js'
import { ResultError } from './result-error.js'
import { Err, Ok } from './result.js'
import type { Result } from './result.js'

function invalidArgument(): ErrorBuilder<Errno> {
  return newError(errnoNumber('EINVAL') ?? 22)
}

function issuePath(error: z.ZodError): string {
  const path = error.issues[0]?.path ?? []
  return path.length > 0 ? path.join('.') : '<root>'
}

export function serializeResult<T, E extends ErrorCode>(
  result: Result<T, E>,
  serializeValue: (value: T) => unknown = (value) => value,
): SerializedResult {
  if (result.ok) return { ok: true, value: serializeValue(result.value) }
  return { ok: false, error: result.error.toJSON() }
}

function reviveResultError<E extends ErrorCode>(
  data: SerializedResultError,
  domain: ErrorCodeDomain<E>,
): Result<ResultError<E>> {
  const code = domain.revive(data.code)
  if (code === undefined) {
    return invalidArgument()
      .append('unknown ', domain.name, ' code ', JSON.stringify(data.code))
      .toResult()
  }
  return Ok(new ResultError(data.message, code))
}

export function deserializeResultError<E extends ErrorCode>(
  input: unknown,
  domain: ErrorCodeDomain<E>,
): Result<ResultError<E>> {
  const parsed = SerializedResultErrorSchema.safeParse(input)
  if (!parsed.success) {
    return invalidArgument().append('malformed result error at ', issuePath(parsed.error)).toResult()
  }
  return reviveResultError(parsed.data, domain)
}

/**
 * Rebuild a Result from its serialized form. The outer Result reports
 * malformed input; the inner one is the deserialized value.
 */
export function deserializeResult<T, E extends ErrorCode>(
  input: unknown,
  domain: ErrorCodeDomain<E>,
  valueSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<Result<T, E>> {
  const parsed = SerializedResultSchema.safeParse(input)
  if (!parsed.success) {
    return invalidArgument().append('malformed result at ', issuePath(parsed.error)).toResult()
  }

  const envelope = parsed.data
  if (!envelope.ok) {
    const error = reviveResultError(envelope.error, domain)
    if (!error.ok) return error
    return Ok(Err(error.value))
  }

  const value = valueSchema.safeParse(envelope.value)
  if (!value.success) {
    return invalidArgument().append('malformed result value at ', issuePath(value.error)).toResult()
  }
  return Ok(Ok(value.data))
}

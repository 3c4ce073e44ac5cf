/**
 * Shared Zod schemas for the wire form of results and their failures.
 */

import { z } from 'zod'

export const ErrorCodeValueSchema = z.union([z.number().int(), z.string().min(1)])

export const SerializedResultErrorSchema = z.object({
  message: z.string(),
  code: ErrorCodeValueSchema,
})
export type SerializedResultError = z.infer<typeof SerializedResultErrorSchema>

export const SerializedResultSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), error: SerializedResultErrorSchema }),
])
export type SerializedResult = z.infer<typeof SerializedResultSchema>

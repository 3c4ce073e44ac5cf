/**
 * Library configuration — how contract violations are reported.
 */

import { z } from 'zod'
import { FallibleError } from '../common/errors.js'

export const ContractViolationModeSchema = z.enum(['throw', 'abort'])
export type ContractViolationMode = z.infer<typeof ContractViolationModeSchema>

export const FallibleConfigSchema = z.object({
  onContractViolation: ContractViolationModeSchema.default('throw'),
  logViolations: z.boolean().default(true),
})
export type FallibleConfig = z.infer<typeof FallibleConfigSchema>

const PartialConfigSchema = FallibleConfigSchema.partial().strict()

const DEFAULT_CONFIG: FallibleConfig = FallibleConfigSchema.parse({})

let active: FallibleConfig = DEFAULT_CONFIG

export function getConfig(): FallibleConfig {
  return active
}

/**
 * Merge `input` into the active configuration.
 * Invalid input is a programmer error and throws.
 */
export function configure(input: unknown): FallibleConfig {
  const parsed = PartialConfigSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw FallibleError.config(`invalid configuration: ${where}${issue?.message ?? 'unknown issue'}`)
  }
  const { onContractViolation, logViolations } = parsed.data
  active = {
    onContractViolation: onContractViolation ?? active.onContractViolation,
    logViolations: logViolations ?? active.logViolations,
  }
  return active
}

export function resetConfig(): void {
  active = DEFAULT_CONFIG
}

const BOOLEAN_STRINGS = new Map<string, boolean>([
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false],
])

/**
 * Read configuration overrides from environment variables.
 * Returns the merged config without applying it; unknown values are warned about and skipped.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): FallibleConfig {
  const next: FallibleConfig = { ...active }

  const mode = env.FALLIBLE_ON_CONTRACT_VIOLATION
  if (mode !== undefined) {
    const parsed = ContractViolationModeSchema.safeParse(mode.trim().toLowerCase())
    if (parsed.success) {
      next.onContractViolation = parsed.data
    } else {
      console.warn(`[config] ignoring FALLIBLE_ON_CONTRACT_VIOLATION=${JSON.stringify(mode)}`)
    }
  }

  const log = env.FALLIBLE_LOG_VIOLATIONS
  if (log !== undefined) {
    const value = BOOLEAN_STRINGS.get(log.trim().toLowerCase())
    if (value !== undefined) {
      next.logViolations = value
    } else {
      console.warn(`[config] ignoring FALLIBLE_LOG_VIOLATIONS=${JSON.stringify(log)}`)
    }
  }

  return next
}

/**
 * Environment configuration for the command-line planner.
 *
 *   GRANTS_CSV         path to the grant CSV (required)
 *   BRACKET_CEILING    ordinary income ceiling in shekels (required)
 *   TAXABLE_INCOME     current taxable income in shekels (default 0)
 *   TAX_YEAR           default 2025
 *   SALE_DATE          YYYY-MM-DD, default today
 *   MANUAL_ALLOCATION  e.g. "GRANT-1:50, GRANT-2:30" — skips optimization
 *   OVERFLOW_POLICY    reject | zero-sell (default reject)
 *   LOG_LEVEL          debug | info | warn | error (default info)
 */

import { z } from 'zod'
import { agorot } from './model/amounts'
import { ConfigurationError } from './model/errors'
import { describeIssues, isoDateSchema } from './model/schemas'
import type { OverflowPolicy } from './rules/manualAllocation'
import type { LogLevel } from './utils/logger'
import { isLogLevel } from './utils/logger'

// ── Schema ───────────────────────────────────────────────────────

/** Shekel amount as typed in a shell: "150000", "150,000", "84120.50". */
const shekelAmountSchema = z
  .string()
  .transform((value) => value.replace(/,/g, '').trim())
  .pipe(z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected an amount in shekels'))
  .transform((value) => agorot(Number(value)))

export const plannerEnvironmentSchema = z.object({
  GRANTS_CSV: z.string().trim().min(1, 'Path to the grant CSV is required'),
  BRACKET_CEILING: shekelAmountSchema,
  TAXABLE_INCOME: shekelAmountSchema.default('0'),
  TAX_YEAR: z
    .string()
    .regex(/^\d{4}$/, 'Tax year must be a 4-digit year')
    .default('2025')
    .transform((value) => parseInt(value, 10)),
  SALE_DATE: isoDateSchema.optional(),
  MANUAL_ALLOCATION: z.string().optional(),
  OVERFLOW_POLICY: z.enum(['reject', 'zero-sell']).default('reject'),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .refine(isLogLevel, { message: 'Invalid log level' })
    .default('info'),
})

// ── Loader ───────────────────────────────────────────────────────

export interface PlannerConfig {
  grantsCsvPath: string
  /** Agorot. */
  currentTaxableIncome: number
  /** Agorot. */
  bracketCeiling: number
  taxYear: number
  saleDate: string | undefined
  manualAllocation: string | undefined
  onOverflow: OverflowPolicy
  logLevel: LogLevel
}

/**
 * Read and validate planner settings from the environment.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const parsed = plannerEnvironmentSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`)
  }

  const cfg = parsed.data
  return {
    grantsCsvPath: cfg.GRANTS_CSV,
    currentTaxableIncome: cfg.TAXABLE_INCOME,
    bracketCeiling: cfg.BRACKET_CEILING,
    taxYear: cfg.TAX_YEAR,
    saleDate: cfg.SALE_DATE,
    manualAllocation: cfg.MANUAL_ALLOCATION,
    onOverflow: cfg.OVERFLOW_POLICY,
    logLevel: cfg.LOG_LEVEL,
  }
}

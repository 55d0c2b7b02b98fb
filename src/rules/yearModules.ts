/**
 * Multi-Year Tax Rules Registry
 *
 * Maps tax year → YearRulesModule so the planner picks the right bracket
 * table, capital-gains rate and trustee period for a run.
 *
 * Adding a new tax year:
 * 1. Create src/rules/<year>/constants.ts — year-specific brackets/rates
 * 2. Create src/rules/<year>/yearModule.ts — bundle them
 * 3. Register the module in this file
 */

import type { TaxBracket } from '../model/types'
import { ConfigurationError } from '../model/errors'

// ── Interface ────────────────────────────────────────────────────

export interface YearRulesModule {
  taxYear: number

  /** Ordinary income schedule, ascending (agorot). */
  incomeTaxBrackets: readonly TaxBracket[]

  /** Flat rate on net capital gain. */
  capitalGainsRate: number

  /** Section 102 trustee holding period, in months from grant. */
  trusteeHoldingMonths: number
}

// ── Registry ─────────────────────────────────────────────────────

import { yearModule2025 } from './2025/yearModule'
import { yearModule2026 } from './2026/yearModule'

const YEAR_MODULES: Map<number, YearRulesModule> = new Map([
  [2025, yearModule2025],
  [2026, yearModule2026],
])

/**
 * Resolve the rules module for a given tax year.
 * Throws ConfigurationError if the year is not registered.
 */
export function getYearModule(year: number): YearRulesModule {
  const mod = YEAR_MODULES.get(year)
  if (!mod) {
    const supported = getSupportedTaxYears().join(', ')
    throw new ConfigurationError(
      `No rules module registered for tax year ${year}. Supported years: ${supported}`,
      { taxYear: year },
    )
  }
  return mod
}

/** List all tax years with registered rules modules. */
export function getSupportedTaxYears(): number[] {
  return [...YEAR_MODULES.keys()].sort((a, b) => a - b)
}

/**
 * Tax Bracket Engine — progressive ordinary tax and flat capital-gains tax.
 *
 * The schedule is always passed in explicitly so that several tax years can
 * be evaluated side by side without sharing state.
 *
 * All amounts in integer agorot; rates as decimals.
 */

import type { TaxBracket } from '../model/types'
import { ConfigurationError } from '../model/errors'
import { bracketScheduleSchema, describeIssues, rateSchema } from '../model/schemas'

export const DEFAULT_CAPITAL_GAINS_RATE = 0.25

// ── Schedule validation ─────────────────────────────────────────

/**
 * Check that a bracket schedule is usable:
 * starts at 0, each floor equals the previous ceiling, rates never decrease,
 * and the top bracket is open-ended.
 *
 * @throws ConfigurationError describing the first problem found
 */
export function validateBracketSchedule(brackets: readonly TaxBracket[]): void {
  const parsed = bracketScheduleSchema.safeParse(brackets)
  if (!parsed.success) {
    throw new ConfigurationError(`Malformed bracket schedule: ${describeIssues(parsed.error)}`)
  }

  if (brackets[0].floor !== 0) {
    throw new ConfigurationError('First bracket must start at 0', { floor: brackets[0].floor })
  }

  for (let i = 0; i < brackets.length; i++) {
    const bracket = brackets[i]
    const isLast = i === brackets.length - 1

    if (bracket.ceiling === null) {
      if (!isLast) {
        throw new ConfigurationError(`Bracket ${i} is open-ended but is not the last bracket`, { index: i })
      }
      continue
    }

    if (bracket.ceiling <= bracket.floor) {
      throw new ConfigurationError(`Bracket ${i} ceiling must be above its floor`, {
        index: i, floor: bracket.floor, ceiling: bracket.ceiling,
      })
    }

    if (isLast) {
      throw new ConfigurationError('Last bracket must be open-ended (ceiling: null)', { index: i })
    }

    const next = brackets[i + 1]
    if (next.floor !== bracket.ceiling) {
      const kind = next.floor > bracket.ceiling ? 'a gap' : 'an overlap'
      throw new ConfigurationError(`Bracket schedule has ${kind} between brackets ${i} and ${i + 1}`, {
        index: i, ceiling: bracket.ceiling, nextFloor: next.floor,
      })
    }
    if (next.rate < bracket.rate) {
      throw new ConfigurationError(`Bracket rates must not decrease (bracket ${i + 1})`, {
        index: i + 1, rate: next.rate, previousRate: bracket.rate,
      })
    }
  }
}

// ── Bracket arithmetic ──────────────────────────────────────────

/**
 * Compute tax using progressive tax brackets.
 * Assumes a validated schedule.
 *
 * @param income - agorot; zero or negative income owes nothing
 * @returns tax in agorot (rounded to the nearest agora)
 */
export function computeBracketTax(income: number, brackets: readonly TaxBracket[]): number {
  if (income <= 0) return 0

  let tax = 0
  for (const bracket of brackets) {
    if (income <= bracket.floor) break
    const top = bracket.ceiling === null ? income : Math.min(income, bracket.ceiling)
    tax += (top - bracket.floor) * bracket.rate
  }

  return Math.round(tax)
}

/**
 * Rate of the bracket containing `income` (floor ≤ income < ceiling).
 * Income at or below zero falls in the first bracket.
 */
export function bracketRateAt(income: number, brackets: readonly TaxBracket[]): number {
  for (const bracket of brackets) {
    if (bracket.ceiling === null || income < bracket.ceiling) return bracket.rate
  }
  return brackets[brackets.length - 1].rate
}

/**
 * Flat tax on a net capital result. Losses owe nothing and never produce a
 * negative (refundable) amount.
 */
export function computeCapitalGainsTax(netGain: number, rate: number = DEFAULT_CAPITAL_GAINS_RATE): number {
  if (netGain <= 0) return 0
  return Math.round(netGain * rate)
}

// ── Engine ──────────────────────────────────────────────────────

export interface TaxBracketEngine {
  readonly brackets: readonly TaxBracket[]
  readonly capitalGainsRate: number

  /** Tax on total ordinary income for the year. */
  ordinaryTax(income: number): number

  /** Extra ordinary tax caused by stacking `added` on top of `base`. */
  incrementalOrdinaryTax(base: number, added: number): number

  marginalRate(income: number): number

  /** Defaults to the engine's capital-gains rate. */
  capitalGainsTax(netGain: number, rate?: number): number
}

/**
 * Validate a schedule once and bind the arithmetic to it.
 *
 * @throws ConfigurationError for a malformed schedule or rate
 */
export function createTaxBracketEngine(
  brackets: readonly TaxBracket[],
  capitalGainsRate: number = DEFAULT_CAPITAL_GAINS_RATE,
): TaxBracketEngine {
  validateBracketSchedule(brackets)
  if (!rateSchema.safeParse(capitalGainsRate).success) {
    throw new ConfigurationError('Capital gains rate must be between 0 and 1', { capitalGainsRate })
  }

  const schedule = brackets.map((b) => ({ ...b }))

  return {
    brackets: schedule,
    capitalGainsRate,
    ordinaryTax: (income) => computeBracketTax(income, schedule),
    incrementalOrdinaryTax: (base, added) =>
      computeBracketTax(base + added, schedule) - computeBracketTax(base, schedule),
    marginalRate: (income) => bracketRateAt(income, schedule),
    capitalGainsTax: (netGain, rate = capitalGainsRate) => computeCapitalGainsTax(netGain, rate),
  }
}

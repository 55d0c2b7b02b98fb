/**
 * 2025 Tax Year Constants (Israel)
 *
 * Single source of truth for the 2025 numbers used by the sale planner.
 * All monetary amounts are in integer agorot.
 *
 * Primary source: Income Tax Ordinance §121 (individual rates), annual
 * bracket table published by the Israel Tax Authority for 2025.
 * Capital gains: Ordinance §91(b)(1). Section 102 trustee route: §102(b).
 */

import type { TaxBracket } from '../../model/types'

// ── Helpers ────────────────────────────────────────────────────

/** Convert shekels to agorot for readability in this file. */
function a(shekelAmount: number): number {
  return Math.round(shekelAmount * 100)
}

// ── Tax Year ───────────────────────────────────────────────────

export const TAX_YEAR = 2025

// ── Ordinary Income Tax Brackets ───────────────────────────────
// Annual income, individual. The top bracket includes the 3% surtax
// on income above the surtax threshold.
// The ceiling of each bracket is the floor of the next bracket.

export const INCOME_TAX_BRACKETS: TaxBracket[] = [
  { floor: a(0),      ceiling: a(84120),  rate: 0.10 },
  { floor: a(84120),  ceiling: a(120720), rate: 0.14 },
  { floor: a(120720), ceiling: a(193800), rate: 0.20 },
  { floor: a(193800), ceiling: a(269280), rate: 0.31 },
  { floor: a(269280), ceiling: a(560280), rate: 0.35 },
  { floor: a(560280), ceiling: a(721560), rate: 0.47 },
  { floor: a(721560), ceiling: null,      rate: 0.50 },
]

// ── Capital Gains ──────────────────────────────────────────────
// Flat rate for individuals who are not substantial shareholders.
// The 30% substantial-shareholder rate is not modelled.

export const CAPITAL_GAINS_RATE = 0.25

// ── Section 102 Trustee Route ──────────────────────────────────

/** Months from grant the units must stay with the trustee. */
export const TRUSTEE_HOLDING_MONTHS = 24

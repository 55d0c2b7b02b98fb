/**
 * Section 102 holding rule — ordinary vs. capital split per unit.
 *
 * Capital-gains route grants keep capital treatment only when the units
 * stayed with the trustee for the full holding period (24 months from
 * grant). An early sale moves the appreciation into ordinary income; a loss
 * stays a capital loss either way.
 *
 * Ordinary-income route grants are salary from grant to vest and capital
 * gain from vest to sale, regardless of holding period.
 *
 * Per-unit values are integer agorot.
 */

import type { HoldingCompliance, Section102Route } from '../model/types'
import { TRUSTEE_HOLDING_MONTHS } from './2025/constants'

// ── Date arithmetic ─────────────────────────────────────────────

function daysInMonth(year: number, monthIndex: number): number {
  return new Date(Date.UTC(year, monthIndex + 1, 0)).getUTCDate()
}

/**
 * Add calendar months to an ISO date, clamping to the end of the target
 * month when the day does not exist there.
 *
 *   addMonths('2023-01-31', 1)  → '2023-02-28'
 *   addMonths('2024-02-29', 24) → '2026-02-28'
 */
export function addMonths(isoDate: string, months: number): string {
  const [year, month, day] = isoDate.split('-').map(Number)
  const totalMonths = year * 12 + (month - 1) + months
  const targetYear = Math.floor(totalMonths / 12)
  const targetMonth = totalMonths - targetYear * 12
  const targetDay = Math.min(day, daysInMonth(targetYear, targetMonth))

  const mm = String(targetMonth + 1).padStart(2, '0')
  const dd = String(targetDay).padStart(2, '0')
  return `${String(targetYear).padStart(4, '0')}-${mm}-${dd}`
}

/** Date the trustee period ends: the first day a sale keeps capital treatment. */
export function trusteeReleaseDate(grantDate: string, months: number = TRUSTEE_HOLDING_MONTHS): string {
  return addMonths(grantDate, months)
}

/** ISO dates compare correctly as strings. */
export function isTrusteeCompliant(
  grantDate: string,
  saleDate: string,
  months: number = TRUSTEE_HOLDING_MONTHS,
): boolean {
  return saleDate >= trusteeReleaseDate(grantDate, months)
}

// ── Route resolution ────────────────────────────────────────────

/**
 * Map a free-text route label to the closed route variant.
 *
 *   'Capital Gains Route'   → 'capital-gains'
 *   'Ordinary Income Route' → 'ordinary-income'
 *   '' / unknown            → 'capital-gains'
 */
export function resolveRoute(raw: string | null | undefined): Section102Route {
  const lower = (raw ?? '').trim().toLowerCase()
  if (/ordinary|income/.test(lower)) return 'ordinary-income'
  return 'capital-gains'
}

// ── Classification ──────────────────────────────────────────────

export type HoldingPosition =
  | { kind: 'trustee-qualified' }
  | { kind: 'trustee-disqualified' }
  | { kind: 'ordinary-track'; compliance: HoldingCompliance }

export function holdingPosition(route: Section102Route, compliance: HoldingCompliance): HoldingPosition {
  switch (route) {
    case 'capital-gains':
      return compliance === 'compliant' ? { kind: 'trustee-qualified' } : { kind: 'trustee-disqualified' }
    case 'ordinary-income':
      return { kind: 'ordinary-track', compliance }
  }
}

export interface ClassificationInput {
  route: Section102Route
  grantDate: string
  saleDate: string
  grantValuePerUnit: number
  /** Only read on the ordinary-income route. */
  vestValuePerUnit: number
  saleValuePerUnit: number
  holdingMonths?: number
}

export interface Classification {
  ordinaryPerUnit: number
  capitalPerUnit: number
  compliance: HoldingCompliance
  note: string
}

function assertNever(value: never): never {
  throw new Error(`Unhandled holding position: ${JSON.stringify(value)}`)
}

/**
 * Split per-unit appreciation (sale − grant) into ordinary and capital parts.
 *
 * The two parts always sum to sale − grant, and the ordinary part is never
 * negative.
 */
export function classifyAppreciation(input: ClassificationInput): Classification {
  const months = input.holdingMonths ?? TRUSTEE_HOLDING_MONTHS
  const compliance: HoldingCompliance = isTrusteeCompliant(input.grantDate, input.saleDate, months)
    ? 'compliant'
    : 'non-compliant'
  const appreciation = input.saleValuePerUnit - input.grantValuePerUnit
  const position = holdingPosition(input.route, compliance)

  switch (position.kind) {
    case 'trustee-qualified':
      return {
        ordinaryPerUnit: 0,
        capitalPerUnit: appreciation,
        compliance,
        note: `§102 capital gains route: held ${months}+ months with trustee`,
      }

    case 'trustee-disqualified':
      return {
        ordinaryPerUnit: Math.max(appreciation, 0),
        capitalPerUnit: Math.min(appreciation, 0),
        compliance,
        note: appreciation < 0
          ? `§102 disqualified (sold < ${months}m): loss stays a capital loss`
          : `§102 disqualified (sold < ${months}m): appreciation taxed as ordinary income`,
      }

    case 'ordinary-track': {
      const ordinaryPerUnit = Math.max(input.vestValuePerUnit - input.grantValuePerUnit, 0)
      return {
        ordinaryPerUnit,
        capitalPerUnit: appreciation - ordinaryPerUnit,
        compliance: position.compliance,
        note: '§102 ordinary income route: grant→vest ordinary, vest→sale capital',
      }
    }

    default:
      return assertNever(position)
  }
}

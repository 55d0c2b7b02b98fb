/**
 * 2026 Tax Year Constants (Israel)
 *
 * Bracket indexation is suspended for 2025–2027, so the 2026 thresholds
 * carry the 2025 values. Re-check against the Tax Authority table before
 * relying on them for a filed return.
 */

export {
  INCOME_TAX_BRACKETS,
  CAPITAL_GAINS_RATE,
  TRUSTEE_HOLDING_MONTHS,
} from '../2025/constants'

export const TAX_YEAR = 2026

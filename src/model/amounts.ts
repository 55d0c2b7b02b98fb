/**
 * Money helpers.
 *
 * Every monetary value inside the planner is an integer number of agorot
 * (1/100 ILS) so that per-unit values multiply into totals without
 * floating-point drift. Conversion happens once, at the boundary.
 */

// ── Unit conversion ────────────────────────────────────────────

/**
 * Convert a shekel amount to integer agorot.
 *
 *   agorot(100.10) → 10010
 *   agorot(0)      → 0
 *   agorot(-50.5)  → -5050
 */
export function agorot(shekelAmount: number): number {
  return Math.round(shekelAmount * 100)
}

/**
 * Convert integer agorot back to shekels for display.
 *
 *   shekels(10010) → 100.1
 *   shekels(-5050) → -50.5
 */
export function shekels(amountInAgorot: number): number {
  return amountInAgorot / 100
}

// ── Rounding ───────────────────────────────────────────────────

const HALF_EVEN_EPSILON = 1e-9

/**
 * Round to the nearest integer, ties to the even neighbour (banker's rounding).
 *
 *   roundHalfEven(2.5)  → 2
 *   roundHalfEven(3.5)  → 4
 *   roundHalfEven(-2.5) → -2
 *   roundHalfEven(2.51) → 3
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  const diff = value - floor
  if (Math.abs(diff - 0.5) < HALF_EVEN_EPSILON) {
    return floor % 2 === 0 ? floor : floor + 1
  }
  const rounded = Math.round(value)
  // Math.round(-0.2) yields -0
  return rounded === 0 ? 0 : rounded
}

/**
 * Zod runtime validation schemas — mirror the TypeScript types in types.ts.
 *
 * Used at the edges of the core: bracket schedules handed in by callers,
 * grant records and quotes coming from intake, and environment config.
 *
 * Conventions:
 *  - Monetary amounts are integer agorot.
 *  - Quote prices are positive decimals in the quote currency.
 *  - Dates are ISO YYYY-MM-DD.
 */

import { z } from 'zod'

// ── Reusable validators ──────────────────────────────────────────

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

/** ISO calendar date that actually exists (rejects 2025-02-30). */
const isoDateSchema = z.string().regex(ISO_DATE, 'Date must be YYYY-MM-DD').refine(
  (value) => {
    const parsed = new Date(`${value}T00:00:00Z`)
    return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value
  },
  'Date does not exist in the calendar',
)

/** Non-negative integer (agorot). */
const agorotNonNeg = z.number().int().min(0, 'Amount must be non-negative')

const rateSchema = z.number().min(0, 'Rate must be ≥ 0').max(1, 'Rate must be ≤ 1')

// ── Tax brackets ─────────────────────────────────────────────────

const taxBracketSchema = z.object({
  floor: agorotNonNeg,
  ceiling: agorotNonNeg.nullable(),
  rate: rateSchema,
})

const bracketScheduleSchema = z.array(taxBracketSchema).min(1, 'Bracket schedule is empty')

// ── Grants ───────────────────────────────────────────────────────

const section102RouteSchema = z.enum(['capital-gains', 'ordinary-income'])

const grantSchema = z.object({
  id: z.string().trim().min(1, 'Grant id is required'),
  company: z.string(),
  ticker: z.string().trim().min(1, 'Ticker is required'),
  grantDate: isoDateSchema,
  vestDate: isoDateSchema,
  units: z.number().int('Units must be a whole number').positive('Units must be positive'),
  route: section102RouteSchema,
})

// ── Quotes ───────────────────────────────────────────────────────

const priceQuoteSchema = z.object({
  price: z.number().finite().positive('Price must be positive'),
  fxRate: z.number().finite().positive('FX rate must be positive').optional(),
})

// ── Manual allocation ────────────────────────────────────────────

/** Units arrive as the raw text after the colon; only plain digits are accepted. */
const allocationEntrySchema = z.object({
  grantId: z.string().trim().min(1),
  units: z
    .string()
    .trim()
    .regex(/^\d+$/, 'Units must be a whole number of units')
    .transform(Number)
    .pipe(z.number().int().safe()),
})

// ── Helpers ──────────────────────────────────────────────────────

/** Flatten zod issues into one readable line: "units: Units must be positive". */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

export {
  isoDateSchema,
  rateSchema,
  taxBracketSchema,
  bracketScheduleSchema,
  section102RouteSchema,
  grantSchema,
  priceQuoteSchema,
  allocationEntrySchema,
}

/**
 * Grant valuation — turn a grant record plus its price quotes into a
 * priced, classified grant the optimizer can work with.
 *
 * Quotes arrive in the quote currency with an FX rate for their date; they
 * are converted to agorot here, once. A grant that cannot be valued raises
 * PricingError for that grant alone, so a batch can carry on without it.
 */

import type {
  ClassifiedGrant,
  Grant,
  GrantEntry,
  PriceQuote,
  PricingExclusion,
  QuoteBundle,
} from '../model/types'
import { PricingError } from '../model/errors'
import { describeIssues, grantSchema, priceQuoteSchema } from '../model/schemas'
import { agorot } from '../model/amounts'
import { classifyAppreciation } from './holdingRule'

export interface ValuationOptions {
  /** Trustee holding period; defaults to the classifier's 24 months. */
  holdingMonths?: number
}

export interface AssemblyResult {
  grants: ClassifiedGrant[]
  exclusions: PricingExclusion[]
}

type QuoteLabel = 'grant' | 'vest' | 'sale'

const QUOTE_DESCRIPTIONS: Record<QuoteLabel, string> = {
  grant: 'grant-date',
  vest: 'vest-date',
  sale: 'sale',
}

// ── Conversion ──────────────────────────────────────────────────

/**
 * Convert a per-unit quote into agorot: price × FX, rounded to the agora.
 *
 *   convertQuote({ price: 26.32, fxRate: 3.8 }) → 10002
 *   convertQuote({ price: 120 })                → 12000
 */
export function convertQuote(quote: PriceQuote): number {
  return agorot(quote.price * (quote.fxRate ?? 1))
}

function requireQuote(grantId: string, label: QuoteLabel, quote: PriceQuote | undefined): number {
  const what = QUOTE_DESCRIPTIONS[label]
  if (!quote) {
    throw new PricingError(grantId, `missing ${what} quote`)
  }
  const parsed = priceQuoteSchema.safeParse(quote)
  if (!parsed.success) {
    throw new PricingError(grantId, `invalid ${what} quote (${describeIssues(parsed.error)})`)
  }
  const value = convertQuote(parsed.data)
  if (value <= 0) {
    throw new PricingError(grantId, `${what} value rounds to zero`)
  }
  return value
}

// ── Assembly ────────────────────────────────────────────────────

/**
 * Value and classify one grant.
 *
 * The vest-date quote is required only on the ordinary-income route, where
 * it sets the ordinary/capital boundary.
 *
 * @throws PricingError naming the grant when a quote or the record is unusable
 */
export function assembleGrant(
  grant: Grant,
  quotes: QuoteBundle,
  saleDate: string,
  options: ValuationOptions = {},
): ClassifiedGrant {
  const grantId = grant.id.trim() === '' ? '(unnamed)' : grant.id

  const record = grantSchema.safeParse(grant)
  if (!record.success) {
    throw new PricingError(grantId, `invalid grant record (${describeIssues(record.error)})`)
  }
  if (grant.vestDate < grant.grantDate) {
    throw new PricingError(grantId, `vest date ${grant.vestDate} is before grant date ${grant.grantDate}`)
  }

  const grantValuePerUnit = requireQuote(grantId, 'grant', quotes.grant)
  const saleValuePerUnit = requireQuote(grantId, 'sale', quotes.sale)
  const vestValuePerUnit = grant.route === 'ordinary-income' || quotes.vest
    ? requireQuote(grantId, 'vest', quotes.vest)
    : null

  const classification = classifyAppreciation({
    route: grant.route,
    grantDate: grant.grantDate,
    saleDate,
    grantValuePerUnit,
    vestValuePerUnit: vestValuePerUnit ?? grantValuePerUnit,
    saleValuePerUnit,
    holdingMonths: options.holdingMonths,
  })

  return Object.freeze({
    ...grant,
    grantValuePerUnit,
    vestValuePerUnit,
    saleValuePerUnit,
    ...classification,
  })
}

/**
 * Value a whole batch. Grants that raise PricingError are left out and
 * reported in `exclusions`; any other error propagates.
 */
export function assembleGrants(
  entries: readonly GrantEntry[],
  saleDate: string,
  options: ValuationOptions = {},
): AssemblyResult {
  const grants: ClassifiedGrant[] = []
  const exclusions: PricingExclusion[] = []

  for (const entry of entries) {
    try {
      grants.push(assembleGrant(entry.grant, entry.quotes, saleDate, options))
    } catch (err) {
      if (!(err instanceof PricingError)) throw err
      exclusions.push({ grantId: err.grantId, reason: err.reason })
    }
  }

  return { grants, exclusions }
}

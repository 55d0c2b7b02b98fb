/**
 * Planner data model.
 *
 * Monetary amounts are integer agorot unless a field says otherwise
 * (quote prices are in the quote currency and converted on assembly).
 * Dates are ISO `YYYY-MM-DD` strings.
 */

// ── Tax schedule ───────────────────────────────────────────────

export interface TaxBracket {
  floor: number            // agorot — income above this is taxed at `rate`
  ceiling: number | null   // agorot — null for the open-ended top bracket
  rate: number             // decimal, e.g. 0.10 for 10%
}

// ── Grants ─────────────────────────────────────────────────────

/**
 * Section 102 election. Capital-gains grants sit with a trustee and need the
 * holding period to keep capital treatment; ordinary-income grants are taxed
 * as salary up to vest and as capital gain after it.
 */
export type Section102Route = 'capital-gains' | 'ordinary-income'

export interface Grant {
  readonly id: string
  readonly company: string
  readonly ticker: string
  readonly grantDate: string
  readonly vestDate: string
  readonly units: number
  readonly route: Section102Route
}

// ── Quotes ─────────────────────────────────────────────────────

/** A per-unit price in the quote currency plus the FX rate into ILS. */
export interface PriceQuote {
  price: number
  fxRate?: number   // ILS per quote-currency unit; omitted when already in ILS
}

export interface QuoteBundle {
  grant?: PriceQuote
  vest?: PriceQuote
  sale?: PriceQuote
}

/** A grant record as handed over by intake, with whatever quotes were found. */
export interface GrantEntry {
  grant: Grant
  quotes: QuoteBundle
}

// ── Valuation ──────────────────────────────────────────────────

export interface PricedGrant extends Grant {
  readonly grantValuePerUnit: number
  readonly vestValuePerUnit: number | null
  readonly saleValuePerUnit: number
}

export type HoldingCompliance = 'compliant' | 'non-compliant'

export interface ClassifiedGrant extends PricedGrant {
  readonly ordinaryPerUnit: number
  readonly capitalPerUnit: number
  readonly compliance: HoldingCompliance
  readonly note: string
}

export interface PricingExclusion {
  grantId: string
  reason: string
}

// ── Allocation ─────────────────────────────────────────────────

export interface SaleAllocation {
  readonly grantId: string
  readonly unitsSold: number
}

export type AllocationMode = 'optimized' | 'manual'

export interface OptimizationResult {
  readonly mode: AllocationMode
  readonly allocations: readonly SaleAllocation[]
  readonly grants: readonly ClassifiedGrant[]
  readonly currentTaxableIncome: number
  readonly bracketCeiling: number
  readonly headroom: number
  readonly totalOrdinaryIncomeAdded: number
  readonly netCapitalGain: number        // may be negative (reported, never carried)
  readonly ordinaryTax: number
  readonly capitalTax: number
  readonly totalTax: number
  readonly grossProceeds: number
  readonly netProceeds: number
}

export interface OptimizerParams {
  currentTaxableIncome: number
  bracketCeiling: number
}

// ── Summary ────────────────────────────────────────────────────

export interface SummaryRow {
  grantId: string
  company: string
  ticker: string
  grantDate: string
  unitsSold: number
  grantValuePerUnit: number
  saleValuePerUnit: number
  ordinaryPerUnit: number
  capitalPerUnit: number
  proceeds: number
  ordinaryAmount: number
  capitalAmount: number
  ordinaryTax: number
  capitalTax: number
  totalTax: number
  netProceeds: number
  note: string
}

export interface SummaryTotal {
  unitsSold: number
  proceeds: number
  ordinaryAmount: number
  capitalAmount: number
  ordinaryTax: number
  capitalTax: number
  totalTax: number
  netProceeds: number
}

export interface SaleSummary {
  rows: SummaryRow[]
  total: SummaryTotal
}

/**
 * Summary rollup — per-grant rows and a consolidated total for display.
 *
 * Tax is computed on the whole sale, so per-grant tax is an apportionment:
 * ordinary tax by each grant's share of the ordinary income added, capital
 * tax by each grant's share of the positive capital gains (grants sold at a
 * loss carry no capital tax; their loss already reduced the net).
 *
 * Amounts are rounded half-even to whole agorot.
 */

import type { OptimizationResult, SaleSummary, SummaryRow, SummaryTotal } from '../model/types'
import { roundHalfEven } from '../model/amounts'

function share(total: number, part: number, whole: number): number {
  if (whole <= 0 || part <= 0) return 0
  return roundHalfEven((total * part) / whole)
}

export function summarizeResult(result: OptimizationResult): SaleSummary {
  const grantsById = new Map(result.grants.map((g) => [g.id, g]))

  const sold = result.allocations.flatMap((allocation) => {
    const grant = grantsById.get(allocation.grantId)
    return grant && allocation.unitsSold > 0 ? [{ grant, unitsSold: allocation.unitsSold }] : []
  })

  const grossGains = sold.reduce((sum, s) => sum + Math.max(s.unitsSold * s.grant.capitalPerUnit, 0), 0)

  const rows: SummaryRow[] = sold.map(({ grant, unitsSold }) => {
    const proceeds = unitsSold * grant.saleValuePerUnit
    const ordinaryAmount = unitsSold * grant.ordinaryPerUnit
    const capitalAmount = unitsSold * grant.capitalPerUnit
    const ordinaryTax = share(result.ordinaryTax, ordinaryAmount, result.totalOrdinaryIncomeAdded)
    const capitalTax = share(result.capitalTax, capitalAmount, grossGains)
    const totalTax = ordinaryTax + capitalTax

    return {
      grantId: grant.id,
      company: grant.company,
      ticker: grant.ticker,
      grantDate: grant.grantDate,
      unitsSold,
      grantValuePerUnit: grant.grantValuePerUnit,
      saleValuePerUnit: grant.saleValuePerUnit,
      ordinaryPerUnit: grant.ordinaryPerUnit,
      capitalPerUnit: grant.capitalPerUnit,
      proceeds: roundHalfEven(proceeds),
      ordinaryAmount: roundHalfEven(ordinaryAmount),
      capitalAmount: roundHalfEven(capitalAmount),
      ordinaryTax,
      capitalTax,
      totalTax,
      netProceeds: roundHalfEven(proceeds - totalTax),
      note: grant.note,
    }
  })

  const total: SummaryTotal = {
    unitsSold: rows.reduce((sum, r) => sum + r.unitsSold, 0),
    proceeds: roundHalfEven(result.grossProceeds),
    ordinaryAmount: roundHalfEven(result.totalOrdinaryIncomeAdded),
    capitalAmount: roundHalfEven(result.netCapitalGain),
    ordinaryTax: roundHalfEven(result.ordinaryTax),
    capitalTax: roundHalfEven(result.capitalTax),
    totalTax: roundHalfEven(result.totalTax),
    netProceeds: roundHalfEven(result.netProceeds),
  }

  return { rows, total }
}

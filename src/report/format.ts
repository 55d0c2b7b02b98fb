/**
 * Markdown rendering of a sale plan — the per-grant strategy table, the
 * financial summary and any grants left out of the plan.
 */

import type { PricingExclusion, SummaryRow } from '../model/types'
import type { AllocationOverflowError } from '../model/errors'
import { shekels } from '../model/amounts'
import type { PlanOutcome } from '../rules/engine'

// ── Formatting helpers ───────────────────────────────────────────

/**
 *   formatAgorot(123456) → '1,234.56 ₪'
 *   formatAgorot(-500)   → '-5.00 ₪'
 */
export function formatAgorot(amount: number): string {
  const value = shekels(amount).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })
  return `${value} ₪`
}

/**   formatRate(0.31) → '31%' */
export function formatRate(rate: number): string {
  return `${Math.round(rate * 10000) / 100}%`
}

function tableRow(cells: (string | number)[]): string {
  return `| ${cells.join(' | ')} |`
}

// ── Sections ─────────────────────────────────────────────────────

const STRATEGY_HEADERS = [
  'Grant', 'Company', 'Grant Date', 'Units to Sell', 'Grant Value/unit', 'Sale Value/unit',
  'Ordinary/unit', 'Capital/unit', 'Proceeds', 'Income Tax', 'Capital Gains Tax', 'Total Tax',
  'Net Proceeds', 'Note',
]

function strategyRow(row: SummaryRow): string {
  return tableRow([
    `${row.grantId} (${row.ticker})`,
    row.company,
    row.grantDate,
    row.unitsSold,
    formatAgorot(row.grantValuePerUnit),
    formatAgorot(row.saleValuePerUnit),
    formatAgorot(row.ordinaryPerUnit),
    formatAgorot(row.capitalPerUnit),
    formatAgorot(row.proceeds),
    formatAgorot(row.ordinaryTax),
    formatAgorot(row.capitalTax),
    formatAgorot(row.totalTax),
    formatAgorot(row.netProceeds),
    row.note,
  ])
}

export function renderStrategyTable(outcome: PlanOutcome): string[] {
  const { rows, total } = outcome.summary
  const title = outcome.result.mode === 'manual' ? '## Manual Sale Allocation' : '## Recommended Sales Strategy'
  if (rows.length === 0) {
    return [title, '', 'No sale could be recommended within the selected constraints.']
  }

  return [
    title,
    '',
    tableRow(STRATEGY_HEADERS),
    tableRow(STRATEGY_HEADERS.map(() => '---')),
    ...rows.map(strategyRow),
    tableRow([
      '**Total**', '', '', total.unitsSold, '', '', '', '',
      formatAgorot(total.proceeds),
      formatAgorot(total.ordinaryTax),
      formatAgorot(total.capitalTax),
      formatAgorot(total.totalTax),
      formatAgorot(total.netProceeds),
      '',
    ]),
  ]
}

export function renderFinancialSummary(outcome: PlanOutcome): string[] {
  const { result, marginalRate } = outcome
  const taxableForBrackets = result.currentTaxableIncome + result.totalOrdinaryIncomeAdded

  return [
    '## Financial Summary',
    '',
    tableRow(['Metric', 'Amount']),
    tableRow(['---', '---']),
    tableRow(['Salary', formatAgorot(result.currentTaxableIncome)]),
    tableRow(['Grant ordinary income', formatAgorot(result.totalOrdinaryIncomeAdded)]),
    tableRow(['Taxable income for brackets', formatAgorot(taxableForBrackets)]),
    tableRow(['Bracket ceiling', formatAgorot(result.bracketCeiling)]),
    tableRow(['Net capital gain (taxed separately)', formatAgorot(result.netCapitalGain)]),
    tableRow(['Income tax', formatAgorot(result.ordinaryTax)]),
    tableRow(['Capital gains tax', formatAgorot(result.capitalTax)]),
    tableRow(['Total tax', formatAgorot(result.totalTax)]),
    tableRow(['Gross proceeds', formatAgorot(result.grossProceeds)]),
    tableRow(['Net proceeds', formatAgorot(result.netProceeds)]),
    tableRow(['Marginal rate after sale', formatRate(marginalRate)]),
  ]
}

export function renderExclusions(
  exclusions: readonly PricingExclusion[],
  overflows: readonly AllocationOverflowError[] = [],
): string[] {
  if (exclusions.length === 0 && overflows.length === 0) return []

  const lines = ['## Not Included', '']
  for (const e of exclusions) {
    lines.push(`- ${e.grantId}: ${e.reason}`)
  }
  for (const o of overflows) {
    lines.push(`- ${o.grantId}: override asked for ${o.requested} units, ${o.available} held; sold 0`)
  }
  return lines
}

/** Full report: strategy table, financial summary, exclusions. */
export function renderPlanMarkdown(outcome: PlanOutcome): string {
  const sections = [
    [`# Sale Plan — tax year ${outcome.taxYear}, sale date ${outcome.saleDate}`],
    renderStrategyTable(outcome),
    renderFinancialSummary(outcome),
    renderExclusions(outcome.exclusions, outcome.overflows),
  ].filter((section) => section.length > 0)

  return sections.map((section) => section.join('\n')).join('\n\n') + '\n'
}

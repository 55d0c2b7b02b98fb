/**
 * Markdown report rendering.
 */

import { describe, it, expect } from 'vitest'
import { planSales } from '../../src/rules/engine'
import type { PlanRequest } from '../../src/rules/engine'
import {
  formatAgorot,
  formatRate,
  renderExclusions,
  renderFinancialSummary,
  renderPlanMarkdown,
  renderStrategyTable,
} from '../../src/report/format'
import { AllocationOverflowError } from '../../src/model/errors'
import { SALE_DATE, TWO_BRACKETS, memoryLogger, ordinaryRouteEntry } from '../fixtures/grants'

function plan(overrides: Partial<PlanRequest> = {}) {
  const { logger } = memoryLogger('error')
  return planSales({
    entries: [ordinaryRouteEntry()],
    currentTaxableIncome: 8000,
    bracketCeiling: 10000,
    brackets: TWO_BRACKETS,
    saleDate: SALE_DATE,
    ...overrides,
  }, { logger })
}

// ── Helpers ─────────────────────────────────────────────────────

describe('formatAgorot', () => {
  it('formats agorot as shekels with two decimals', () => {
    expect(formatAgorot(123456)).toBe('1,234.56 ₪')
    expect(formatAgorot(-500)).toBe('-5.00 ₪')
    expect(formatAgorot(0)).toBe('0.00 ₪')
  })
})

describe('formatRate', () => {
  it('formats a decimal rate as a percentage', () => {
    expect(formatRate(0.31)).toBe('31%')
    expect(formatRate(0.14)).toBe('14%')
    expect(formatRate(0.025)).toBe('2.5%')
  })
})

// ── Sections ────────────────────────────────────────────────────

describe('renderStrategyTable', () => {
  it('renders a row per grant and a total', () => {
    const lines = renderStrategyTable(plan())

    expect(lines[0]).toBe('## Recommended Sales Strategy')
    expect(lines[4]).toBe(
      '| GRANT-1 (ACME) | Acme Ltd | 2023-01-01 | 2 | 100.00 ₪ | 120.00 ₪ | 10.00 ₪ | 10.00 ₪ | 240.00 ₪ '
      + '| 2.00 ₪ | 5.00 ₪ | 7.00 ₪ | 233.00 ₪ | §102 ordinary income route: grant→vest ordinary, vest→sale capital |',
    )
    expect(lines[5]).toBe('| **Total** |  |  | 2 |  |  |  |  | 240.00 ₪ | 2.00 ₪ | 5.00 ₪ | 7.00 ₪ | 233.00 ₪ |  |')
  })

  it('says so when nothing can be sold', () => {
    const lines = renderStrategyTable(plan({ currentTaxableIncome: 10000 }))
    expect(lines).toEqual([
      '## Recommended Sales Strategy',
      '',
      'No sale could be recommended within the selected constraints.',
    ])
  })

  it('titles a manual allocation', () => {
    expect(renderStrategyTable(plan({ manualAllocation: 'GRANT-1:1' }))[0]).toBe('## Manual Sale Allocation')
  })
})

describe('renderFinancialSummary', () => {
  it('lists income, tax and proceeds', () => {
    const lines = renderFinancialSummary(plan())

    expect(lines).toContain('| Salary | 80.00 ₪ |')
    expect(lines).toContain('| Grant ordinary income | 20.00 ₪ |')
    expect(lines).toContain('| Taxable income for brackets | 100.00 ₪ |')
    expect(lines).toContain('| Total tax | 7.00 ₪ |')
    expect(lines).toContain('| Net proceeds | 233.00 ₪ |')
    expect(lines[lines.length - 1]).toBe('| Marginal rate after sale | 30% |')
  })
})

describe('renderExclusions', () => {
  it('is empty when nothing was left out', () => {
    expect(renderExclusions([], [])).toEqual([])
  })

  it('lists excluded grants and overflowing overrides', () => {
    expect(renderExclusions(
      [{ grantId: 'GRANT-2', reason: 'missing sale quote' }],
      [new AllocationOverflowError('GRANT-3', 12, 10)],
    )).toEqual([
      '## Not Included',
      '',
      '- GRANT-2: missing sale quote',
      '- GRANT-3: override asked for 12 units, 10 held; sold 0',
    ])
  })
})

// ── Full report ─────────────────────────────────────────────────

describe('renderPlanMarkdown', () => {
  it('joins the sections with a heading', () => {
    const markdown = renderPlanMarkdown(plan())

    expect(markdown.startsWith('# Sale Plan — tax year 2025, sale date 2025-06-01\n\n## Recommended Sales Strategy\n')).toBe(true)
    expect(markdown).toContain('\n\n## Financial Summary\n')
    expect(markdown).not.toContain('## Not Included')
    expect(markdown.endsWith('| Marginal rate after sale | 30% |\n')).toBe(true)
  })
})

/**
 * Summary rollup — per-grant rows and apportioned tax.
 */

import { describe, it, expect } from 'vitest'
import { createTaxBracketEngine } from '../../src/rules/taxBrackets'
import { evaluateAllocation, optimizeSales } from '../../src/rules/optimizer'
import { summarizeResult } from '../../src/rules/summary'
import { TWO_BRACKETS, makeGrant } from '../fixtures/grants'

const engine = createTaxBracketEngine(TWO_BRACKETS)

describe('summarizeResult', () => {
  it('builds one row per grant sold', () => {
    const grant = makeGrant({
      route: 'ordinary-income',
      vestValuePerUnit: 11000,
      ordinaryPerUnit: 1000,
      capitalPerUnit: 1000,
      note: 'ordinary route',
    })
    const summary = summarizeResult(
      optimizeSales({ currentTaxableIncome: 8000, bracketCeiling: 10000 }, [grant], engine),
    )

    expect(summary.rows).toEqual([{
      grantId: 'GRANT-1',
      company: 'Acme Ltd',
      ticker: 'ACME',
      grantDate: '2020-01-01',
      unitsSold: 2,
      grantValuePerUnit: 10000,
      saleValuePerUnit: 12000,
      ordinaryPerUnit: 1000,
      capitalPerUnit: 1000,
      proceeds: 24000,
      ordinaryAmount: 2000,
      capitalAmount: 2000,
      ordinaryTax: 200,
      capitalTax: 500,
      totalTax: 700,
      netProceeds: 23300,
      note: 'ordinary route',
    }])
    expect(summary.total).toEqual({
      unitsSold: 2,
      proceeds: 24000,
      ordinaryAmount: 2000,
      capitalAmount: 2000,
      ordinaryTax: 200,
      capitalTax: 500,
      totalTax: 700,
      netProceeds: 23300,
    })
  })

  it('leaves unsold grants out of the rows', () => {
    const summary = summarizeResult(evaluateAllocation(
      { currentTaxableIncome: 0, bracketCeiling: 0 },
      [makeGrant({ id: 'A' }), makeGrant({ id: 'B' })],
      new Map([['B', 1]]),
      engine,
      'manual',
    ))
    expect(summary.rows.map((r) => r.grantId)).toEqual(['B'])
  })

  it('splits ordinary tax by share of ordinary income, rounding half to even', () => {
    // 210 agorot of ordinary income → 21 tax, 10.5 each → 10 each
    const summary = summarizeResult(evaluateAllocation(
      { currentTaxableIncome: 0, bracketCeiling: 10000 },
      [
        makeGrant({ id: 'A', ordinaryPerUnit: 105, capitalPerUnit: 0 }),
        makeGrant({ id: 'B', ordinaryPerUnit: 105, capitalPerUnit: 0 }),
      ],
      new Map([['A', 1], ['B', 1]]),
      engine,
      'manual',
    ))

    expect(summary.rows.map((r) => r.ordinaryTax)).toEqual([10, 10])
    expect(summary.total.ordinaryTax).toBe(21)
  })

  it('puts capital tax on gain rows only', () => {
    const summary = summarizeResult(evaluateAllocation(
      { currentTaxableIncome: 0, bracketCeiling: 0 },
      [
        makeGrant({ id: 'LOSS', capitalPerUnit: -980, saleValuePerUnit: 9020 }),
        makeGrant({ id: 'GAIN', capitalPerUnit: 1000, saleValuePerUnit: 11000 }),
      ],
      new Map([['LOSS', 1], ['GAIN', 1]]),
      engine,
      'manual',
    ))

    expect(summary.rows.map((r) => [r.grantId, r.capitalAmount, r.capitalTax])).toEqual([
      ['LOSS', -980, 0],
      ['GAIN', 1000, 5],
    ])
    expect(summary.total.capitalAmount).toBe(20)
    expect(summary.total.capitalTax).toBe(5)
    expect(summary.total.proceeds).toBe(20020)
  })

  it('summarizes an empty result as zeros', () => {
    const summary = summarizeResult(optimizeSales({ currentTaxableIncome: 0, bracketCeiling: 0 }, [], engine))
    expect(summary.rows).toEqual([])
    expect(summary.total.unitsSold).toBe(0)
    expect(summary.total.totalTax).toBe(0)
  })
})

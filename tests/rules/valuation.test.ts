/**
 * Grant valuation — quote conversion, classification and exclusions.
 */

import { describe, it, expect } from 'vitest'
import type { GrantEntry } from '../../src/model/types'
import { PricingError } from '../../src/model/errors'
import { assembleGrant, assembleGrants, convertQuote } from '../../src/rules/valuation'
import { SALE_DATE, ordinaryRouteEntry } from '../fixtures/grants'

function capitalRouteEntry(id: string): GrantEntry {
  return {
    grant: {
      id,
      company: 'Beta Inc',
      ticker: 'BETA',
      grantDate: '2020-01-01',
      vestDate: '2021-01-01',
      units: 5,
      route: 'capital-gains',
    },
    quotes: {
      grant: { price: 10, fxRate: 3.5 },
      sale: { price: 20, fxRate: 3.6 },
    },
  }
}

function pricingFailure(entry: GrantEntry): PricingError {
  try {
    assembleGrant(entry.grant, entry.quotes, SALE_DATE)
  } catch (err) {
    if (err instanceof PricingError) return err
    throw err
  }
  throw new Error('expected a PricingError')
}

// ── Conversion ──────────────────────────────────────────────────

describe('convertQuote', () => {
  it('applies the FX rate and rounds to the agora', () => {
    expect(convertQuote({ price: 26.32, fxRate: 3.8 })).toBe(10002)
    expect(convertQuote({ price: 120 })).toBe(12000)
  })
})

// ── Single grant ────────────────────────────────────────────────

describe('assembleGrant', () => {
  it('values and classifies an ordinary-route grant', () => {
    const { grant, quotes } = ordinaryRouteEntry()
    const valued = assembleGrant(grant, quotes, SALE_DATE)

    expect(valued.grantValuePerUnit).toBe(10000)
    expect(valued.vestValuePerUnit).toBe(11000)
    expect(valued.saleValuePerUnit).toBe(12000)
    expect(valued.ordinaryPerUnit).toBe(1000)
    expect(valued.capitalPerUnit).toBe(1000)
    expect(valued.units).toBe(10)
    expect(Object.isFrozen(valued)).toBe(true)
  })

  it('does not need a vest quote on the capital gains route', () => {
    const { grant, quotes } = capitalRouteEntry('GRANT-2')
    const valued = assembleGrant(grant, quotes, SALE_DATE)

    expect(valued.vestValuePerUnit).toBeNull()
    expect(valued.grantValuePerUnit).toBe(3500)
    expect(valued.saleValuePerUnit).toBe(7200)
    expect(valued.ordinaryPerUnit).toBe(0)
    expect(valued.capitalPerUnit).toBe(3700)
  })

  it('requires a vest quote on the ordinary route', () => {
    const entry = ordinaryRouteEntry()
    const err = pricingFailure({ ...entry, quotes: { grant: entry.quotes.grant, sale: entry.quotes.sale } })
    expect(err.grantId).toBe('GRANT-1')
    expect(err.reason).toBe('missing vest-date quote')
    expect(err.message).toBe('Cannot value grant GRANT-1: missing vest-date quote')
  })

  it('reports a missing sale quote', () => {
    const entry = ordinaryRouteEntry()
    const err = pricingFailure({ ...entry, quotes: { grant: entry.quotes.grant, vest: entry.quotes.vest } })
    expect(err.reason).toBe('missing sale quote')
  })

  it('reports an invalid quote', () => {
    const entry = ordinaryRouteEntry()
    const err = pricingFailure({ ...entry, quotes: { ...entry.quotes, grant: { price: 0 } } })
    expect(err.reason).toBe('invalid grant-date quote (price: Price must be positive)')
  })

  it('reports a quote worth less than one agora', () => {
    const entry = ordinaryRouteEntry()
    const err = pricingFailure({ ...entry, quotes: { ...entry.quotes, grant: { price: 0.001 } } })
    expect(err.reason).toBe('grant-date value rounds to zero')
  })

  it('rejects a vest date before the grant date', () => {
    const entry = ordinaryRouteEntry()
    const err = pricingFailure({ ...entry, grant: { ...entry.grant, vestDate: '2022-12-31' } })
    expect(err.reason).toBe('vest date 2022-12-31 is before grant date 2023-01-01')
  })

  it('rejects an invalid grant record', () => {
    const entry = ordinaryRouteEntry()
    const err = pricingFailure({ ...entry, grant: { ...entry.grant, units: 0 } })
    expect(err.reason).toBe('invalid grant record (units: Units must be positive)')
  })
})

// ── Batch ───────────────────────────────────────────────────────

describe('assembleGrants', () => {
  it('keeps valid grants and excludes the rest with a reason', () => {
    const broken = ordinaryRouteEntry('GRANT-3')
    const { grants, exclusions } = assembleGrants(
      [
        ordinaryRouteEntry('GRANT-1'),
        capitalRouteEntry('GRANT-2'),
        { ...broken, quotes: { grant: broken.quotes.grant, vest: broken.quotes.vest } },
      ],
      SALE_DATE,
    )

    expect(grants.map((g) => g.id)).toEqual(['GRANT-1', 'GRANT-2'])
    expect(exclusions).toEqual([{ grantId: 'GRANT-3', reason: 'missing sale quote' }])
  })

  it('passes the holding period through to classification', () => {
    const entry = capitalRouteEntry('GRANT-2')
    const { grants } = assembleGrants(
      [{ ...entry, grant: { ...entry.grant, grantDate: '2024-01-01', vestDate: '2024-06-01' } }],
      SALE_DATE,
      { holdingMonths: 12 },
    )
    expect(grants[0].compliance).toBe('compliant')
  })
})

/**
 * Grant CSV import tests.
 */

import { describe, it, expect } from 'vitest'
import { parseGrantsCsv } from '../../src/intake/csv/grants'

const HEADER = 'Company name,Stock Code,Grant date,Vesting date,Number of units,Section 102,Grant price,Vest price,Sale price,Sale FX'

function csv(...rows: string[]): string {
  return [HEADER, ...rows].join('\n') + '\n'
}

// ── Happy path ──────────────────────────────────────────────────

describe('parseGrantsCsv', () => {
  it('imports grants with routes and quotes', () => {
    const result = parseGrantsCsv(csv(
      'Acme Ltd,acme,15/01/2022,15/01/2023,"1,000",Capital Gains Route,10,12,20,3.5',
      'Beta Inc,BETA,2023-03-01,2024-03-01,200,Ordinary Income Route,5,6,8,',
    ))

    expect(result.errors).toEqual([])
    expect(result.warnings).toEqual([])
    expect(result.rowCounts).toEqual({ total: 2, parsed: 2, skipped: 0 })
    expect(result.entries).toEqual([
      {
        grant: {
          id: 'GRANT-1',
          company: 'Acme Ltd',
          ticker: 'ACME',
          grantDate: '2022-01-15',
          vestDate: '2023-01-15',
          units: 1000,
          route: 'capital-gains',
        },
        quotes: {
          grant: { price: 10 },
          vest: { price: 12 },
          sale: { price: 20, fxRate: 3.5 },
        },
      },
      {
        grant: {
          id: 'GRANT-2',
          company: 'Beta Inc',
          ticker: 'BETA',
          grantDate: '2023-03-01',
          vestDate: '2024-03-01',
          units: 200,
          route: 'ordinary-income',
        },
        quotes: {
          grant: { price: 5 },
          vest: { price: 6 },
          sale: { price: 8 },
        },
      },
    ])
  })

  it('takes ids from a Grant ID column', () => {
    const result = parseGrantsCsv([
      'Grant ID,Company,Ticker,Grant Date,Vest Date,Units',
      'ESPP-7,Acme Ltd,ACME,2024-01-01,2024-06-01,15',
    ].join('\n'))

    expect(result.entries.map((e) => e.grant.id)).toEqual(['ESPP-7'])
    expect(result.entries[0].quotes).toEqual({})
  })

  it('strips a byte order mark', () => {
    const result = parseGrantsCsv('\uFEFF' + csv('Acme Ltd,ACME,2022-01-15,2023-01-15,10,,,,,'))
    expect(result.errors).toEqual([])
    expect(result.entries).toHaveLength(1)
  })

  it('warns when there is no Section 102 column', () => {
    const result = parseGrantsCsv([
      'Company name,Stock Code,Grant date,Vesting date,Number of units',
      'Acme Ltd,ACME,2022-01-15,2023-01-15,10',
    ].join('\n'))

    expect(result.warnings).toEqual(['No Section 102 column; all grants default to the capital gains route'])
    expect(result.entries[0].grant.route).toBe('capital-gains')
  })
})

// ── Rejected rows ───────────────────────────────────────────────

describe('parseGrantsCsv — skipped rows', () => {
  it('skips bad rows with a warning and keeps the rest', () => {
    const result = parseGrantsCsv(csv(
      'Acme Ltd,ACME,2022-01-15,2023-01-15,0,,,,,',
      'Acme Ltd,ACME,2022-02-30,2023-01-15,10,,,,,',
      'Acme Ltd,ACME,2023-01-15,2022-01-15,10,,,,,',
      'Acme Ltd,,2022-01-15,2023-01-15,10,,,,,',
      '',
      'Acme Ltd,ACME,2022-01-15,2023-01-15,10,,,,,',
    ))

    expect(result.warnings).toEqual([
      'Row 2: skipped, number of units must be a positive whole number',
      'Row 3: skipped, invalid grant or vesting date',
      'Row 4: skipped, vesting date 2022-01-15 is before grant date 2023-01-15',
      'Row 5: skipped, missing stock code',
    ])
    expect(result.rowCounts).toEqual({ total: 5, parsed: 1, skipped: 4 })
    expect(result.entries[0].grant.id).toBe('GRANT-1')
  })

  it('skips a repeated grant id', () => {
    const result = parseGrantsCsv([
      'Grant ID,Company,Ticker,Grant Date,Vest Date,Units',
      'G-1,Acme Ltd,ACME,2024-01-01,2024-06-01,15',
      'G-1,Acme Ltd,ACME,2024-02-01,2024-07-01,5',
    ].join('\n'))

    expect(result.warnings).toContain('Row 3: skipped, duplicate grant id G-1')
    expect(result.entries).toHaveLength(1)
  })

  it('numbers blank ids past those written in the Grant ID column', () => {
    const result = parseGrantsCsv([
      'Grant ID,Company,Ticker,Grant Date,Vest Date,Units',
      'GRANT-2,Acme Ltd,ACME,2024-01-01,2024-06-01,15',
      ',Acme Ltd,ACME,2024-02-01,2024-07-01,20',
      ',Acme Ltd,ACME,2024-03-01,2024-08-01,5',
      'GRANT-4,Acme Ltd,ACME,2024-04-01,2024-09-01,8',
    ].join('\n'))

    expect(result.entries.map((e) => [e.grant.id, e.grant.units])).toEqual([
      ['GRANT-2', 15],
      ['GRANT-3', 20],
      ['GRANT-5', 5],
      ['GRANT-4', 8],
    ])
    expect(result.warnings).toEqual(['No Section 102 column; all grants default to the capital gains route'])
  })
})

// ── File-level errors ───────────────────────────────────────────

describe('parseGrantsCsv — file errors', () => {
  it('rejects an empty file', () => {
    expect(parseGrantsCsv('').errors).toEqual(['File is empty'])
  })

  it('lists missing required columns', () => {
    const result = parseGrantsCsv('Company name,Stock Code\nAcme Ltd,ACME\n')
    expect(result.errors).toEqual(['Missing required columns: Grant date, Vesting date, Number of units'])
    expect(result.entries).toEqual([])
  })
})

/**
 * Grant-record CSV import.
 *
 * Expected columns (plan administrator export, as typed by the user):
 *   Company name, Stock Code, Grant date, Vesting date, Number of units
 * Optional:
 *   Section 102, Grant ID,
 *   Grant price, Vest price, Sale price (quote currency, per unit),
 *   Grant FX, Vest FX, Sale FX (ILS per quote-currency unit)
 *
 * Headers are matched case-insensitively with a few synonyms. Rows that
 * cannot become a grant are dropped with a warning; the rest still import.
 */

import type { GrantEntry, PriceQuote, QuoteBundle } from '../../model/types'
import { resolveRoute } from '../../rules/holdingRule'
import type { GrantImportResult } from './types'
import { parseCSV, parseGrantDate, parsePositiveNumber, parseUnits } from './utils'

// ── Column mappings ──────────────────────────────────────────

const COLUMN_PATTERNS = {
  company:    /^(company(\s*name)?|issuer|employer)$/i,
  ticker:     /^(stock\s*code|ticker|symbol)$/i,
  grantDate:  /^grant\s*date$/i,
  vestDate:   /^(vesting|vest)\s*date$/i,
  units:      /^(number\s*of\s*units|units|quantity|shares)$/i,
  route:      /^(section\s*102|102\s*route|route|track)$/i,
  grantId:    /^(grant\s*id|grant\s*(no|number)|id)$/i,
  grantPrice: /^grant\s*(price|fmv)$/i,
  vestPrice:  /^(vest|vesting)\s*(price|fmv)$/i,
  salePrice:  /^(sale|current)\s*price$/i,
  grantFx:    /^grant\s*fx(\s*rate)?$/i,
  vestFx:     /^(vest|vesting)\s*fx(\s*rate)?$/i,
  saleFx:     /^(sale|current)\s*fx(\s*rate)?$/i,
} as const

type ColumnKey = keyof typeof COLUMN_PATTERNS
type ColumnMap = Partial<Record<ColumnKey, number>>

const REQUIRED_COLUMNS: { key: ColumnKey; label: string }[] = [
  { key: 'company', label: 'Company name' },
  { key: 'ticker', label: 'Stock Code' },
  { key: 'grantDate', label: 'Grant date' },
  { key: 'vestDate', label: 'Vesting date' },
  { key: 'units', label: 'Number of units' },
]

function isColumnKey(key: string): key is ColumnKey {
  return key in COLUMN_PATTERNS
}

function mapHeaders(headers: string[]): { map: ColumnMap; missing: string[] } {
  const map: ColumnMap = {}

  headers.forEach((header, index) => {
    const h = header.trim()
    for (const [key, pattern] of Object.entries(COLUMN_PATTERNS)) {
      if (isColumnKey(key) && map[key] === undefined && pattern.test(h)) {
        map[key] = index
        break
      }
    }
  })

  const missing = REQUIRED_COLUMNS.filter(({ key }) => map[key] === undefined).map(({ label }) => label)
  return { map, missing }
}

// ── Row helpers ──────────────────────────────────────────────

function getField(row: string[], index: number | undefined): string {
  if (index === undefined || index >= row.length) return ''
  return row[index].trim()
}

function isBlankRow(row: string[]): boolean {
  return row.every((cell) => cell.trim() === '')
}

function readQuote(row: string[], priceIndex: number | undefined, fxIndex: number | undefined): PriceQuote | undefined {
  const price = parsePositiveNumber(getField(row, priceIndex))
  if (price === null) return undefined
  const fxRate = parsePositiveNumber(getField(row, fxIndex))
  return fxRate === null ? { price } : { price, fxRate }
}

function readQuotes(row: string[], map: ColumnMap): QuoteBundle {
  const quotes: QuoteBundle = {}
  const grant = readQuote(row, map.grantPrice, map.grantFx)
  const vest = readQuote(row, map.vestPrice, map.vestFx)
  const sale = readQuote(row, map.salePrice, map.saleFx)
  if (grant) quotes.grant = grant
  if (vest) quotes.vest = vest
  if (sale) quotes.sale = sale
  return quotes
}

// ── Main parser ──────────────────────────────────────────────

/**
 * Parse a grant CSV into grant entries.
 *
 * Grants get the id from the Grant ID column, or GRANT-<n> numbered in
 * import order (1-based, counting only imported rows). A generated id skips
 * any number already written in the Grant ID column.
 */
export function parseGrantsCsv(csv: string): GrantImportResult {
  const entries: GrantEntry[] = []
  const warnings: string[] = []
  const errors: string[] = []
  let total = 0
  let skipped = 0

  const rows = parseCSV(csv.replace(/^\uFEFF/, ''))
  if (rows.length === 0) {
    errors.push('File is empty')
    return { entries, warnings, errors, rowCounts: { total: 0, parsed: 0, skipped: 0 } }
  }

  const { map, missing } = mapHeaders(rows[0])
  if (missing.length > 0) {
    errors.push(`Missing required columns: ${missing.join(', ')}`)
    return { entries, warnings, errors, rowCounts: { total: 0, parsed: 0, skipped: 0 } }
  }
  if (map.route === undefined) {
    warnings.push('No Section 102 column; all grants default to the capital gains route')
  }

  const usedIds = new Set<string>()
  const explicitIds = new Set(
    rows.slice(1).map((row) => getField(row, map.grantId)).filter((id) => id !== ''),
  )
  const generateId = (): string => {
    let n = entries.length + 1
    while (explicitIds.has(`GRANT-${n}`) || usedIds.has(`GRANT-${n}`)) n++
    return `GRANT-${n}`
  }

  for (let r = 1; r < rows.length; r++) {
    const row = rows[r]
    if (isBlankRow(row)) continue
    total++
    const line = r + 1

    const units = parseUnits(getField(row, map.units))
    if (units === null || units <= 0) {
      warnings.push(`Row ${line}: skipped, number of units must be a positive whole number`)
      skipped++
      continue
    }

    const grantDate = parseGrantDate(getField(row, map.grantDate))
    const vestDate = parseGrantDate(getField(row, map.vestDate))
    if (grantDate === null || vestDate === null) {
      warnings.push(`Row ${line}: skipped, invalid grant or vesting date`)
      skipped++
      continue
    }
    if (vestDate < grantDate) {
      warnings.push(`Row ${line}: skipped, vesting date ${vestDate} is before grant date ${grantDate}`)
      skipped++
      continue
    }

    const ticker = getField(row, map.ticker).toUpperCase()
    if (ticker === '') {
      warnings.push(`Row ${line}: skipped, missing stock code`)
      skipped++
      continue
    }

    const id = getField(row, map.grantId) || generateId()
    if (usedIds.has(id)) {
      warnings.push(`Row ${line}: skipped, duplicate grant id ${id}`)
      skipped++
      continue
    }
    usedIds.add(id)

    entries.push({
      grant: {
        id,
        company: getField(row, map.company),
        ticker,
        grantDate,
        vestDate,
        units,
        route: resolveRoute(getField(row, map.route)),
      },
      quotes: readQuotes(row, map),
    })
  }

  return {
    entries,
    warnings,
    errors,
    rowCounts: { total, parsed: entries.length, skipped },
  }
}

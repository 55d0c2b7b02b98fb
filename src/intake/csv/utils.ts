/**
 * CSV parsing and cell cleaning for grant-record imports.
 *
 * - RFC 4180 CSV parser (no papaparse dependency)
 * - Day-first date, unit count and price parsers
 */

// ── RFC 4180 CSV parser ──────────────────────────────────────

/**
 * Parse a CSV string into rows of string arrays.
 *
 * Handles quoted fields (embedded commas, newlines and "" escapes), CRLF and
 * LF line endings, and a trailing newline without producing an empty row.
 */
export function parseCSV(raw: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let inQuotes = false
  let i = 0

  const endField = () => {
    row.push(field)
    field = ''
  }
  const endRow = () => {
    endField()
    rows.push(row)
    row = []
  }

  while (i < raw.length) {
    const ch = raw[i]

    if (inQuotes) {
      if (ch === '"' && raw[i + 1] === '"') {
        field += '"'
        i += 2
        continue
      }
      if (ch === '"') {
        inQuotes = false
      } else {
        field += ch
      }
      i++
      continue
    }

    if (ch === '"' && field === '') {
      inQuotes = true
    } else if (ch === ',') {
      endField()
    } else if (ch === '\r' && raw[i + 1] === '\n') {
      endRow()
      i++
    } else if (ch === '\n' || ch === '\r') {
      endRow()
    } else {
      field += ch
    }
    i++
  }

  // Last row without a trailing newline (or a lone trailing field)
  if (field !== '' || row.length > 0 || inQuotes) endRow()

  return rows
}

// ── Date parsing ─────────────────────────────────────────────

function isoIfValid(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day))
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return date.toISOString().slice(0, 10)
}

/**
 * Parse a grant/vest date into ISO format (YYYY-MM-DD). Non-ISO dates are
 * read day-first, the way Israeli plan statements write them.
 *
 * - "2024-03-15" → "2024-03-15"
 * - "15/03/2024" → "2024-03-15"
 * - "5.3.2024"   → "2024-03-05"
 * - "31/02/2024" → null (no such day)
 * - ""           → null
 */
export function parseGrantDate(raw: string): string | null {
  const trimmed = raw.trim()
  if (trimmed === '') return null

  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/)
  if (iso) {
    const [, yyyy, mm, dd] = iso
    return isoIfValid(Number(yyyy), Number(mm), Number(dd))
  }

  const dayFirst = trimmed.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/)
  if (dayFirst) {
    const [, dd, mm, yyyy] = dayFirst
    return isoIfValid(Number(yyyy), Number(mm), Number(dd))
  }

  return null
}

// ── Number parsing ───────────────────────────────────────────

/**
 * Parse a unit count. Thousands separators are allowed; fractions are not.
 *
 * - "1,200" → 1200
 * - "12.5"  → null
 * - ""      → null
 */
export function parseUnits(raw: string): number | null {
  const cleaned = raw.trim().replace(/,/g, '')
  if (!/^-?\d+$/.test(cleaned)) return null
  return Number(cleaned)
}

/**
 * Parse a positive decimal (price or FX rate), ignoring currency symbols and
 * thousands separators.
 *
 * - "$26.32"  → 26.32
 * - "3.8"     → 3.8
 * - "0" / "-1" / "N/A" / "" → null
 */
export function parsePositiveNumber(raw: string): number | null {
  const cleaned = raw.trim().replace(/[$₪,\s]/g, '')
  if (cleaned === '' || !/^\d*\.?\d+$/.test(cleaned)) return null
  const value = parseFloat(cleaned)
  return value > 0 ? value : null
}

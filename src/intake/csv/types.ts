/**
 * Grant import types.
 */

import type { GrantEntry } from '../../model/types'

// ── Parse result ─────────────────────────────────────────────

export interface GrantImportResult {
  entries: GrantEntry[]
  warnings: string[]
  errors: string[]
  rowCounts: {
    total: number    // data rows encountered
    parsed: number   // turned into grant entries
    skipped: number  // dropped with a warning
  }
}

/**
 * Manual allocation override.
 *
 * Lets the taxpayer name unit counts per grant instead of using the greedy
 * ranking, e.g. "GRANT-1:50, GRANT-2:30". The directive is validated against
 * the valued grants and then priced with the same netting and tax math as an
 * optimized run.
 */

import type { ClassifiedGrant, OptimizationResult, OptimizerParams } from '../model/types'
import { AllocationOverflowError, InvalidInputError } from '../model/errors'
import { allocationEntrySchema, describeIssues } from '../model/schemas'
import type { TaxBracketEngine } from './taxBrackets'
import { evaluateAllocation, validateOptimizerParams } from './optimizer'

/** Grant id → units to sell, in the order written. */
export type AllocationDirective = ReadonlyMap<string, number>

/**
 * What to do when an entry asks for more units than the grant holds:
 * - 'reject': throw the AllocationOverflowError
 * - 'zero-sell': sell nothing from that grant and report the error
 */
export type OverflowPolicy = 'reject' | 'zero-sell'

export interface ManualAllocationOptions {
  onOverflow?: OverflowPolicy
  /** Grants dropped during valuation; entries naming them are skipped, not rejected. */
  excludedGrantIds?: ReadonlySet<string>
}

export interface ResolvedAllocation {
  unitsByGrant: Map<string, number>
  overflows: AllocationOverflowError[]
  skipped: string[]
}

export interface ManualAllocationOutcome {
  result: OptimizationResult
  overflows: AllocationOverflowError[]
  skipped: string[]
}

// ── Parsing ─────────────────────────────────────────────────────

/**
 * Parse "ID:units" entries separated by commas, semicolons or newlines.
 * Blank segments (e.g. a trailing comma) are ignored.
 *
 *   parseAllocationDirective('GRANT-1:50, GRANT-2:30')
 *     → Map { 'GRANT-1' → 50, 'GRANT-2' → 30 }
 *
 * @throws InvalidInputError for an empty directive, a malformed entry,
 *   a count that is not plain digits (negative, fractional, hex, exponent),
 *   or a grant named twice
 */
export function parseAllocationDirective(text: string): AllocationDirective {
  const directive = new Map<string, number>()
  const segments = text.split(/[,;\n]/).map((s) => s.trim()).filter((s) => s !== '')

  if (segments.length === 0) {
    throw new InvalidInputError('manual allocation', 'contains no entries', text)
  }

  for (const segment of segments) {
    const sep = segment.lastIndexOf(':')
    if (sep <= 0 || sep === segment.length - 1) {
      throw new InvalidInputError('manual allocation', `expected "GRANT-ID:units", got "${segment}"`, segment)
    }

    const entry = allocationEntrySchema.safeParse({
      grantId: segment.slice(0, sep),
      units: segment.slice(sep + 1),
    })
    if (!entry.success) {
      throw new InvalidInputError('manual allocation', `bad entry "${segment}" (${describeIssues(entry.error)})`, segment)
    }

    const { grantId, units } = entry.data
    if (directive.has(grantId)) {
      throw new InvalidInputError('manual allocation', `grant ${grantId} is listed more than once`, grantId)
    }
    directive.set(grantId, units)
  }

  return directive
}

// ── Validation against holdings ─────────────────────────────────

/**
 * Check each entry against the valued grants. Grants the directive does not
 * name sell 0.
 *
 * @throws InvalidInputError for an unknown grant id
 * @throws AllocationOverflowError under the 'reject' policy
 */
export function resolveManualAllocation(
  grants: readonly ClassifiedGrant[],
  directive: AllocationDirective,
  options: ManualAllocationOptions = {},
): ResolvedAllocation {
  const onOverflow = options.onOverflow ?? 'reject'
  const byId = new Map(grants.map((g) => [g.id, g]))
  const unitsByGrant = new Map<string, number>()
  const overflows: AllocationOverflowError[] = []
  const skipped: string[] = []

  for (const [grantId, requested] of directive) {
    const grant = byId.get(grantId)
    if (!grant) {
      if (options.excludedGrantIds?.has(grantId)) {
        skipped.push(grantId)
        continue
      }
      throw new InvalidInputError('manual allocation', `unknown grant ${grantId}`, grantId)
    }

    if (requested > grant.units) {
      const overflow = new AllocationOverflowError(grantId, requested, grant.units)
      if (onOverflow === 'reject') throw overflow
      overflows.push(overflow)
      unitsByGrant.set(grantId, 0)
      continue
    }

    unitsByGrant.set(grantId, requested)
  }

  return { unitsByGrant, overflows, skipped }
}

/**
 * Price a manual directive. Bypasses the greedy ranking; netting and tax
 * work exactly as for an optimized run.
 */
export function applyManualAllocation(
  params: OptimizerParams,
  grants: readonly ClassifiedGrant[],
  directive: AllocationDirective,
  engine: TaxBracketEngine,
  options: ManualAllocationOptions = {},
): ManualAllocationOutcome {
  validateOptimizerParams(params)
  const { unitsByGrant, overflows, skipped } = resolveManualAllocation(grants, directive, options)
  const result = evaluateAllocation(params, grants, unitsByGrant, engine, 'manual')
  return { result, overflows, skipped }
}

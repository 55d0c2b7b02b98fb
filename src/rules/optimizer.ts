/**
 * Sale Optimizer — decide how many units of each grant to sell this year.
 *
 * Ordinary income from the sale must fit in the headroom between current
 * taxable income and the chosen bracket ceiling. Capital gains are taxed
 * flat and do not use headroom, so grants without an ordinary component are
 * always sold in full.
 *
 * Greedy walk over grants ranked by ordinary cost per unit:
 *   1. headroom = max(ceiling − income, 0)
 *   2. ordinary-free grants sell in full
 *   3. cheapest ordinary grants sell whole while they fit; the first one that
 *      does not fit sells as many units as still fit, then the walk stops
 *   4. capital gains and losses net across everything sold
 *   5. tax = incremental ordinary tax + capital-gains tax on the net gain
 *
 * The greedy ranking is a heuristic, not an exact knapsack solution.
 *
 * All amounts in integer agorot.
 */

import type {
  AllocationMode,
  ClassifiedGrant,
  OptimizationResult,
  OptimizerParams,
  SaleAllocation,
} from '../model/types'
import { InvalidInputError } from '../model/errors'
import type { TaxBracketEngine } from './taxBrackets'

export type UnitsByGrant = ReadonlyMap<string, number>

// ── Input checks ────────────────────────────────────────────────

export function validateOptimizerParams(params: OptimizerParams): void {
  const { currentTaxableIncome, bracketCeiling } = params
  if (!Number.isFinite(currentTaxableIncome)) {
    throw new InvalidInputError('current taxable income', 'must be a finite amount', currentTaxableIncome)
  }
  if (currentTaxableIncome < 0) {
    throw new InvalidInputError('current taxable income', 'must not be negative', currentTaxableIncome)
  }
  if (!Number.isFinite(bracketCeiling)) {
    throw new InvalidInputError('bracket ceiling', 'must be a finite amount', bracketCeiling)
  }
}

function assertUniqueIds(grants: readonly ClassifiedGrant[]): void {
  const seen = new Set<string>()
  for (const grant of grants) {
    if (seen.has(grant.id)) {
      throw new InvalidInputError('grant set', `duplicate grant id ${grant.id}`, grant.id)
    }
    seen.add(grant.id)
  }
}

/** Ordinary income room left under the ceiling. A ceiling below income means none. */
export function headroomFor(params: OptimizerParams): number {
  return Math.max(params.bracketCeiling - params.currentTaxableIncome, 0)
}

// ── Ranking ─────────────────────────────────────────────────────

/**
 * Order grants by ordinary cost per unit (ascending), then capital per unit
 * (descending), then original order. Returns a new array.
 */
export function rankGrants(grants: readonly ClassifiedGrant[]): ClassifiedGrant[] {
  return grants
    .map((grant, index) => ({ grant, index }))
    .sort((a, b) =>
      a.grant.ordinaryPerUnit - b.grant.ordinaryPerUnit
      || b.grant.capitalPerUnit - a.grant.capitalPerUnit
      || a.index - b.index,
    )
    .map(({ grant }) => grant)
}

// ── Evaluation ──────────────────────────────────────────────────

/**
 * Price a fixed allocation: net the capital results and compute the tax it
 * adds on top of current income. Grants missing from `unitsByGrant` sell 0.
 */
export function evaluateAllocation(
  params: OptimizerParams,
  grants: readonly ClassifiedGrant[],
  unitsByGrant: UnitsByGrant,
  engine: TaxBracketEngine,
  mode: AllocationMode,
): OptimizationResult {
  validateOptimizerParams(params)
  assertUniqueIds(grants)

  let totalOrdinaryIncomeAdded = 0
  let netCapitalGain = 0
  let grossProceeds = 0

  const allocations: SaleAllocation[] = grants.map((grant) => {
    const unitsSold = unitsByGrant.get(grant.id) ?? 0
    if (!Number.isInteger(unitsSold) || unitsSold < 0 || unitsSold > grant.units) {
      throw new InvalidInputError(
        `units for ${grant.id}`,
        `must be a whole number between 0 and ${grant.units}`,
        unitsSold,
      )
    }

    totalOrdinaryIncomeAdded += unitsSold * grant.ordinaryPerUnit
    netCapitalGain += unitsSold * grant.capitalPerUnit
    grossProceeds += unitsSold * grant.saleValuePerUnit

    return Object.freeze({ grantId: grant.id, unitsSold })
  })

  const ordinaryTax = engine.incrementalOrdinaryTax(params.currentTaxableIncome, totalOrdinaryIncomeAdded)
  const capitalTax = engine.capitalGainsTax(netCapitalGain)
  const totalTax = ordinaryTax + capitalTax

  return Object.freeze({
    mode,
    allocations: Object.freeze(allocations),
    grants: Object.freeze([...grants]),
    currentTaxableIncome: params.currentTaxableIncome,
    bracketCeiling: params.bracketCeiling,
    headroom: headroomFor(params),
    totalOrdinaryIncomeAdded,
    netCapitalGain,
    ordinaryTax,
    capitalTax,
    totalTax,
    grossProceeds,
    netProceeds: grossProceeds - totalTax,
  })
}

// ── Greedy allocation ───────────────────────────────────────────

/**
 * Choose units to sell per grant. An empty grant set yields an empty result
 * with zero totals.
 *
 * @throws InvalidInputError for negative or non-finite income / ceiling
 */
export function optimizeSales(
  params: OptimizerParams,
  grants: readonly ClassifiedGrant[],
  engine: TaxBracketEngine,
): OptimizationResult {
  validateOptimizerParams(params)

  const units = new Map<string, number>()
  for (const grant of grants) {
    units.set(grant.id, grant.ordinaryPerUnit <= 0 ? grant.units : 0)
  }

  let remaining = headroomFor(params)
  for (const grant of rankGrants(grants)) {
    if (grant.ordinaryPerUnit <= 0) continue

    const fullCost = grant.units * grant.ordinaryPerUnit
    if (fullCost <= remaining) {
      units.set(grant.id, grant.units)
      remaining -= fullCost
      continue
    }

    const partial = Math.floor(remaining / grant.ordinaryPerUnit)
    units.set(grant.id, partial)
    remaining -= partial * grant.ordinaryPerUnit
    break
  }

  return evaluateAllocation(params, grants, units, engine, 'optimized')
}

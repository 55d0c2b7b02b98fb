/**
 * Sale planning pipeline.
 *
 * One run, start to finish:
 *   tax year → bracket engine → input checks → valuation (exclusions)
 *   → greedy optimizer or manual override → summary
 *
 * Configuration and input problems abort the run before any computation.
 * Pricing problems only drop the affected grant.
 */

import type {
  GrantEntry,
  OptimizationResult,
  OptimizerParams,
  PricingExclusion,
  SaleSummary,
  TaxBracket,
} from '../model/types'
import type { AllocationOverflowError } from '../model/errors'
import { InvalidInputError } from '../model/errors'
import { isoDateSchema } from '../model/schemas'
import type { Logger } from '../utils/logger'
import { logger as defaultLogger } from '../utils/logger'
import { getYearModule } from './yearModules'
import { createTaxBracketEngine } from './taxBrackets'
import { assembleGrants } from './valuation'
import { headroomFor, optimizeSales, validateOptimizerParams } from './optimizer'
import type { AllocationDirective, OverflowPolicy } from './manualAllocation'
import { applyManualAllocation, parseAllocationDirective } from './manualAllocation'
import { summarizeResult } from './summary'

export const DEFAULT_TAX_YEAR = 2025

// ── Types ────────────────────────────────────────────────────────

export interface PlanRequest {
  entries: readonly GrantEntry[]
  /** Agorot. */
  currentTaxableIncome: number
  /** Agorot. */
  bracketCeiling: number
  taxYear?: number
  /** Overrides the tax year's schedule. */
  brackets?: readonly TaxBracket[]
  /** Overrides the tax year's capital-gains rate. */
  capitalGainsRate?: number
  /** ISO date of the intended sale; defaults to today. */
  saleDate?: string
  /** Directive text ("GRANT-1:50, GRANT-2:30") or a parsed directive. */
  manualAllocation?: string | AllocationDirective
  onOverflow?: OverflowPolicy
}

export interface PlanOutcome {
  taxYear: number
  saleDate: string
  result: OptimizationResult
  summary: SaleSummary
  /** Marginal ordinary rate once the sale's ordinary income is added. */
  marginalRate: number
  exclusions: PricingExclusion[]
  overflows: AllocationOverflowError[]
  /** Override entries naming grants that were excluded during valuation. */
  skippedOverrides: string[]
}

export interface PlanDependencies {
  logger?: Logger
  today?: () => string
}

function isoToday(): string {
  return new Date().toISOString().slice(0, 10)
}

function resolveDirective(input: string | AllocationDirective | undefined): AllocationDirective | null {
  if (input === undefined) return null
  if (typeof input === 'string') {
    return input.trim() === '' ? null : parseAllocationDirective(input)
  }
  return input
}

// ── Pipeline ─────────────────────────────────────────────────────

export function planSales(request: PlanRequest, deps: PlanDependencies = {}): PlanOutcome {
  const log = deps.logger ?? defaultLogger
  const taxYear = request.taxYear ?? DEFAULT_TAX_YEAR

  const yearModule = getYearModule(taxYear)
  const engine = createTaxBracketEngine(
    request.brackets ?? yearModule.incomeTaxBrackets,
    request.capitalGainsRate ?? yearModule.capitalGainsRate,
  )

  const params: OptimizerParams = {
    currentTaxableIncome: request.currentTaxableIncome,
    bracketCeiling: request.bracketCeiling,
  }
  validateOptimizerParams(params)

  const saleDate = request.saleDate ?? (deps.today ?? isoToday)()
  if (!isoDateSchema.safeParse(saleDate).success) {
    throw new InvalidInputError('sale date', 'must be an ISO date (YYYY-MM-DD)', saleDate)
  }

  const directive = resolveDirective(request.manualAllocation)

  const runLog = log.child({ taxYear, saleDate, mode: directive ? 'manual' : 'optimized' })
  runLog.info('Planning sale', {
    grants: request.entries.length,
    currentTaxableIncome: params.currentTaxableIncome,
    bracketCeiling: params.bracketCeiling,
  })

  const { grants, exclusions } = assembleGrants(request.entries, saleDate, {
    holdingMonths: yearModule.trusteeHoldingMonths,
  })
  for (const exclusion of exclusions) {
    runLog.warn('Grant excluded from plan', { grantId: exclusion.grantId, reason: exclusion.reason })
  }
  if (runLog.isEnabled('debug')) {
    for (const grant of grants) {
      runLog.debug('Grant valued', {
        grantId: grant.id,
        route: grant.route,
        compliance: grant.compliance,
        ordinaryPerUnit: grant.ordinaryPerUnit,
        capitalPerUnit: grant.capitalPerUnit,
      })
    }
  }
  if (grants.length > 0 && headroomFor(params) === 0) {
    runLog.warn('Income is already at or above the bracket ceiling; no ordinary income can be added', {
      currentTaxableIncome: params.currentTaxableIncome,
      bracketCeiling: params.bracketCeiling,
    })
  }

  let result: OptimizationResult
  let overflows: AllocationOverflowError[] = []
  let skippedOverrides: string[] = []

  if (directive) {
    const outcome = applyManualAllocation(params, grants, directive, engine, {
      onOverflow: request.onOverflow,
      excludedGrantIds: new Set(exclusions.map((e) => e.grantId)),
    })
    result = outcome.result
    overflows = outcome.overflows
    skippedOverrides = outcome.skipped
    for (const overflow of overflows) {
      runLog.warn('Override exceeds holdings, selling 0', {
        grantId: overflow.grantId,
        requested: overflow.requested,
        available: overflow.available,
      })
    }
    for (const grantId of skippedOverrides) {
      runLog.warn('Override names an excluded grant', { grantId })
    }
  } else {
    result = optimizeSales(params, grants, engine)
  }

  const summary = summarizeResult(result)
  const marginalRate = engine.marginalRate(params.currentTaxableIncome + result.totalOrdinaryIncomeAdded)

  runLog.info('Plan complete', {
    unitsSold: summary.total.unitsSold,
    ordinaryIncomeAdded: result.totalOrdinaryIncomeAdded,
    netCapitalGain: result.netCapitalGain,
    totalTax: result.totalTax,
    excluded: exclusions.length,
  })

  return {
    taxYear,
    saleDate,
    result,
    summary,
    marginalRate,
    exclusions,
    overflows,
    skippedOverrides,
  }
}

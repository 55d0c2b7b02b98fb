/**
 * Public surface of the sale planner.
 */

export type * from './model/types'
export * from './model/errors'
export { agorot, shekels, roundHalfEven } from './model/amounts'

export {
  createTaxBracketEngine,
  validateBracketSchedule,
  computeBracketTax,
  computeCapitalGainsTax,
  DEFAULT_CAPITAL_GAINS_RATE,
} from './rules/taxBrackets'
export type { TaxBracketEngine } from './rules/taxBrackets'

export {
  addMonths,
  classifyAppreciation,
  isTrusteeCompliant,
  resolveRoute,
  trusteeReleaseDate,
} from './rules/holdingRule'
export type { Classification, ClassificationInput, HoldingPosition } from './rules/holdingRule'

export { assembleGrant, assembleGrants, convertQuote } from './rules/valuation'
export type { AssemblyResult, ValuationOptions } from './rules/valuation'

export { optimizeSales, evaluateAllocation, rankGrants, headroomFor } from './rules/optimizer'

export {
  parseAllocationDirective,
  resolveManualAllocation,
  applyManualAllocation,
} from './rules/manualAllocation'
export type { AllocationDirective, OverflowPolicy, ManualAllocationOptions } from './rules/manualAllocation'

export { summarizeResult } from './rules/summary'
export { planSales, DEFAULT_TAX_YEAR } from './rules/engine'
export type { PlanRequest, PlanOutcome } from './rules/engine'
export { getYearModule, getSupportedTaxYears } from './rules/yearModules'
export type { YearRulesModule } from './rules/yearModules'

export { parseGrantsCsv } from './intake/csv/grants'
export type { GrantImportResult } from './intake/csv/types'
export { renderPlanMarkdown, formatAgorot } from './report/format'

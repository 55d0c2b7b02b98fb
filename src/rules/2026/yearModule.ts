/**
 * 2026 Year Rules Module
 *
 * Delta-override pattern: only the constants live here. The bracket engine,
 * classifier and optimizer are year-agnostic and take these values as
 * arguments, so nothing else needs a 2026 copy.
 */

import type { YearRulesModule } from '../yearModules'
import {
  TAX_YEAR,
  INCOME_TAX_BRACKETS,
  CAPITAL_GAINS_RATE,
  TRUSTEE_HOLDING_MONTHS,
} from './constants'

export const yearModule2026: YearRulesModule = {
  taxYear: TAX_YEAR,
  incomeTaxBrackets: INCOME_TAX_BRACKETS,
  capitalGainsRate: CAPITAL_GAINS_RATE,
  trusteeHoldingMonths: TRUSTEE_HOLDING_MONTHS,
}

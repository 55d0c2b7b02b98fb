/**
 * 2025 Year Rules Module
 */

import type { YearRulesModule } from '../yearModules'
import {
  TAX_YEAR,
  INCOME_TAX_BRACKETS,
  CAPITAL_GAINS_RATE,
  TRUSTEE_HOLDING_MONTHS,
} from './constants'

export const yearModule2025: YearRulesModule = {
  taxYear: TAX_YEAR,
  incomeTaxBrackets: INCOME_TAX_BRACKETS,
  capitalGainsRate: CAPITAL_GAINS_RATE,
  trusteeHoldingMonths: TRUSTEE_HOLDING_MONTHS,
}

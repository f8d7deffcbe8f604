/**
 * 2025 Year Rules Module
 *
 * Bundles the 2025 reference tables into a single YearRulesModule
 * for the year registry.
 */

import type { YearRulesModule } from '../yearModules'
import {
  ADDITIONAL_STANDARD_DEDUCTION_65,
  ESTATE_TAX_EXEMPTION,
  ESTATE_TAX_RATE,
  INCOME_TAX_BRACKETS,
  MEDICARE,
  STANDARD_DEDUCTION,
  TAX_YEAR,
} from './constants'

export const yearModule2025: YearRulesModule = {
  taxYear: TAX_YEAR,
  incomeTaxBrackets: INCOME_TAX_BRACKETS,
  standardDeduction: STANDARD_DEDUCTION,
  additionalStandardDeduction65: ADDITIONAL_STANDARD_DEDUCTION_65,
  medicare: MEDICARE,
  estateTax: { exemption: ESTATE_TAX_EXEMPTION, rate: ESTATE_TAX_RATE },
}

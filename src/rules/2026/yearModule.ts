/**
 * 2026 Year Rules Module
 *
 * Delta-override pattern: starts from the 2025 module and replaces only
 * the tables that changed. The estate-tax rate carries over unchanged.
 */

import type { YearRulesModule } from '../yearModules'
import { yearModule2025 } from '../2025/yearModule'
import {
  ADDITIONAL_STANDARD_DEDUCTION_65,
  ESTATE_TAX_EXEMPTION,
  INCOME_TAX_BRACKETS,
  MEDICARE,
  STANDARD_DEDUCTION,
  TAX_YEAR,
} from './constants'

export const yearModule2026: YearRulesModule = {
  ...yearModule2025,
  taxYear: TAX_YEAR,
  incomeTaxBrackets: INCOME_TAX_BRACKETS,
  standardDeduction: STANDARD_DEDUCTION,
  additionalStandardDeduction65: ADDITIONAL_STANDARD_DEDUCTION_65,
  medicare: MEDICARE,
  estateTax: { ...yearModule2025.estateTax, exemption: ESTATE_TAX_EXEMPTION },
}

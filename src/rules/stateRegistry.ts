/**
 * State Module Registry — Maps state codes to their StateRulesModule implementations
 */

import type { StateRuleTable } from '../data/referenceData'
import type { StateRulesModule } from './stateEngine'
import { ConfigurationError } from '../model/errors'
import { createStateModule } from './stateEngine'

export interface StateRegistry {
  taxYear: number
  getStateModule: (code: string) => StateRulesModule
  getSupportedStates: () => { code: string; stateName: string }[]
}

export function createStateRegistry(table: StateRuleTable): StateRegistry {
  const modules: Map<string, StateRulesModule> = new Map(
    Object.entries(table.states).map(([code, rule]) => [code, createStateModule(code, rule)]),
  )

  return {
    taxYear: table.taxYear,

    getStateModule(code) {
      const mod = modules.get(code.toUpperCase())
      if (!mod) {
        throw new ConfigurationError(`No state rules registered for "${code}"`)
      }
      return mod
    },

    getSupportedStates() {
      return [...modules.entries()]
        .map(([code, mod]) => ({ code, stateName: mod.stateName }))
        .sort((a, b) => a.code.localeCompare(b.code))
    },
  }
}

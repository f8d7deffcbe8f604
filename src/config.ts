/**
 * Engine configuration from environment variables.
 *
 *   LOG_LEVEL                    debug | info | warn | error | silent (default: info)
 *   CONVERSION_PLANNER_DATA_DIR  directory of replacement JSON reference tables
 */

import { z } from 'zod'
import type { ReferenceData } from './data/referenceData'
import { loadReferenceData } from './data/referenceData'
import { ConfigurationError } from './model/errors'
import { Logger, LOG_LEVELS } from './utils/logger'
import type { LogLevel } from './utils/logger'
import type { RunOptions } from './projection/driver'

const logLevelSchema = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent']))

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.optional(),
  CONVERSION_PLANNER_DATA_DIR: z.string().trim().min(1).optional(),
})

export interface EngineConfig {
  logLevel: LogLevel
  dataDir?: string
}

export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    CONVERSION_PLANNER_DATA_DIR: env.CONVERSION_PLANNER_DATA_DIR || undefined,
  })
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid environment (LOG_LEVEL is one of ${LOG_LEVELS.join(', ')}): ${detail}`)
  }
  return {
    logLevel: parsed.data.LOG_LEVEL ?? 'info',
    dataDir: parsed.data.CONVERSION_PLANNER_DATA_DIR,
  }
}

/** Logger and reference data for a configuration, ready to pass to runProjection. */
export function createRunOptions(config: EngineConfig): RunOptions & { logger: Logger; referenceData: ReferenceData } {
  return {
    logger: new Logger(config.logLevel),
    referenceData: loadReferenceData({ dataDir: config.dataDir }),
  }
}

/**
 * Configuration
 *
 * Environment settings are validated once, on first use. The active logger
 * can be replaced at run time with `configure`.
 */

import { z } from 'zod'
import { InvalidConfigError } from './errors'
import { makeLogger, type Logger } from './logger'

// ============================================================================
// Environment Schema
// ============================================================================

const EnvSchema = z.object({
  REGIONAL_TIME_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
  REGIONAL_TIME_DEFAULT_CALENDAR: z.string().min(1).default('gregory'),
})

export type TimeConfig = {
  logLevel: z.infer<typeof EnvSchema>['REGIONAL_TIME_LOG_LEVEL']
  /** Calendar used when the host reports none for the current region */
  defaultCalendar: string
}

export function loadConfig(env: Record<string, string | undefined>): TimeConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new InvalidConfigError(`Invalid regional-time environment: ${detail}`)
  }
  return {
    logLevel: parsed.data.REGIONAL_TIME_LOG_LEVEL,
    defaultCalendar: parsed.data.REGIONAL_TIME_DEFAULT_CALENDAR,
  }
}

// ============================================================================
// Process-wide State
// ============================================================================

let config: TimeConfig | undefined
let logger: Logger | undefined

export function getConfig(): TimeConfig {
  if (!config) config = loadConfig(process.env)
  return config
}

export function getLogger(): Logger {
  if (!logger) logger = makeLogger(getConfig().logLevel)
  return logger
}

export type ConfigureOptions = {
  logger?: Logger
  defaultCalendar?: string
}

export function configure(options: ConfigureOptions): void {
  if (options.logger) logger = options.logger
  if (options.defaultCalendar !== undefined) {
    if (options.defaultCalendar.length === 0) {
      throw new InvalidConfigError('defaultCalendar must not be empty')
    }
    config = { ...getConfig(), defaultCalendar: options.defaultCalendar }
  }
}

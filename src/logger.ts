/**
 * Pino logger factory.
 *
 * The package logs at debug level around strict-construction failures,
 * forced region copies, clock creation and era-boundary searches.
 * Output is silenced under Vitest or NODE_ENV=test.
 */

import pino from 'pino'
import type { Logger, LevelWithSilent } from 'pino'

export type { Logger } from 'pino'

export function makeLogger(level: LevelWithSilent, bindings?: Record<string, unknown>): Logger {
  const isTestTooling = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test'

  return pino({
    level,
    enabled: !isTestTooling,
    base: { ...bindings, module: 'regional-time' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

/** For tests: keeps the Logger type, emits nothing */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false })
}

/**
 * Shared regions and helpers for the test suites.
 */

import type { TimeError } from '../../src/errors'
import { type Instant, instantFromEpochNanoseconds, instantFromTemporal } from '../../src/instant'
import { createRegion, POSIX_REGION } from '../../src/region'
import type { Result } from '../../src/result'
import { Temporal } from '@js-temporal/polyfill'

export const utc = POSIX_REGION

export const paris = createRegion({ calendar: 'gregory', timeZone: 'Europe/Paris', locale: 'en-US' })

export const newYork = createRegion({ calendar: 'gregory', timeZone: 'America/New_York', locale: 'en-US' })

export const tokyo = createRegion({ calendar: 'japanese', timeZone: 'Asia/Tokyo', locale: 'ja-JP' })

/** Falls back by half an hour, from +11:00 to +10:30 */
export const lordHowe = createRegion({ calendar: 'gregory', timeZone: 'Australia/Lord_Howe', locale: 'en-US' })

export function utcIn(calendar: string) {
  return createRegion({ calendar, timeZone: 'UTC', locale: 'en' })
}

/** Unwraps an Ok result, failing the test on Err */
export function must<T>(result: Result<T, TimeError>): T {
  if (!result.ok) throw result.error
  return result.value
}

export function at(iso: string): Instant {
  return instantFromTemporal(Temporal.Instant.from(iso))
}

export function atMillis(ms: bigint): Instant {
  return instantFromEpochNanoseconds(ms * 1_000_000n)
}

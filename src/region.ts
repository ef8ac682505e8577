/**
 * Region
 *
 * An immutable bundle of calendar, time zone and locale, plus the calendar
 * engine bound to them. Two regions are equal when all three identifiers
 * match, regardless of which engine instance they hold.
 *
 * A region's engine is not safe to share with concurrently scheduled work.
 * Hand such work `snapshotRegion(region, { forced: true })` instead.
 */

import { Temporal } from '@js-temporal/polyfill'
import { getConfig, getLogger } from './config'
import { InvalidRegionError } from './errors'
import { createCalendarEngine, type CalendarEngine } from './internal/calendar-engine'

export type RegionIdentifiers = {
  /** Temporal/CLDR calendar identifier, e.g. 'gregory', 'japanese' */
  calendar: string
  /** IANA time zone, e.g. 'Europe/Paris' */
  timeZone: string
  /** BCP 47 locale tag */
  locale: string
}

export type Region = Readonly<RegionIdentifiers> & {
  /** True only for the live region that follows system settings */
  readonly isAutoupdating: boolean
  readonly engine: CalendarEngine
}

// ============================================================================
// Construction
// ============================================================================

function buildRegion(ids: RegionIdentifiers): Region {
  return Object.freeze({
    calendar: ids.calendar,
    timeZone: ids.timeZone,
    locale: ids.locale,
    isAutoupdating: false,
    engine: createCalendarEngine({ calendar: ids.calendar, timeZone: ids.timeZone }),
  })
}

function validate(ids: RegionIdentifiers): void {
  try {
    Intl.getCanonicalLocales(ids.locale)
  } catch (e) {
    if (e instanceof RangeError) throw new InvalidRegionError(`Invalid locale: ${ids.locale}`)
    throw e
  }

  let sample: Temporal.ZonedDateTime
  try {
    sample = Temporal.Now.zonedDateTimeISO(ids.timeZone)
  } catch (e) {
    if (e instanceof RangeError) throw new InvalidRegionError(`Invalid time zone: ${ids.timeZone}`)
    throw e
  }

  try {
    sample.withCalendar(ids.calendar)
  } catch (e) {
    if (e instanceof RangeError) throw new InvalidRegionError(`Invalid calendar: ${ids.calendar}`)
    throw e
  }
}

export function createRegion(ids: RegionIdentifiers): Region {
  validate(ids)
  return buildRegion(ids)
}

/** Gregorian calendar, UTC, POSIX locale */
export const POSIX_REGION: Region = buildRegion({
  calendar: 'gregory',
  timeZone: 'UTC',
  locale: 'en-US-u-va-posix',
})

// ============================================================================
// Live System Region
// ============================================================================

function systemIdentifiers(): RegionIdentifiers {
  const resolved = new Intl.DateTimeFormat().resolvedOptions()
  return {
    calendar: resolved.calendar || getConfig().defaultCalendar,
    timeZone: resolved.timeZone || 'UTC',
    locale: resolved.locale,
  }
}

let liveEngine: { key: string; engine: CalendarEngine } | undefined

function systemEngine(): CalendarEngine {
  const ids = systemIdentifiers()
  const key = regionKey(ids)
  if (!liveEngine || liveEngine.key !== key) {
    liveEngine = { key, engine: createCalendarEngine({ calendar: ids.calendar, timeZone: ids.timeZone }) }
  }
  return liveEngine.engine
}

/**
 * Follows the process's calendar, time zone and locale as they change.
 * Values built from it are pinned to a snapshot at construction time.
 */
export const autoupdatingCurrentRegion: Region = Object.freeze({
  get calendar() {
    return systemIdentifiers().calendar
  },
  get timeZone() {
    return systemIdentifiers().timeZone
  },
  get locale() {
    return systemIdentifiers().locale
  },
  isAutoupdating: true,
  get engine() {
    return systemEngine()
  },
})

/** A fixed snapshot of the current system settings */
export function currentRegion(): Region {
  return snapshotRegion(autoupdatingCurrentRegion)
}

// ============================================================================
// Snapshots
// ============================================================================

export type SnapshotOptions = {
  /** Always build a fresh engine, even for an already-fixed region */
  forced?: boolean
}

export function snapshotRegion(region: Region, options: SnapshotOptions = {}): Region {
  const forced = options.forced ?? false
  if (!forced && !region.isAutoupdating) return region

  const ids = regionIdentifiers(region)
  if (forced) getLogger().debug({ region: regionKey(ids) }, 'forced region copy')
  return buildRegion(ids)
}

// ============================================================================
// Identity
// ============================================================================

export function regionIdentifiers(region: Region): RegionIdentifiers {
  return { calendar: region.calendar, timeZone: region.timeZone, locale: region.locale }
}

export function regionKey(ids: RegionIdentifiers): string {
  return `${ids.calendar}|${ids.timeZone}|${ids.locale}`
}

export function regionEquals(a: Region, b: Region): boolean {
  if (a === b) return true
  return a.calendar === b.calendar && a.timeZone === b.timeZone && a.locale === b.locale
}

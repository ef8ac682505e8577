/**
 * Calendar Engine
 *
 * The host calendar engine, bound to one calendar and one time zone.
 * Every calendrical rule (month lengths, leap years, era boundaries, DST)
 * comes from Temporal; nothing here re-derives them.
 *
 * An engine memoizes era boundaries and Intl formatters, so lookups mutate
 * it. Concurrent work must use its own engine, obtained through a forced
 * region snapshot.
 */

import { Temporal } from '@js-temporal/polyfill'
import { precondition } from '../assertions'
import { getLogger } from '../config'
import { ComponentMismatchError } from '../errors'
import { Ok, Err, type Result } from '../result'
import type { AddableUnit, CalendarComponents, SteppableUnit, Unit } from '../unit'

export type ExactMatch = {
  epochNs: bigint
  components: CalendarComponents
}

export interface CalendarEngine {
  readonly calendar: string
  readonly timeZone: string
  components(epochNs: bigint): CalendarComponents
  startOf(epochNs: bigint, unit: Unit): bigint
  exactMatch(partial: Partial<CalendarComponents>, fields: readonly Unit[]): Result<ExactMatch, ComponentMismatchError>
  adding(epochNs: bigint, amount: number, unit: AddableUnit): bigint
  successor(epochNs: bigint, unit: SteppableUnit): bigint
  predecessor(epochNs: bigint, unit: SteppableUnit): bigint
  formatter(locale: string, options: Intl.DateTimeFormatOptions): Intl.DateTimeFormat
}

type CalendarEngineDeps = {
  calendar: string
  timeZone: string
}

// ============================================================================
// Constants
// ============================================================================

/** Earliest instant Temporal can represent, -8.64e21 ns */
export const EARLIEST_EPOCH_NS = -8_640_000_000_000_000_000_000n

// ============================================================================
// Helpers
// ============================================================================

function durationFor(amount: number, unit: AddableUnit): Temporal.DurationLike {
  switch (unit) {
    case 'year': return { years: amount }
    case 'month': return { months: amount }
    case 'day': return { days: amount }
    case 'hour': return { hours: amount }
    case 'minute': return { minutes: amount }
    case 'second': return { seconds: amount }
    case 'nanosecond': return { nanoseconds: amount }
  }
}

function subSecondFields(nanosecond: number): { millisecond: number; microsecond: number; nanosecond: number } {
  return {
    millisecond: Math.floor(nanosecond / 1_000_000),
    microsecond: Math.floor(nanosecond / 1_000) % 1_000,
    nanosecond: nanosecond % 1_000,
  }
}

function isRangeError(e: unknown): e is RangeError {
  return e instanceof RangeError
}

// ============================================================================
// Engine
// ============================================================================

export function createCalendarEngine(deps: CalendarEngineDeps): CalendarEngine {
  const { calendar, timeZone } = deps

  const eraStarts = new Map<string, bigint>()
  const formatters = new Map<string, Intl.DateTimeFormat>()

  function zoned(epochNs: bigint): Temporal.ZonedDateTime {
    return Temporal.Instant.fromEpochNanoseconds(epochNs).toZonedDateTimeISO(timeZone).withCalendar(calendar)
  }

  function componentsOf(zdt: Temporal.ZonedDateTime): CalendarComponents {
    return {
      era: zdt.era,
      year: zdt.eraYear ?? zdt.year,
      month: zdt.month,
      day: zdt.day,
      hour: zdt.hour,
      minute: zdt.minute,
      second: zdt.second,
      nanosecond: zdt.millisecond * 1_000_000 + zdt.microsecond * 1_000 + zdt.nanosecond,
    }
  }

  // ========== Era Boundaries ==========

  function subtractDays(date: Temporal.PlainDate, days: number): Temporal.PlainDate | undefined {
    try {
      return date.subtract({ days })
    } catch (e) {
      if (isRangeError(e)) return undefined
      throw e
    }
  }

  /**
   * Era membership is contiguous, so gallop backwards until leaving the era,
   * then bisect. Eras that reach the start of representable time (BCE,
   * calendars without eras) start at EARLIEST_EPOCH_NS.
   */
  function eraStart(zdt: Temporal.ZonedDateTime): bigint {
    const era = zdt.era
    if (era === undefined) return EARLIEST_EPOCH_NS

    const cached = eraStarts.get(era)
    if (cached !== undefined) return cached

    getLogger().debug({ calendar, timeZone, era }, 'searching era boundary')

    let inside = zdt.toPlainDate()
    let outside: Temporal.PlainDate | undefined
    let step = 1
    while (outside === undefined) {
      const candidate = subtractDays(inside, step)
      if (candidate === undefined) {
        eraStarts.set(era, EARLIEST_EPOCH_NS)
        return EARLIEST_EPOCH_NS
      }
      if (candidate.era === era) {
        inside = candidate
        step *= 2
      } else {
        outside = candidate
      }
    }

    let gap = outside.until(inside, { largestUnit: 'day' }).days
    while (gap > 1) {
      const mid: Temporal.PlainDate = outside.add({ days: Math.floor(gap / 2) })
      if (mid.era === era) inside = mid
      else outside = mid
      gap = outside.until(inside, { largestUnit: 'day' }).days
    }

    const start = inside.toZonedDateTime(timeZone).startOfDay().epochNanoseconds
    eraStarts.set(era, start)
    return start
  }

  // ========== Period Starts ==========

  function startOfZoned(zdt: Temporal.ZonedDateTime, unit: Unit): bigint {
    switch (unit) {
      case 'nanosecond':
        return zdt.epochNanoseconds
      case 'second':
      case 'minute':
      case 'hour':
        return clampToOffsetPeriod(zdt, zdt.round({ smallestUnit: unit, roundingMode: 'floor' }))
      case 'day':
        return zdt.startOfDay().epochNanoseconds
      // counted back in days, so era fields never have to name a date outside their era
      case 'month':
        return clampToEra(zdt, zdt.subtract({ days: zdt.day - 1 }).startOfDay())
      // built from the arithmetic year, which needs no era; dayOfYear is unreliable outside ISO
      case 'year':
        return clampToEra(zdt, firstDayOfYear(zdt))
      case 'era':
        return eraStart(zdt)
    }
  }

  function firstDayOfYear(zdt: Temporal.ZonedDateTime): Temporal.ZonedDateTime {
    return Temporal.PlainDate.from({ calendar, year: zdt.year, month: 1, day: 1 })
      .toZonedDateTime({ timeZone })
      .startOfDay()
  }

  /** Latest offset transition at or before epochNs, if the zone has one */
  function transitionAtOrBefore(epochNs: bigint): bigint | undefined {
    const after = Temporal.Instant.fromEpochNanoseconds(epochNs + 1n)
    return Temporal.TimeZone.from(timeZone).getPreviousTransition(after)?.epochNanoseconds
  }

  /**
   * A floored wall time can resolve under the offset in force before a
   * transition, which on a fall-back shorter than the unit lands before
   * the previous period's start. Such a period starts at the transition.
   */
  function clampToOffsetPeriod(zdt: Temporal.ZonedDateTime, floored: Temporal.ZonedDateTime): bigint {
    if (floored.offsetNanoseconds === zdt.offsetNanoseconds) return floored.epochNanoseconds
    const transition = transitionAtOrBefore(zdt.epochNanoseconds)
    if (transition === undefined || transition < floored.epochNanoseconds) return floored.epochNanoseconds
    return transition
  }

  /** A month or year that straddles an era change starts at the era boundary */
  function clampToEra(zdt: Temporal.ZonedDateTime, start: Temporal.ZonedDateTime): bigint {
    return start.era === zdt.era ? start.epochNanoseconds : eraStart(zdt)
  }

  function startOf(epochNs: bigint, unit: Unit): bigint {
    return startOfZoned(zoned(epochNs), unit)
  }

  // ========== Arithmetic ==========

  function adding(epochNs: bigint, amount: number, unit: AddableUnit): bigint {
    precondition(Number.isInteger(amount), `Can only add whole ${unit} units, got ${amount}`)
    // months and years clamp to the last valid day, as Temporal's 'constrain' overflow does
    return zoned(epochNs).add(durationFor(amount, unit)).epochNanoseconds
  }

  function successor(epochNs: bigint, unit: SteppableUnit): bigint {
    const start = startOf(epochNs, unit)
    let next = startOf(adding(start, 1, unit), unit)
    if (next <= start) {
      const transition = Temporal.TimeZone.from(timeZone).getNextTransition(
        Temporal.Instant.fromEpochNanoseconds(start)
      )
      next = transition === null ? start + 1n : transition.epochNanoseconds
    }
    const lastInside = zoned(next - 1n)
    if (lastInside.era !== zoned(start).era) return eraStart(lastInside)
    return next
  }

  function predecessor(epochNs: bigint, unit: SteppableUnit): bigint {
    return startOf(startOf(epochNs, unit) - 1n, unit)
  }

  // ========== Strict Matching ==========

  function exactMatch(
    partial: Partial<CalendarComponents>,
    fields: readonly Unit[]
  ): Result<ExactMatch, ComponentMismatchError> {
    const hasEra = partial.era !== undefined
    const eraOnly = fields.length === 1 && fields[0] === 'era'
    const sub = subSecondFields(partial.nanosecond ?? 0)

    let zdt: Temporal.ZonedDateTime
    try {
      zdt = Temporal.ZonedDateTime.from(
        {
          timeZone,
          calendar,
          ...(hasEra ? { era: partial.era, eraYear: partial.year ?? 1 } : { year: partial.year ?? 1 }),
          // an era on its own resolves to the last day of its first year, which always lies inside it
          month: partial.month ?? (eraOnly ? 13 : 1),
          day: partial.day ?? (eraOnly ? 31 : 1),
          hour: partial.hour ?? 0,
          minute: partial.minute ?? 0,
          second: partial.second ?? 0,
          ...sub,
        },
        { overflow: 'constrain', disambiguation: 'compatible' }
      )
    } catch (e) {
      if (!isRangeError(e)) throw e
      const unresolved = fields.filter((field) => partial[field] !== undefined)
      return Err(new ComponentMismatchError(partial, {}, unresolved))
    }

    const components = componentsOf(zdt)
    // without an era, a supplied year is the calendar's arithmetic year
    const resolved: CalendarComponents = hasEra ? components : { ...components, year: zdt.year }
    const mismatched = fields.filter((field) => partial[field] !== undefined && partial[field] !== resolved[field])

    if (mismatched.length > 0) return Err(new ComponentMismatchError(partial, resolved, mismatched))
    return Ok({ epochNs: zdt.epochNanoseconds, components })
  }

  // ========== Formatting ==========

  function formatter(locale: string, options: Intl.DateTimeFormatOptions): Intl.DateTimeFormat {
    const key = `${locale}|${JSON.stringify(options)}`
    let cached = formatters.get(key)
    if (!cached) {
      cached = new Intl.DateTimeFormat(locale, { ...options, timeZone, calendar })
      formatters.set(key, cached)
    }
    return cached
  }

  return {
    calendar,
    timeZone,
    components: (epochNs) => componentsOf(zoned(epochNs)),
    startOf,
    exactMatch,
    adding,
    successor,
    predecessor,
    formatter,
  }
}

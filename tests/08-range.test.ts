/**
 * Segment 08: Range Tests
 *
 * Value ranges, stepping, and the instant intervals periods cover,
 * including days that daylight-saving changes shorten or lengthen.
 */

import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import {
  successor,
  predecessor,
  halfOpenRange,
  closedRange,
  isEmptyRange,
  rangeContains,
  rangeValues,
  rangeCount,
  unitsWithin,
  instantRange,
  instantRangeOf,
  lastInstant,
  instantRangeContains,
  instantRangeDuration,
  isEmptyInstantRange,
  instantRangeIntersection,
  fixedRangeIntersection,
  containsInstant,
} from '../src/range'
import { firstOf, fixedFromComponents, fixedFromInstant } from '../src/fixed'
import { durationEquals, seconds } from '../src/duration'
import { PreconditionFailure } from '../src/errors'
import { compareInstants, describeInstant, epochNanoseconds } from '../src/instant'
import { at, atMillis, lordHowe, must, newYork, paris, utc, utcIn } from './helpers/fixtures'

function utcDay(year: number, month: number, day: number) {
  return must(fixedFromComponents(utc, { year, month, day }, 'day'))
}

// ============================================================================
// 1. STEPPING
// ============================================================================

describe('successor and predecessor', () => {
  it('steps across a year boundary', () => {
    const next = successor(utcDay(2023, 12, 31))
    expect([next.components.year, next.components.month, next.components.day]).toEqual([2024, 1, 1])
  })

  it('steps back into a leap day', () => {
    const previous = predecessor(utcDay(2024, 3, 1))
    expect([previous.components.month, previous.components.day]).toEqual([2, 29])
  })

  it('steps months of different lengths', () => {
    const january = must(fixedFromComponents(utc, { year: 2024, month: 1 }, 'month'))
    expect(describeInstant(successor(january).instant)).toBe('2024-02-01T00:00:00Z')
    expect(describeInstant(successor(successor(january)).instant)).toBe('2024-03-01T00:00:00Z')
  })

  it('undoes each other', () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 4_000_000_000_000n }), (ms) => {
        const hour = fixedFromInstant(newYork, atMillis(ms), 'hour')
        expect(epochNanoseconds(predecessor(successor(hour)).instant)).toBe(epochNanoseconds(hour.instant))
      })
    )
  })
})

describe('Stepping through a half-hour fall-back', () => {
  // 2024-04-07 02:00 +11:00 becomes 01:30 +10:30 at 2024-04-06T15:00Z
  const beforeChange = fixedFromInstant(lordHowe, at('2024-04-06T14:10:00Z'), 'hour')
  const day = must(fixedFromComponents(lordHowe, { year: 2024, month: 4, day: 7 }, 'day'))

  it('always moves forward', () => {
    const next = successor(beforeChange)
    expect(describeInstant(beforeChange.instant)).toBe('2024-04-06T14:00:00Z')
    expect(describeInstant(next.instant)).toBe('2024-04-06T15:00:00Z')
    expect(describeInstant(successor(next).instant)).toBe('2024-04-06T15:30:00Z')
  })

  it('starts the repeated half hour at the transition', () => {
    const repeated = fixedFromInstant(lordHowe, at('2024-04-06T15:10:00Z'), 'hour')
    expect(describeInstant(repeated.instant)).toBe('2024-04-06T15:00:00Z')
    expect(repeated.components.hour).toBe(1)
    expect(durationEquals(instantRangeDuration(instantRangeOf(repeated)), seconds(1800))).toBe(true)
  })

  it('steps back to where it came from', () => {
    const next = successor(beforeChange)
    expect(epochNanoseconds(predecessor(next).instant)).toBe(epochNanoseconds(beforeChange.instant))
    expect(epochNanoseconds(predecessor(successor(next)).instant)).toBe(epochNanoseconds(next.instant))
  })

  it('lists every hour of the day once', () => {
    const hours = unitsWithin(day, 'hour').map((h) => h.components.hour)
    expect(hours).toEqual([0, 1, 1, ...Array.from({ length: 22 }, (_, i) => i + 2)])
    expect(durationEquals(instantRangeDuration(instantRangeOf(day)), seconds(24.5 * 3600))).toBe(true)
  })
})

// ============================================================================
// 2. VALUE RANGES
// ============================================================================

describe('Value ranges', () => {
  const feb1 = utcDay(2024, 2, 1)
  const feb29 = utcDay(2024, 2, 29)

  it('requires ordered bounds', () => {
    expect(() => halfOpenRange(feb29, feb1)).toThrow(PreconditionFailure)
    expect(() => closedRange(feb29, feb1)).toThrow('Range requires lowerBound <= upperBound')
  })

  it('requires bounds from the same region', () => {
    const parisDay = fixedFromInstant(paris, feb29.instant, 'day')
    expect(() => closedRange(feb1, parisDay)).toThrow(PreconditionFailure)
  })

  it('counts the days of February in a leap year', () => {
    expect(rangeCount(closedRange(feb1, feb29))).toBe(29)
    expect(rangeCount(halfOpenRange(feb1, feb29))).toBe(28)
  })

  it('yields values in order', () => {
    const days = [...rangeValues(closedRange(feb1, utcDay(2024, 2, 3)))].map((d) => d.components.day)
    expect(days).toEqual([1, 2, 3])
  })

  it('answers containment by bound type', () => {
    expect(rangeContains(closedRange(feb1, feb29), feb29)).toBe(true)
    expect(rangeContains(halfOpenRange(feb1, feb29), feb29)).toBe(false)
    expect(rangeContains(halfOpenRange(feb1, feb29), feb1)).toBe(true)
    expect(rangeContains(closedRange(feb1, feb29), utcDay(2024, 3, 1))).toBe(false)
  })

  it('treats a half-open range with equal bounds as empty', () => {
    expect(isEmptyRange(halfOpenRange(feb1, feb1))).toBe(true)
    expect(isEmptyRange(closedRange(feb1, feb1))).toBe(false)
    expect(rangeCount(halfOpenRange(feb1, feb1))).toBe(0)
  })

  it('lists the days within a month', () => {
    const february = must(fixedFromComponents(utc, { year: 2024, month: 2 }, 'month'))
    const days = unitsWithin(february, 'day')
    expect(days).toHaveLength(29)
    expect(days[0]?.components.day).toBe(1)
    expect(days[28]?.components.day).toBe(29)
  })

  it('lists 23 hours on a spring-forward day', () => {
    const day = must(fixedFromComponents(newYork, { year: 2024, month: 3, day: 10 }, 'day'))
    expect(unitsWithin(day, 'hour')).toHaveLength(23)
  })

  it('lists the repeated hour twice on a fall-back day', () => {
    const day = must(fixedFromComponents(newYork, { year: 2024, month: 11, day: 3 }, 'day'))
    const hours = unitsWithin(day, 'hour')
    expect(hours).toHaveLength(25)
    expect(hours.slice(0, 4).map((h) => describeInstant(h.instant))).toEqual([
      '2024-11-03T04:00:00Z',
      '2024-11-03T05:00:00Z',
      '2024-11-03T06:00:00Z',
      '2024-11-03T07:00:00Z',
    ])
    expect(hours.slice(0, 4).map((h) => h.components.hour)).toEqual([0, 1, 1, 2])
  })
})

// ============================================================================
// 3. INSTANT RANGES
// ============================================================================

describe('Instant ranges', () => {
  it('spans 23 hours on the US spring-forward day', () => {
    const day = must(fixedFromComponents(newYork, { year: 2024, month: 3, day: 10 }, 'day'))
    expect(durationEquals(instantRangeDuration(instantRangeOf(day)), seconds(23 * 3600))).toBe(true)
  })

  it('spans 25 hours on the US fall-back day', () => {
    const day = must(fixedFromComponents(newYork, { year: 2024, month: 11, day: 3 }, 'day'))
    expect(durationEquals(instantRangeDuration(instantRangeOf(day)), seconds(25 * 3600))).toBe(true)
  })

  it('runs from the first instant of a to the first instant of b', () => {
    const range = instantRange(utcDay(2024, 2, 1), utcDay(2024, 2, 3))
    expect(describeInstant(range.start)).toBe('2024-02-01T00:00:00Z')
    expect(describeInstant(range.end)).toBe('2024-02-03T00:00:00Z')
    expect(() => instantRange(utcDay(2024, 2, 3), utcDay(2024, 2, 1))).toThrow(PreconditionFailure)
  })

  it('excludes its end', () => {
    const range = instantRangeOf(utcDay(2024, 2, 1))
    expect(instantRangeContains(range, at('2024-02-01T00:00:00Z'))).toBe(true)
    expect(instantRangeContains(range, at('2024-02-01T23:59:59.999999999Z'))).toBe(true)
    expect(instantRangeContains(range, at('2024-02-02T00:00:00Z'))).toBe(false)
  })

  it('finds the last instant of a period', () => {
    expect(describeInstant(lastInstant(utcDay(2024, 2, 1)))).toBe('2024-02-01T23:59:59.999999999Z')
  })

  it('intersects overlapping ranges', () => {
    const a = instantRange(utcDay(2024, 2, 1), utcDay(2024, 2, 10))
    const b = instantRange(utcDay(2024, 2, 5), utcDay(2024, 2, 20))
    const overlap = instantRangeIntersection(a, b)
    expect(overlap && describeInstant(overlap.start)).toBe('2024-02-05T00:00:00Z')
    expect(overlap && describeInstant(overlap.end)).toBe('2024-02-10T00:00:00Z')
  })

  it('does not intersect touching ranges', () => {
    const a = instantRange(utcDay(2024, 2, 1), utcDay(2024, 2, 5))
    const b = instantRange(utcDay(2024, 2, 5), utcDay(2024, 2, 9))
    expect(instantRangeIntersection(a, b)).toBeUndefined()
  })

  it('intersects closed value ranges through their covered instants', () => {
    const a = closedRange(utcDay(2024, 2, 1), utcDay(2024, 2, 5))
    const b = closedRange(utcDay(2024, 2, 5), utcDay(2024, 2, 9))
    const overlap = fixedRangeIntersection(a, b)
    expect(overlap && durationEquals(instantRangeDuration(overlap), seconds(86_400))).toBe(true)
  })

  it('does not intersect value ranges from different regions', () => {
    const a = closedRange(utcDay(2024, 2, 1), utcDay(2024, 2, 5))
    const parisDay = fixedFromInstant(paris, at('2024-02-03T12:00:00Z'), 'day')
    expect(fixedRangeIntersection(a, closedRange(parisDay, parisDay))).toBeUndefined()
  })

  it('treats a range with start equal to end as empty', () => {
    const day = utcDay(2024, 2, 1)
    expect(isEmptyInstantRange(instantRange(day, day))).toBe(true)
    expect(isEmptyInstantRange(instantRangeOf(day))).toBe(false)
  })
})

// ============================================================================
// 4. CONTAINMENT
// ============================================================================

describe('Years outside the ISO calendar', () => {
  const midMarch = at('2024-03-15T00:00:00Z')

  const years: [string, string, number][] = [
    ['hebrew', '2023-09-16T00:00:00Z', 13],
    ['persian', '2023-03-21T00:00:00Z', 12],
    ['islamic-umalqura', '2023-07-19T00:00:00Z', 12],
    ['chinese', '2024-02-10T00:00:00Z', 12],
  ]

  it.each(years)('starts the %s year on its first day', (calendar, start, months) => {
    const year = fixedFromInstant(utcIn(calendar), midMarch, 'year')
    expect(describeInstant(year.instant)).toBe(start)
    expect(containsInstant(year, midMarch)).toBe(true)

    const first = firstOf(year, 'month')
    expect(first.components.month).toBe(1)
    expect(containsInstant(year, first.instant)).toBe(true)
    expect(unitsWithin(year, 'month')).toHaveLength(months)
  })
})

describe('containsInstant', () => {
  it('judges containment in the value region', () => {
    const day = fixedFromInstant(paris, at('2023-06-26T12:00:00Z'), 'day')
    expect(containsInstant(day, at('2023-06-25T22:00:00Z'))).toBe(true)
    expect(containsInstant(day, at('2023-06-25T21:59:59Z'))).toBe(false)
    expect(containsInstant(day, at('2023-06-26T21:59:59Z'))).toBe(true)
    expect(containsInstant(day, at('2023-06-26T22:00:00Z'))).toBe(false)
  })

  it('holds for the instant a value was built from', () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 4_000_000_000_000n }), (ms) => {
        const instant = atMillis(ms)
        const day = fixedFromInstant(newYork, instant, 'day')
        expect(containsInstant(day, instant)).toBe(true)
        expect(compareInstants(day.instant, instant)).toBeLessThanOrEqual(0)
        expect(compareInstants(instant, successor(day).instant)).toBe(-1)
      })
    )
  })
})

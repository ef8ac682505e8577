/**
 * Ranges
 *
 * Ordered ranges of Fixed values, stepping by one unit, and half-open
 * instant intervals. Interval lengths come from the calendar engine's first
 * instants, so a day across a DST change lasts 23 or 25 hours.
 */

import { precondition } from './assertions'
import type { Duration } from './duration'
import {
  type Fixed,
  compareFixed,
  fixedEquals,
  fixedFromInstant,
  fixedLessThan,
  fixedLessThanOrEqual,
  firstOf,
} from './fixed'
import {
  type Instant,
  compareInstants,
  epochNanoseconds,
  instantDifference,
  instantFromEpochNanoseconds,
} from './instant'
import type { FinerOrEqualUnit, SteppableUnit, Unit } from './unit'

export type FixedRange<G extends Unit> = {
  readonly lowerBound: Fixed<G>
  readonly upperBound: Fixed<G>
  /** Whether upperBound itself is included */
  readonly closed: boolean
}

/** Half-open: start is included, end is not */
export type InstantRange = {
  readonly start: Instant
  readonly end: Instant
}

// ============================================================================
// Stepping
// ============================================================================

export function successor<G extends SteppableUnit>(fixed: Fixed<G>): Fixed<G> {
  const ns = fixed.region.engine.successor(epochNanoseconds(fixed.instant), fixed.unit)
  return fixedFromInstant(fixed.region, instantFromEpochNanoseconds(ns), fixed.unit)
}

export function predecessor<G extends SteppableUnit>(fixed: Fixed<G>): Fixed<G> {
  const ns = fixed.region.engine.predecessor(epochNanoseconds(fixed.instant), fixed.unit)
  return fixedFromInstant(fixed.region, instantFromEpochNanoseconds(ns), fixed.unit)
}

// ============================================================================
// Fixed Ranges
// ============================================================================

/** a..<b. Fails a precondition unless a <= b in the same region. */
export function halfOpenRange<G extends Unit>(a: Fixed<G>, b: Fixed<G>): FixedRange<G> {
  precondition(fixedLessThanOrEqual(a, b), "Range requires lowerBound <= upperBound")
  return Object.freeze({ lowerBound: a, upperBound: b, closed: false })
}

/** a...b. Fails a precondition unless a <= b in the same region. */
export function closedRange<G extends Unit>(a: Fixed<G>, b: Fixed<G>): FixedRange<G> {
  precondition(fixedLessThanOrEqual(a, b), "Range requires lowerBound <= upperBound")
  return Object.freeze({ lowerBound: a, upperBound: b, closed: true })
}

export function isEmptyRange<G extends Unit>(range: FixedRange<G>): boolean {
  return !range.closed && fixedEquals(range.lowerBound, range.upperBound)
}

export function rangeContains<G extends Unit>(range: FixedRange<G>, value: Fixed<G>): boolean {
  if (!fixedLessThanOrEqual(range.lowerBound, value)) return false
  return range.closed ? fixedLessThanOrEqual(value, range.upperBound) : fixedLessThan(value, range.upperBound)
}

export function* rangeValues<G extends SteppableUnit>(range: FixedRange<G>): Generator<Fixed<G>> {
  let current = range.lowerBound
  while (rangeContains(range, current)) {
    yield current
    current = successor(current)
  }
}

export function rangeCount<G extends SteppableUnit>(range: FixedRange<G>): number {
  let count = 0
  for (const _ of rangeValues(range)) count++
  return count
}

/** Every `unit`-granular value inside `fixed`, e.g. the days of a month */
export function unitsWithin<G extends Unit, F extends FinerOrEqualUnit<G> & SteppableUnit>(
  fixed: Fixed<G>,
  unit: F
): Fixed<F>[] {
  const values: Fixed<F>[] = []
  let current = firstOf(fixed, unit)
  while (containsInstant(fixed, current.instant)) {
    values.push(current)
    current = successor(current)
  }
  return values
}

// ============================================================================
// Instant Ranges
// ============================================================================

/** [a.firstInstant, b.firstInstant). Fails a precondition unless a <= b. */
export function instantRange<G extends Unit>(a: Fixed<G>, b: Fixed<G>): InstantRange {
  precondition(fixedLessThanOrEqual(a, b), "Range requires lowerBound <= upperBound")
  return Object.freeze({ start: a.instant, end: b.instant })
}

/** The instants covered by one period */
export function instantRangeOf<G extends SteppableUnit>(fixed: Fixed<G>): InstantRange {
  return Object.freeze({ start: fixed.instant, end: successor(fixed).instant })
}

export function lastInstant<G extends SteppableUnit>(fixed: Fixed<G>): Instant {
  return instantFromEpochNanoseconds(epochNanoseconds(successor(fixed).instant) - 1n)
}

export function instantRangeContains(range: InstantRange, instant: Instant): boolean {
  return compareInstants(range.start, instant) <= 0 && compareInstants(instant, range.end) < 0
}

export function instantRangeDuration(range: InstantRange): Duration {
  return instantDifference(range.end, range.start)
}

export function isEmptyInstantRange(range: InstantRange): boolean {
  return compareInstants(range.start, range.end) >= 0
}

/** Undefined when the ranges share no instant; touching ranges do not intersect */
export function instantRangeIntersection(a: InstantRange, b: InstantRange): InstantRange | undefined {
  const start = compareInstants(a.start, b.start) >= 0 ? a.start : b.start
  const end = compareInstants(a.end, b.end) <= 0 ? a.end : b.end
  if (compareInstants(start, end) >= 0) return undefined
  return Object.freeze({ start, end })
}

/** Intersection of two value ranges, as instants */
export function fixedRangeIntersection<G extends SteppableUnit>(
  a: FixedRange<G>,
  b: FixedRange<G>
): InstantRange | undefined {
  if (compareFixed(a.lowerBound, b.lowerBound) === undefined) return undefined
  return instantRangeIntersection(toInstantRange(a), toInstantRange(b))
}

export function toInstantRange<G extends SteppableUnit>(range: FixedRange<G>): InstantRange {
  const end = range.closed ? successor(range.upperBound).instant : range.upperBound.instant
  return Object.freeze({ start: range.lowerBound.instant, end })
}

// ============================================================================
// Containment
// ============================================================================

/** Whether `instant` falls inside the period, judged in the value's own region */
export function containsInstant<G extends Unit>(fixed: Fixed<G>, instant: Instant): boolean {
  const start = fixed.region.engine.startOf(epochNanoseconds(instant), fixed.unit)
  return start === epochNanoseconds(fixed.instant)
}

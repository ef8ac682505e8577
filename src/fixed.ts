/**
 * Fixed Values
 *
 * A `Fixed<G>` is one (and only one) period on a real calendar at
 * granularity G: the Reiwa era on the Japanese calendar is a `Fixed<'era'>`,
 * February 2024 on the Gregorian calendar is a `Fixed<'month'>`, and
 * 2024-02-12 09:16:53 in Paris is a `Fixed<'second'>`.
 *
 * Every value carries its Region, the first Instant of its period, and the
 * components at and above G, all computed by the region's calendar engine at
 * construction time. Values are immutable; arithmetic returns new values.
 */

import { precondition } from './assertions'
import { getLogger } from './config'
import {
  type TimeError,
  OverspecifiedComponentsError,
  UnderspecifiedComponentsError,
} from './errors'
import type { Temporal } from '@js-temporal/polyfill'
import {
  type Instant,
  compareInstants,
  instantEquals,
  epochNanoseconds,
  instantFromEpochNanoseconds,
  instantFromTemporal,
  instantFromDate,
  describeInstant,
} from './instant'
import { type Region, regionEquals, regionKey, regionIdentifiers, snapshotRegion } from './region'
import { Ok, Err, type Result } from './result'
import {
  UNITS,
  type AddableUnit,
  type CalendarComponents,
  type ComponentsOf,
  type FinerOrEqualUnit,
  type RepresentedUnit,
  type Unit,
  isRepresented,
  representedUnits,
} from './unit'

export type Fixed<G extends Unit> = {
  readonly unit: G
  readonly region: Region
  /** First instant of the period */
  readonly instant: Instant
  readonly components: ComponentsOf<G>
}

// ============================================================================
// Construction
// ============================================================================

function restrictComponents<G extends Unit>(all: CalendarComponents, unit: G): ComponentsOf<G> {
  const restricted: Partial<CalendarComponents> = {}
  for (const u of representedUnits(unit)) {
    Object.assign(restricted, { [u]: all[u] })
  }
  // holds exactly the represented keys, as computed above
  return Object.freeze(restricted) as ComponentsOf<G>
}

/** All constructors funnel through here once components are extracted */
function make<G extends Unit>(unit: G, region: Region, firstNs: bigint, components: CalendarComponents): Fixed<G> {
  return Object.freeze({
    unit,
    region,
    instant: instantFromEpochNanoseconds(firstNs),
    components: restrictComponents(components, unit),
  })
}

/** The period at granularity `unit` that contains `instant`. Never fails. */
export function fixedFromInstant<G extends Unit>(region: Region, instant: Instant, unit: G): Fixed<G> {
  const pinned = snapshotRegion(region)
  const ns = epochNanoseconds(instant)
  return make(unit, pinned, pinned.engine.startOf(ns, unit), pinned.engine.components(ns))
}

export function fixedFromTemporal<G extends Unit>(region: Region, moment: Temporal.Instant, unit: G): Fixed<G> {
  return fixedFromInstant(region, instantFromTemporal(moment), unit)
}

export function fixedFromDate<G extends Unit>(region: Region, date: Date, unit: G): Fixed<G> {
  return fixedFromInstant(region, instantFromDate(date), unit)
}

/**
 * Strict construction from calendar components.
 *
 * Every unit at or above G must be supplied (era is optional except for
 * `Fixed<'era'>`), nothing finer than G may be supplied, and the calendar
 * engine must resolve the components to exactly what was asked for.
 * "February 30" fails rather than becoming February 29 or March 1.
 * When `era` is supplied, `year` is the year within that era.
 */
export function fixedFromComponents<G extends Unit>(
  region: Region,
  components: Partial<CalendarComponents>,
  unit: G
): Result<Fixed<G>, TimeError> {
  const pinned = snapshotRegion(region)
  const supplied = UNITS.filter((u) => components[u] !== undefined)

  const extraneous = supplied.filter((u) => !isRepresented(unit, u))
  if (extraneous.length > 0) {
    getLogger().debug({ unit, extraneous }, 'strict construction overspecified')
    return Err(new OverspecifiedComponentsError(extraneous))
  }

  const fields: Unit[] = representedUnits(unit)
  const missing = fields.filter((u) => (u !== 'era' || unit === 'era') && components[u] === undefined)
  if (missing.length > 0) {
    getLogger().debug({ unit, missing }, 'strict construction underspecified')
    return Err(new UnderspecifiedComponentsError(missing))
  }

  const match = pinned.engine.exactMatch(components, fields)
  if (!match.ok) {
    getLogger().debug({ unit, mismatched: match.error.mismatched }, 'strict construction mismatched')
    return Err(match.error)
  }

  return Ok(make(unit, pinned, pinned.engine.startOf(match.value.epochNs, unit), match.value.components))
}

// ============================================================================
// Accessors
// ============================================================================

export function firstInstant<G extends Unit>(fixed: Fixed<G>): Instant {
  return fixed.instant
}

/** An independent copy whose region holds its own calendar engine */
export function forcedCopy<G extends Unit>(fixed: Fixed<G>): Fixed<G> {
  return Object.freeze({ ...fixed, region: snapshotRegion(fixed.region, { forced: true }) })
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Orders two values by their first instants. Values from different regions
 * are incomparable and yield `undefined`.
 */
export function compareFixed<G extends Unit>(a: Fixed<G>, b: Fixed<G>): number | undefined {
  if (!regionEquals(a.region, b.region)) return undefined
  return compareInstants(a.instant, b.instant)
}

export function fixedEquals<G extends Unit>(a: Fixed<G>, b: Fixed<G>): boolean {
  return a.unit === b.unit && regionEquals(a.region, b.region) && instantEquals(a.instant, b.instant)
}

/** False whenever the regions differ */
export function fixedLessThan<G extends Unit>(a: Fixed<G>, b: Fixed<G>): boolean {
  const order = compareFixed(a, b)
  return order !== undefined && order < 0
}

/** False whenever the regions differ */
export function fixedGreaterThan<G extends Unit>(a: Fixed<G>, b: Fixed<G>): boolean {
  const order = compareFixed(a, b)
  return order !== undefined && order > 0
}

export function fixedLessThanOrEqual<G extends Unit>(a: Fixed<G>, b: Fixed<G>): boolean {
  const order = compareFixed(a, b)
  return order !== undefined && order <= 0
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Adds `amount` of a unit at or above G. Month and year arithmetic clamps to
 * the last valid day (January 31 + 1 month is the end of February), as the
 * calendar engine does.
 */
export function adding<G extends Unit>(
  fixed: Fixed<G>,
  amount: number,
  unit: RepresentedUnit<G> & AddableUnit
): Fixed<G> {
  precondition(isRepresented(fixed.unit, unit), `Cannot add ${unit} units to a ${fixed.unit} value`)
  const ns = fixed.region.engine.adding(epochNanoseconds(fixed.instant), amount, unit)
  return fixedFromInstant(fixed.region, instantFromEpochNanoseconds(ns), fixed.unit)
}

/** The coarser period containing this one, e.g. the month of a day */
export function truncated<G extends Unit, C extends RepresentedUnit<G>>(fixed: Fixed<G>, unit: C): Fixed<C> {
  precondition(isRepresented(fixed.unit, unit), `${unit} is finer than ${fixed.unit}`)
  return fixedFromInstant(fixed.region, fixed.instant, unit)
}

/** The first finer period inside this one, e.g. the first day of a month */
export function firstOf<G extends Unit, F extends FinerOrEqualUnit<G>>(fixed: Fixed<G>, unit: F): Fixed<F> {
  precondition(isRepresented(unit, fixed.unit), `${unit} is coarser than ${fixed.unit}`)
  return fixedFromInstant(fixed.region, fixed.instant, unit)
}

// ============================================================================
// Description
// ============================================================================

export function describeFixed<G extends Unit>(fixed: Fixed<G>): string {
  const components = Object.entries(fixed.components)
    .map(([name, value]) => `${name}=${String(value)}`)
    .join(' ')
  const ids = regionIdentifiers(fixed.region)
  return `Fixed<${fixed.unit}>{ ` + [
    `timestamp: ${describeInstant(fixed.instant)}`,
    `components: ${components}`,
    `locale: ${ids.locale}`,
    `calendar: ${ids.calendar}`,
    `timeZone: ${ids.timeZone}`,
  ].join(', ') + ' }'
}

/** Stable identity key, usable in Maps and Sets */
export function fixedKey<G extends Unit>(fixed: Fixed<G>): string {
  return `${fixed.unit}@${epochNanoseconds(fixed.instant)}#${regionKey(regionIdentifiers(fixed.region))}`
}

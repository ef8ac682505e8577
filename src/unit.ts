/**
 * Unit Hierarchy
 *
 * The closed, ordered set of calendar granularities, coarsest first.
 * A value pinned to a unit also represents every coarser unit, so a
 * `Fixed<'day'>` carries era, year, month and day.
 *
 * The ordering exists twice: at run time through `UNITS`, and at the type
 * level through `RepresentedUnit<G>`, which lets the compiler reject e.g.
 * reading `hour` from a day-granular value.
 */

export const UNITS = ['era', 'year', 'month', 'day', 'hour', 'minute', 'second', 'nanosecond'] as const

export type Unit = (typeof UNITS)[number]

/** Full component breakdown; keys coincide with unit names */
export type CalendarComponents = {
  /** Undefined for calendars without eras */
  era: string | undefined
  /** Year within the era when the calendar has eras */
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  /** Sub-second part, 0 through 999_999_999 */
  nanosecond: number
}

// ============================================================================
// Type-level Ordering
// ============================================================================

type UnitsThrough<G extends Unit, L extends readonly Unit[] = typeof UNITS> = L extends readonly [
  infer H extends Unit,
  ...infer R extends readonly Unit[],
]
  ? H extends G
    ? H
    : H | UnitsThrough<G, R>
  : never

/** Units at or above G */
export type RepresentedUnit<G extends Unit> = G extends Unit ? Extract<UnitsThrough<G>, Unit> : never

/** Units at or below G */
export type FinerOrEqualUnit<G extends Unit> = G extends Unit
  ? Exclude<Unit, Exclude<RepresentedUnit<G>, G>>
  : never

/** Units the calendar engine can add; eras have no arithmetic */
export type AddableUnit = Exclude<Unit, 'era'>

/** Units with successor and predecessor */
export type SteppableUnit = AddableUnit

export type ComponentsOf<G extends Unit> = Readonly<Pick<CalendarComponents, RepresentedUnit<G>>>

// ============================================================================
// Runtime Metadata
// ============================================================================

const TIME_CARRYING: ReadonlySet<Unit> = new Set<Unit>(['hour', 'minute', 'second', 'nanosecond'])

export function unitIndex(unit: Unit): number {
  return UNITS.indexOf(unit)
}

/** Negative when `a` is coarser than `b` */
export function compareUnits(a: Unit, b: Unit): number {
  return unitIndex(a) - unitIndex(b)
}

export function isCoarserThan(a: Unit, b: Unit): boolean {
  return compareUnits(a, b) < 0
}

export function representedUnits<G extends Unit>(unit: G): RepresentedUnit<G>[] {
  return UNITS.filter((u): u is RepresentedUnit<G> => isRepresented(unit, u))
}

export function isRepresented<G extends Unit>(unit: G, candidate: Unit): candidate is RepresentedUnit<G> {
  return unitIndex(candidate) <= unitIndex(unit)
}

export function isTimeCarrying(unit: Unit): boolean {
  return TIME_CARRYING.has(unit)
}

export function isUnit(value: unknown): value is Unit {
  return UNITS.some((u) => u === value)
}

/**
 * Regional Clocks
 *
 * A clock produces "now" in a Region, advancing at a fixed rate relative to
 * real elapsed time. Custom clocks start from an arbitrary instant and may
 * run faster or slower than real time, which makes them useful in tests.
 */

import { precondition } from './assertions'
import { getLogger } from './config'
import { multiplyDuration, ZERO_DURATION } from './duration'
import { type Fixed, fixedFromInstant } from './fixed'
import {
  type Epoch,
  type Instant,
  addingDuration,
  describeInstant,
  instantDifference,
  instantSince,
  systemInstant,
} from './instant'
import { type Region, POSIX_REGION, autoupdatingCurrentRegion, regionIdentifiers, regionKey } from './region'
import type { Unit } from './unit'

export interface RegionalClock {
  readonly region: Region
  /** Clock seconds per real second */
  readonly rate: number
  now(): Instant
  /** The period at granularity `unit` containing now */
  current<G extends Unit>(unit: G): Fixed<G>
  /** The same clock, producing values in another region */
  converting(region: Region): RegionalClock
}

/** Source of real time; defaults to the system clock */
export type TimeSource = () => Instant

export type CustomClockOptions = {
  startingFrom: Instant | Epoch
  rate?: number
  region?: Region
  source?: TimeSource
}

// ============================================================================
// Construction
// ============================================================================

function isEpoch(value: Instant | Epoch): value is Epoch {
  return 'offset' in value
}

function buildClock(reference: Instant, rate: number, region: Region, source: TimeSource): RegionalClock {
  const realStart = source()

  function now(): Instant {
    if (rate === 1) return addingDuration(reference, instantDifference(source(), realStart))
    return addingDuration(reference, multiplyDuration(instantDifference(source(), realStart), rate))
  }

  return {
    region,
    rate,
    now,
    current<G extends Unit>(unit: G): Fixed<G> {
      return fixedFromInstant(region, now(), unit)
    },
    converting(other: Region): RegionalClock {
      return buildClock(now(), rate, other, source)
    },
  }
}

export function createSystemClock(region: Region, source: TimeSource = systemInstant): RegionalClock {
  return {
    region,
    rate: 1,
    now: source,
    current<G extends Unit>(unit: G): Fixed<G> {
      return fixedFromInstant(region, source(), unit)
    },
    converting(other: Region): RegionalClock {
      return createSystemClock(other, source)
    },
  }
}

/** Fails a precondition unless `rate` is finite and strictly positive */
export function createCustomClock(options: CustomClockOptions): RegionalClock {
  const rate = options.rate ?? 1
  precondition(
    Number.isFinite(rate) && rate > 0,
    'You cannot create a clock where time has stopped or flows backwards'
  )

  const reference = isEpoch(options.startingFrom)
    ? instantSince(options.startingFrom, ZERO_DURATION)
    : options.startingFrom
  const region = options.region ?? autoupdatingCurrentRegion

  getLogger().debug(
    { reference: describeInstant(reference), rate, region: regionKey(regionIdentifiers(region)) },
    'custom clock created'
  )
  return buildClock(reference, rate, region, options.source ?? systemInstant)
}

// ============================================================================
// Well-known Clocks
// ============================================================================

export const Clocks = {
  /** Follows system time in the live system region */
  system: createSystemClock(autoupdatingCurrentRegion),
  /** Follows system time in the POSIX region */
  posix: createSystemClock(POSIX_REGION),
  systemIn: (region: Region): RegionalClock => createSystemClock(region),
  custom: createCustomClock,
} as const

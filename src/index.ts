/**
 * regional-time
 *
 * Public API exports
 */

// Error system (canonical source: base class, codes, all error classes)
export {
  TimeError, TimeErrorCode,
  UnderspecifiedComponentsError, OverspecifiedComponentsError, ComponentMismatchError,
  InvalidRegionError, DurationFormatError, InvalidConfigError,
  PreconditionFailure,
} from './errors'
export type { TimeErrorCode as TimeErrorCodeType, ComponentName } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Configuration & logging
export type { TimeConfig, ConfigureOptions } from './config'
export { configure, getConfig, loadConfig } from './config'
export type { Logger } from './logger'
export { makeLogger, makeNoopLogger } from './logger'

// Duration
export type { EncodedDuration } from './duration'
export {
  Duration,
  seconds, milliseconds, microseconds, nanoseconds,
  ZERO_DURATION,
  durationFromComponents, durationFromAttoseconds, totalAttoseconds,
  durationToNanoseconds,
  addDurations, subtractDurations, negateDuration,
  multiplyDuration, divideDuration, durationRatio,
  compareDurations, durationEquals, durationLessThan,
  encodeDuration, decodeDuration, durationToJSON,
  durationDescription,
} from './duration'

// Instant
export type { Instant, Epoch } from './instant'
export {
  UNIX_EPOCH, REFERENCE_EPOCH, createEpoch,
  instantFromEpoch, instantSince, intervalSince,
  instantFromEpochNanoseconds, epochNanoseconds,
  instantFromTemporal, toTemporalInstant, instantFromDate, toDate, systemInstant,
  addingDuration, instantDifference,
  compareInstants, instantEquals, instantBefore, instantAfter,
  describeInstant,
} from './instant'

// Region
export type { Region, RegionIdentifiers, SnapshotOptions } from './region'
export {
  createRegion, POSIX_REGION,
  autoupdatingCurrentRegion, currentRegion, snapshotRegion,
  regionIdentifiers, regionKey, regionEquals,
} from './region'

// Units
export type {
  Unit, CalendarComponents, ComponentsOf,
  RepresentedUnit, FinerOrEqualUnit, AddableUnit, SteppableUnit,
} from './unit'
export {
  UNITS, unitIndex, compareUnits, isCoarserThan,
  representedUnits, isRepresented, isTimeCarrying, isUnit,
} from './unit'

// Fixed values
export type { Fixed } from './fixed'
export {
  fixedFromInstant, fixedFromTemporal, fixedFromDate, fixedFromComponents,
  firstInstant, forcedCopy,
  compareFixed, fixedEquals, fixedLessThan, fixedGreaterThan, fixedLessThanOrEqual,
  adding, truncated, firstOf,
  describeFixed, fixedKey,
} from './fixed'

// Formatting
export type { Template } from './formatting'
export { naturalFormats, intlOptions, formatFixed, isEraRelevant } from './formatting'

// Ranges
export type { FixedRange, InstantRange } from './range'
export {
  successor, predecessor,
  halfOpenRange, closedRange, isEmptyRange, rangeContains, rangeValues, rangeCount, unitsWithin,
  instantRange, instantRangeOf, lastInstant,
  instantRangeContains, instantRangeDuration, isEmptyInstantRange,
  instantRangeIntersection, fixedRangeIntersection, toInstantRange,
  containsInstant,
} from './range'

// Clocks
export type { RegionalClock, TimeSource, CustomClockOptions } from './clock'
export { Clocks, createSystemClock, createCustomClock } from './clock'

// Calendar engine
export type { CalendarEngine, ExactMatch } from './internal/calendar-engine'
export { createCalendarEngine, EARLIEST_EPOCH_NS } from './internal/calendar-engine'

/**
 * Instant
 *
 * A point on the universal timeline, stored as the elapsed Duration since the
 * Unix epoch. No calendar semantics live here. Arithmetic on instants uses
 * exact attosecond totals rather than the Duration double path.
 */

import { Temporal } from '@js-temporal/polyfill'
import {
  type Duration,
  durationFromAttoseconds,
  totalAttoseconds,
  compareDurations,
  durationEquals,
  seconds,
} from './duration'

export type Instant = {
  readonly sinceEpoch: Duration
}

export type Epoch = {
  readonly name: string
  /** Offset of this epoch from the Unix epoch */
  readonly offset: Duration
}

// ============================================================================
// Epochs
// ============================================================================

export const UNIX_EPOCH: Epoch = Object.freeze({ name: 'unix', offset: seconds(0) })

/** 2001-01-01T00:00:00Z */
export const REFERENCE_EPOCH: Epoch = Object.freeze({ name: 'reference', offset: seconds(978_307_200) })

export function createEpoch(name: string, at: Instant): Epoch {
  return Object.freeze({ name, offset: at.sinceEpoch })
}

// ============================================================================
// Construction
// ============================================================================

const ATTOS_PER_NANOSECOND = 1_000_000_000n

export function instantFromEpoch(sinceEpoch: Duration): Instant {
  return Object.freeze({ sinceEpoch })
}

export function instantSince(epoch: Epoch, interval: Duration): Instant {
  return instantFromEpoch(durationFromAttoseconds(totalAttoseconds(epoch.offset) + totalAttoseconds(interval)))
}

export function intervalSince(instant: Instant, epoch: Epoch): Duration {
  return durationFromAttoseconds(totalAttoseconds(instant.sinceEpoch) - totalAttoseconds(epoch.offset))
}

export function instantFromEpochNanoseconds(ns: bigint): Instant {
  return instantFromEpoch(durationFromAttoseconds(ns * ATTOS_PER_NANOSECOND))
}

/** Nanoseconds since the Unix epoch, floored */
export function epochNanoseconds(instant: Instant): bigint {
  const attos = totalAttoseconds(instant.sinceEpoch)
  const quotient = attos / ATTOS_PER_NANOSECOND
  return attos % ATTOS_PER_NANOSECOND < 0n ? quotient - 1n : quotient
}

// ============================================================================
// Host Interop
// ============================================================================

export function instantFromTemporal(moment: Temporal.Instant): Instant {
  return instantFromEpochNanoseconds(moment.epochNanoseconds)
}

export function toTemporalInstant(instant: Instant): Temporal.Instant {
  return Temporal.Instant.fromEpochNanoseconds(epochNanoseconds(instant))
}

export function instantFromDate(date: Date): Instant {
  return instantFromEpochNanoseconds(BigInt(date.getTime()) * 1_000_000n)
}

export function toDate(instant: Instant): Date {
  const ns = epochNanoseconds(instant)
  const ms = ns / 1_000_000n - (ns % 1_000_000n < 0n ? 1n : 0n)
  return new Date(Number(ms))
}

export function systemInstant(): Instant {
  return instantFromTemporal(Temporal.Now.instant())
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addingDuration(instant: Instant, d: Duration): Instant {
  return instantFromEpoch(durationFromAttoseconds(totalAttoseconds(instant.sinceEpoch) + totalAttoseconds(d)))
}

/** Elapsed time from `b` to `a` */
export function instantDifference(a: Instant, b: Instant): Duration {
  return durationFromAttoseconds(totalAttoseconds(a.sinceEpoch) - totalAttoseconds(b.sinceEpoch))
}

// ============================================================================
// Comparison
// ============================================================================

export function compareInstants(a: Instant, b: Instant): number {
  return compareDurations(a.sinceEpoch, b.sinceEpoch)
}

export function instantEquals(a: Instant, b: Instant): boolean {
  return durationEquals(a.sinceEpoch, b.sinceEpoch)
}

export function instantBefore(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) < 0
}

export function instantAfter(a: Instant, b: Instant): boolean {
  return compareInstants(a, b) > 0
}

export function describeInstant(instant: Instant): string {
  return toTemporalInstant(instant).toString()
}

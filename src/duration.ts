/**
 * Duration
 *
 * Elapsed time as whole seconds plus attoseconds (10⁻¹⁸ s), both int64-sized
 * bigints. Values are kept canonical: both components share a sign and
 * |attoseconds| < 10¹⁸.
 *
 * Arithmetic converts both operands to a double nanosecond total, combines,
 * and re-splits. That is exact for seconds-scale values and lossy in the
 * sub-nanosecond tail at large magnitudes. Equality and ordering compare the
 * integer components and are always exact. Use `totalAttoseconds` and
 * `durationFromAttoseconds` when exact sums are needed.
 */

import { z } from 'zod'
import { precondition } from './assertions'
import { DurationFormatError } from './errors'
import { Ok, Err, type Result } from './result'

export type Duration = {
  readonly seconds: bigint
  readonly attoseconds: bigint
}

export type EncodedDuration = readonly [seconds: bigint, attoseconds: bigint]

// ============================================================================
// Constants
// ============================================================================

const ATTOS_PER_SECOND = 1_000_000_000_000_000_000n
const ATTOS_PER_MILLISECOND = 1_000_000_000_000_000n
const ATTOS_PER_MICROSECOND = 1_000_000_000_000n
const ATTOS_PER_NANOSECOND = 1_000_000_000n

const NANOS_PER_SECOND = 1e9

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

// ============================================================================
// Construction
// ============================================================================

function make(seconds: bigint, attoseconds: bigint): Duration {
  return Object.freeze({ seconds, attoseconds })
}

export function durationFromAttoseconds(total: bigint): Duration {
  // bigint division truncates, so quotient and remainder share a sign
  const seconds = total / ATTOS_PER_SECOND
  precondition(seconds >= INT64_MIN && seconds <= INT64_MAX, `Duration overflows 64-bit seconds: ${seconds}`)
  return make(seconds, total % ATTOS_PER_SECOND)
}

export function totalAttoseconds(d: Duration): bigint {
  return d.seconds * ATTOS_PER_SECOND + d.attoseconds
}

/** Accepts non-canonical pairs such as (1, -5e17) and normalizes them */
export function durationFromComponents(seconds: bigint, attoseconds: bigint): Duration {
  return durationFromAttoseconds(seconds * ATTOS_PER_SECOND + attoseconds)
}

function fromUnits(value: number | bigint, unitsPerSecond: number, attosPerUnit: bigint): Duration {
  if (typeof value === 'bigint') return durationFromAttoseconds(value * attosPerUnit)
  precondition(Number.isFinite(value), `Duration value must be finite, got ${value}`)
  if (Number.isInteger(value)) return durationFromAttoseconds(BigInt(value) * attosPerUnit)

  const wholeSeconds = Math.trunc(value / unitsPerSecond)
  const remainder = value - wholeSeconds * unitsPerSecond
  return durationFromAttoseconds(
    BigInt(wholeSeconds) * ATTOS_PER_SECOND + BigInt(Math.trunc(remainder * Number(attosPerUnit)))
  )
}

export function seconds(value: number | bigint): Duration {
  return fromUnits(value, 1, ATTOS_PER_SECOND)
}

export function milliseconds(value: number | bigint): Duration {
  return fromUnits(value, 1_000, ATTOS_PER_MILLISECOND)
}

export function microseconds(value: number | bigint): Duration {
  return fromUnits(value, 1_000_000, ATTOS_PER_MICROSECOND)
}

export function nanoseconds(value: number | bigint): Duration {
  return fromUnits(value, 1_000_000_000, ATTOS_PER_NANOSECOND)
}

export const ZERO_DURATION: Duration = make(0n, 0n)

// ============================================================================
// Double-precision Path
// ============================================================================

export function durationToNanoseconds(d: Duration): number {
  return Number(d.seconds) * NANOS_PER_SECOND + Number(d.attoseconds) / NANOS_PER_SECOND
}

function fromNanoseconds(total: number): Duration {
  precondition(Number.isFinite(total), `Duration arithmetic overflowed to ${total}`)
  const wholeSeconds = Math.trunc(total / NANOS_PER_SECOND)
  const remainder = total - wholeSeconds * NANOS_PER_SECOND
  return durationFromAttoseconds(
    BigInt(wholeSeconds) * ATTOS_PER_SECOND + BigInt(Math.round(remainder * NANOS_PER_SECOND))
  )
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDurations(a: Duration, b: Duration): Duration {
  return fromNanoseconds(durationToNanoseconds(a) + durationToNanoseconds(b))
}

export function subtractDurations(a: Duration, b: Duration): Duration {
  return fromNanoseconds(durationToNanoseconds(a) - durationToNanoseconds(b))
}

export function negateDuration(d: Duration): Duration {
  return subtractDurations(ZERO_DURATION, d)
}

export function multiplyDuration(d: Duration, factor: number): Duration {
  return fromNanoseconds(durationToNanoseconds(d) * factor)
}

/** Dividing by zero is a precondition failure. */
export function divideDuration(d: Duration, divisor: number): Duration {
  precondition(divisor !== 0, 'Cannot divide a Duration by zero')
  return fromNanoseconds(durationToNanoseconds(d) / divisor)
}

/** Plain ratio. A zero divisor yields ±Infinity or NaN, as IEEE division does. */
export function durationRatio(a: Duration, b: Duration): number {
  return durationToNanoseconds(a) / durationToNanoseconds(b)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDurations(a: Duration, b: Duration): number {
  if (a.seconds !== b.seconds) return a.seconds < b.seconds ? -1 : 1
  if (a.attoseconds !== b.attoseconds) return a.attoseconds < b.attoseconds ? -1 : 1
  return 0
}

export function durationEquals(a: Duration, b: Duration): boolean {
  return a.seconds === b.seconds && a.attoseconds === b.attoseconds
}

export function durationLessThan(a: Duration, b: Duration): boolean {
  return compareDurations(a, b) < 0
}

// ============================================================================
// Serialization
// ============================================================================

const Int64Schema = z
  .union([
    z.bigint(),
    z.number().int().refine(Number.isSafeInteger, 'must be a safe integer'),
    z.string().regex(/^-?\d+$/, 'must be an integer string'),
  ])
  .transform((v) => BigInt(v))
  .refine((v) => v >= INT64_MIN && v <= INT64_MAX, 'must fit in 64 bits')

const EncodedDurationSchema = z
  .tuple([Int64Schema, Int64Schema])
  .refine(([secs, attos]) => {
    const normalized = (secs * ATTOS_PER_SECOND + attos) / ATTOS_PER_SECOND
    return normalized >= INT64_MIN && normalized <= INT64_MAX
  }, 'normalized seconds must fit in 64 bits')

export function encodeDuration(d: Duration): EncodedDuration {
  return [d.seconds, d.attoseconds]
}

/** JSON form; numbers cannot carry 64-bit values, so the pair is stringified */
export function durationToJSON(d: Duration): [string, string] {
  return [d.seconds.toString(), d.attoseconds.toString()]
}

export function decodeDuration(value: unknown): Result<Duration, DurationFormatError> {
  const parsed = EncodedDurationSchema.safeParse(value)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => issue.message).join('; ')
    return Err(new DurationFormatError(`Expected [seconds, attoseconds]: ${detail}`))
  }
  const [secs, attos] = parsed.data
  return Ok(durationFromComponents(secs, attos))
}

// ============================================================================
// Description
// ============================================================================

/** Total seconds as a decimal string, e.g. "1.5" */
export function durationDescription(d: Duration): string {
  return `${durationToNanoseconds(d) / NANOS_PER_SECOND}`
}

// ============================================================================
// Companion
// ============================================================================

export const Duration = {
  zero: ZERO_DURATION,
  seconds,
  milliseconds,
  microseconds,
  nanoseconds,
  fromComponents: durationFromComponents,
  fromAttoseconds: durationFromAttoseconds,
} as const

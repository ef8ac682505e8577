/**
 * Consolidated error system for regional-time.
 *
 * All recoverable failures extend TimeError, which carries a typed error code.
 * Caller misuse (reversed ranges, stopped clocks) is a PreconditionFailure
 * and deliberately does not extend TimeError.
 */

import type { CalendarComponents } from './unit'

// ============================================================================
// Error Codes
// ============================================================================

export const TimeErrorCode = {
  // Strict construction
  UNDERSPECIFIED_COMPONENTS: 'UNDERSPECIFIED_COMPONENTS',
  OVERSPECIFIED_COMPONENTS: 'OVERSPECIFIED_COMPONENTS',
  COMPONENT_MISMATCH: 'COMPONENT_MISMATCH',

  // Region
  INVALID_REGION: 'INVALID_REGION',

  // Serialization
  DURATION_FORMAT: 'DURATION_FORMAT',

  // Configuration
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const

export type TimeErrorCode = (typeof TimeErrorCode)[keyof typeof TimeErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class TimeError extends Error {
  readonly code: TimeErrorCode

  constructor(code: TimeErrorCode, message: string) {
    super(message)
    this.name = 'TimeError'
    this.code = code
  }
}

// ============================================================================
// Strict Construction Errors
// ============================================================================

export type ComponentName = keyof CalendarComponents

export class UnderspecifiedComponentsError extends TimeError {
  readonly missing: readonly ComponentName[]

  constructor(missing: readonly ComponentName[]) {
    super(TimeErrorCode.UNDERSPECIFIED_COMPONENTS, `Missing required components: ${missing.join(', ')}`)
    this.name = 'UnderspecifiedComponentsError'
    this.missing = missing
  }
}

export class OverspecifiedComponentsError extends TimeError {
  readonly extraneous: readonly ComponentName[]

  constructor(extraneous: readonly ComponentName[]) {
    super(TimeErrorCode.OVERSPECIFIED_COMPONENTS, `Components finer than the requested unit: ${extraneous.join(', ')}`)
    this.name = 'OverspecifiedComponentsError'
    this.extraneous = extraneous
  }
}

/**
 * The calendar engine resolved the supplied components to a different date,
 * e.g. February 30 resolving to February 29.
 */
export class ComponentMismatchError extends TimeError {
  readonly expected: Partial<CalendarComponents>
  readonly actual: Partial<CalendarComponents>
  readonly mismatched: readonly ComponentName[]

  constructor(
    expected: Partial<CalendarComponents>,
    actual: Partial<CalendarComponents>,
    mismatched: readonly ComponentName[]
  ) {
    const detail = mismatched
      .map((name) => `${name} expected ${String(expected[name])} but was ${String(actual[name])}`)
      .join('; ')
    super(TimeErrorCode.COMPONENT_MISMATCH, `Components do not describe a real date: ${detail}`)
    this.name = 'ComponentMismatchError'
    this.expected = expected
    this.actual = actual
    this.mismatched = mismatched
  }
}

// ============================================================================
// Region Errors
// ============================================================================

export class InvalidRegionError extends TimeError {
  constructor(message: string) {
    super(TimeErrorCode.INVALID_REGION, message)
    this.name = 'InvalidRegionError'
  }
}

// ============================================================================
// Serialization Errors
// ============================================================================

export class DurationFormatError extends TimeError {
  constructor(message: string) {
    super(TimeErrorCode.DURATION_FORMAT, message)
    this.name = 'DurationFormatError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class InvalidConfigError extends TimeError {
  constructor(message: string) {
    super(TimeErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}

// ============================================================================
// Precondition Failures
// ============================================================================

/** Raised for caller misuse. Fix the call site; do not catch this. */
export class PreconditionFailure extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PreconditionFailure'
  }
}

/**
 * Natural Formatting
 *
 * Chooses which fields a value should display, by walking its represented
 * units coarsest first. The choice depends only on the unit and the calendar.
 * Rendering the chosen fields is left to the host Intl engine.
 */

import type { Fixed } from './fixed'
import { toDate } from './instant'
import { type Unit, UNITS, isRepresented, isTimeCarrying } from './unit'

export type Template =
  | { field: 'era'; style: 'abbreviated' }
  | { field: 'year'; style: 'naturalDigits' }
  | { field: 'month'; style: 'naturalName' }
  | { field: 'weekday'; style: 'naturalName' }
  | { field: 'day' | 'hour' | 'minute' | 'second'; style: 'naturalDigits' }
  | { field: 'fractionalSecond'; style: 'digits'; digits: number }
  | { field: 'timeZone'; style: 'shortSpecific' }

/** Calendars where a date is ambiguous without its era */
const ERA_RELEVANT_CALENDARS: ReadonlySet<string> = new Set(['japanese', 'roc', 'ethiopic', 'coptic'])

export function isEraRelevant(calendar: string): boolean {
  return ERA_RELEVANT_CALENDARS.has(calendar)
}

// ============================================================================
// Template Selection
// ============================================================================

export function naturalFormats(unit: Unit, calendar: string): Template[] {
  const templates: Template[] = []
  let hasTime = false

  for (const u of UNITS) {
    if (!isRepresented(unit, u)) continue
    hasTime ||= isTimeCarrying(u)
    switch (u) {
      case 'era':
        if (isEraRelevant(calendar)) templates.push({ field: 'era', style: 'abbreviated' })
        break
      case 'year':
        templates.push({ field: 'year', style: 'naturalDigits' })
        break
      case 'month':
        templates.push({ field: 'month', style: 'naturalName' })
        break
      case 'day':
        templates.push({ field: 'weekday', style: 'naturalName' })
        templates.push({ field: 'day', style: 'naturalDigits' })
        break
      case 'hour':
      case 'minute':
      case 'second':
        templates.push({ field: u, style: 'naturalDigits' })
        break
      case 'nanosecond':
        templates.push({ field: 'fractionalSecond', style: 'digits', digits: 4 })
        break
    }
  }

  if (hasTime) templates.push({ field: 'timeZone', style: 'shortSpecific' })
  return templates
}

// ============================================================================
// Intl Mapping
// ============================================================================

/** Intl renders at most three fractional digits */
function fractionDigits(digits: number): 1 | 2 | 3 {
  if (digits <= 1) return 1
  if (digits === 2) return 2
  return 3
}

export function intlOptions(templates: readonly Template[]): Intl.DateTimeFormatOptions {
  const options: Intl.DateTimeFormatOptions = {}
  for (const t of templates) {
    switch (t.field) {
      case 'era': options.era = 'short'; break
      case 'year': options.year = 'numeric'; break
      case 'month': options.month = 'long'; break
      case 'weekday': options.weekday = 'long'; break
      case 'day': options.day = 'numeric'; break
      case 'hour': options.hour = 'numeric'; break
      case 'minute': options.minute = '2-digit'; break
      case 'second': options.second = '2-digit'; break
      case 'fractionalSecond': options.fractionalSecondDigits = fractionDigits(t.digits); break
      case 'timeZone': options.timeZoneName = 'short'; break
    }
  }
  return options
}

/**
 * Localized natural rendering of a value in its own region. A value with
 * nothing to show, such as a Gregorian era, renders as the empty string.
 */
export function formatFixed<G extends Unit>(fixed: Fixed<G>): string {
  const { engine, locale, calendar } = fixed.region
  const templates = naturalFormats(fixed.unit, calendar)
  if (templates.length === 0) return ''

  const date = toDate(fixed.instant)
  if (templates.every((t) => t.field === 'era')) {
    // Intl pads a lone era with a default date, so render it beside a year and keep only the era
    const parts = engine.formatter(locale, { era: 'short', year: 'numeric' }).formatToParts(date)
    return parts
      .filter((part) => part.type === 'era')
      .map((part) => part.value)
      .join('')
  }
  return engine.formatter(locale, intlOptions(templates)).format(date)
}

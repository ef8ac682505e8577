/**
 * Segment 06: Natural Formatting Tests
 */

import { describe, it, expect } from 'vitest'
import { naturalFormats, intlOptions, formatFixed, isEraRelevant } from '../src/formatting'
import { fixedFromComponents, fixedFromInstant } from '../src/fixed'
import { at, must, paris, tokyo, utc } from './helpers/fixtures'

describe('naturalFormats', () => {
  it('shows every field of a minute plus the time zone', () => {
    const fields = naturalFormats('minute', 'gregory').map((t) => t.field)
    expect(fields).toEqual(['year', 'month', 'weekday', 'day', 'hour', 'minute', 'timeZone'])
  })

  it('omits the time zone for date-only values', () => {
    const fields = naturalFormats('day', 'gregory').map((t) => t.field)
    expect(fields).toEqual(['year', 'month', 'weekday', 'day'])
  })

  it('shows the era only where the calendar needs it', () => {
    expect(naturalFormats('year', 'japanese')).toEqual([
      { field: 'era', style: 'abbreviated' },
      { field: 'year', style: 'naturalDigits' },
    ])
    expect(naturalFormats('era', 'gregory')).toEqual([])
  })

  it('asks for four fractional digits at nanosecond granularity', () => {
    const templates = naturalFormats('nanosecond', 'gregory')
    expect(templates).toContainEqual({ field: 'fractionalSecond', style: 'digits', digits: 4 })
    expect(templates[templates.length - 1]).toEqual({ field: 'timeZone', style: 'shortSpecific' })
  })

  it('knows which calendars have meaningful eras', () => {
    expect(isEraRelevant('japanese')).toBe(true)
    expect(isEraRelevant('roc')).toBe(true)
    expect(isEraRelevant('gregory')).toBe(false)
  })
})

describe('intlOptions', () => {
  it('maps date templates to Intl fields', () => {
    expect(intlOptions(naturalFormats('day', 'gregory'))).toEqual({
      year: 'numeric',
      month: 'long',
      weekday: 'long',
      day: 'numeric',
    })
  })

  it('caps fractional digits at what Intl renders', () => {
    expect(intlOptions(naturalFormats('nanosecond', 'gregory')).fractionalSecondDigits).toBe(3)
  })

  it('adds a short time zone name for time-carrying values', () => {
    expect(intlOptions(naturalFormats('hour', 'gregory')).timeZoneName).toBe('short')
  })
})

describe('formatFixed', () => {
  it('renders a day in its own region', () => {
    const day = must(fixedFromComponents(paris, { year: 2023, month: 6, day: 26 }, 'day'))
    expect(formatFixed(day)).toBe('Monday, June 26, 2023')
  })

  it('renders the local date, not the UTC one', () => {
    const day = fixedFromInstant(paris, at('2023-06-25T23:30:00Z'), 'day')
    expect(formatFixed(day)).toBe('Monday, June 26, 2023')
  })

  it('renders an era value as the era name alone', () => {
    const era = fixedFromInstant(tokyo, at('2020-06-01T00:00:00Z'), 'era')
    const expected = new Intl.DateTimeFormat('ja-JP', {
      calendar: 'japanese',
      timeZone: 'Asia/Tokyo',
      era: 'short',
      year: 'numeric',
    })
      .formatToParts(new Date(Date.UTC(2020, 5, 1)))
      .find((part) => part.type === 'era')?.value
    expect(formatFixed(era)).toBe(expected)
    expect(formatFixed(era)).toBe('令和')
  })

  it('renders nothing for an era the calendar does not show', () => {
    expect(formatFixed(fixedFromInstant(utc, at('2020-06-01T00:00:00Z'), 'era'))).toBe('')
  })

  it('reuses formatters for the same options', () => {
    const first = paris.engine.formatter('en-US', { year: 'numeric' })
    expect(paris.engine.formatter('en-US', { year: 'numeric' })).toBe(first)
    expect(paris.engine.formatter('fr-FR', { year: 'numeric' })).not.toBe(first)
  })
})

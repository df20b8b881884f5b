// =============================================================================
// CalendarDate — Shared Value Object
// =============================================================================
//
// A plain year/month/day triple with no time of day and no time zone.
// Used by:
//   - Domain layer (a Birthday resolves to a CalendarDate)
//   - Use cases ("today" is read from the Clock and turned into a CalendarDate)
//
// Day arithmetic goes through epoch days (days since 1970-01-01), computed in
// UTC so that daylight-saving shifts never make a day 23 or 25 hours long.
//
import { Option, Schema } from "effect"

export const CalendarDate = Schema.Struct({
  year: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  month: Schema.Int.pipe(Schema.between(1, 12)),
  day: Schema.Int.pipe(Schema.between(1, 31))
})

export type CalendarDate = typeof CalendarDate.Type

const MS_PER_DAY = 86_400_000

// DD.MM.YYYY — day and month take one or two digits, the year exactly four
const DOTTED_DATE_PATTERN = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

export const daysInMonth = (year: number, month: number): number => {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28
    case 4:
    case 6:
    case 9:
    case 11:
      return 30
    default:
      return 31
  }
}

export const isValid = ({ day, month, year }: CalendarDate): boolean =>
  Number.isInteger(year) && year >= 1 &&
  Number.isInteger(month) && month >= 1 && month <= 12 &&
  Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month)

// -----------------------------------------------------------------------------
// parseDotted: "DD.MM.YYYY" → Option<CalendarDate>
// -----------------------------------------------------------------------------
// Absence means "not a date". Callers decide which error that becomes.
//
export const parseDotted = (text: string): Option.Option<CalendarDate> => {
  const match = DOTTED_DATE_PATTERN.exec(text)
  if (match === null) {
    return Option.none()
  }
  const date: CalendarDate = {
    day: Number(match[1]),
    month: Number(match[2]),
    year: Number(match[3])
  }
  return isValid(date) ? Option.some(date) : Option.none()
}

// Local calendar date of a JS Date (what the user calls "today")
export const fromDate = (date: Date): CalendarDate => ({
  year: date.getFullYear(),
  month: date.getMonth() + 1,
  day: date.getDate()
})

export const toEpochDay = ({ day, month, year }: CalendarDate): number => {
  const utc = new Date(0)
  // setUTCFullYear keeps years below 100 literal (Date.UTC would map 20 → 1920)
  utc.setUTCFullYear(year, month - 1, day)
  return Math.floor(utc.getTime() / MS_PER_DAY)
}

export const daysBetween = (from: CalendarDate, to: CalendarDate): number =>
  toEpochDay(to) - toEpochDay(from)

// -----------------------------------------------------------------------------
// anniversaryIn: re-anchor a month/day onto another year
// -----------------------------------------------------------------------------
// Feb 29 has no counterpart in a common year; it falls on March 1 instead.
// Always re-anchor from the original date so a Feb 29 that lands in a leap
// year stays on Feb 29.
//
export const anniversaryIn = (date: CalendarDate, year: number): CalendarDate =>
  date.month === 2 && date.day === 29 && !isLeapYear(year)
    ? { year, month: 3, day: 1 }
    : { year, month: date.month, day: date.day }

const pad = (value: number, width: number): string => String(value).padStart(width, "0")

// YYYY.MM.DD
export const format = ({ day, month, year }: CalendarDate): string =>
  `${pad(year, 4)}.${pad(month, 2)}.${pad(day, 2)}`

import { Option, Schema } from "effect"
import {
  type CalendarDate,
  anniversaryIn,
  daysBetween,
  format
} from "../../shared/CalendarDate.js"
import { ContactRecord, type ContactName } from "./ContactRecord.js"

// =============================================================================
// AddressBook
// =============================================================================
//
// name → ContactRecord, iterated in insertion order. Overwriting an existing
// name keeps the entry where it was (Map semantics), which is what the
// upcoming-birthday listing relies on for its ordering.
//
// Invariant: every key equals its record's name. `addRecord` is the only way
// in, and it always keys by `record.name`.
//
export type AddressBook = ReadonlyMap<string, ContactRecord>

export const empty: AddressBook = new Map()

export const addRecord = (book: AddressBook, record: ContactRecord): AddressBook => {
  const next = new Map(book)
  next.set(record.name, record)
  return next
}

// Absence is not an error here; use cases decide whether it is one
export const find = (book: AddressBook, name: string): Option.Option<ContactRecord> =>
  Option.fromNullable(book.get(name))

export const remove = (book: AddressBook, name: string): AddressBook => {
  if (!book.has(name)) {
    return book
  }
  const next = new Map(book)
  next.delete(name)
  return next
}

export const records = (book: AddressBook): ReadonlyArray<ContactRecord> => Array.from(book.values())

export const size = (book: AddressBook): number => book.size

// -----------------------------------------------------------------------------
// Persisted form
// -----------------------------------------------------------------------------
// A list of records. Decoding rebuilds the map from the names, so a file
// cannot break the key invariant; a repeated name keeps the last record.
//
export const schema = Schema.transform(
  Schema.Array(ContactRecord),
  Schema.ReadonlyMapFromSelf({
    key: Schema.String,
    value: Schema.typeSchema(ContactRecord)
  }),
  {
    strict: true,
    decode: (list) => list.reduce(addRecord, empty),
    encode: (book) => Array.from(book.values())
  }
)

// =============================================================================
// Upcoming birthdays
// =============================================================================

export interface UpcomingBirthday {
  readonly name: ContactName
  // YYYY.MM.DD of the occurrence, not of the birth
  readonly date: string
}

export const DEFAULT_WINDOW_DAYS = 7

// For each record with a birthday:
//   1. re-anchor the birthday onto today's year (the occurrence)
//   2. if that is already behind us, re-anchor onto next year
//   3. keep it when 0 <= occurrence - today <= windowDays
//
// Both ends are inclusive: a birthday today counts, and so does one exactly
// `windowDays` away. Output follows book order, not date order.
//
export const upcomingBirthdays = (
  book: AddressBook,
  today: CalendarDate,
  windowDays: number = DEFAULT_WINDOW_DAYS
): ReadonlyArray<UpcomingBirthday> => {
  const upcoming: Array<UpcomingBirthday> = []

  for (const record of book.values()) {
    if (Option.isNone(record.birthday)) {
      continue
    }
    const birthDate = record.birthday.value.date

    let occurrence = anniversaryIn(birthDate, today.year)
    if (daysBetween(today, occurrence) < 0) {
      occurrence = anniversaryIn(birthDate, today.year + 1)
    }

    const daysAway = daysBetween(today, occurrence)
    if (daysAway >= 0 && daysAway <= windowDays) {
      upcoming.push({ name: record.name, date: format(occurrence) })
    }
  }

  return upcoming
}

import { Either, Option, Schema } from "effect"
import { Birthday } from "./Birthday.js"
import { NotFoundError, PHONE_NOT_FOUND, ValidationError } from "./Errors.js"
import { PhoneNumber } from "./PhoneNumber.js"

// =============================================================================
// ContactName
// =============================================================================
//
// The unique key of a contact. Any non-empty text is accepted as-is; no
// trimming, no case folding. "alice" and "Alice" are different contacts.
//
export const EMPTY_NAME_MESSAGE = "Contact name must not be empty"

export const ContactName = Schema.String.pipe(
  Schema.filter((s) => s.length > 0, { message: () => EMPTY_NAME_MESSAGE }),
  Schema.brand("ContactName")
)
export type ContactName = typeof ContactName.Type

// =============================================================================
// ContactRecord (one contact)
// =============================================================================
//
// The data is a plain immutable struct; behavior lives in the functions below.
// Each "mutation" returns a new record, so a rejected change leaves the caller
// holding the untouched original.
//
//   name     — fixed at creation
//   phones   — insertion order, duplicates allowed
//   birthday — at most one, replaced on every set
//
export const ContactRecord = Schema.Struct({
  name: ContactName,
  phones: Schema.Array(PhoneNumber.schema),
  birthday: Schema.OptionFromNullOr(Birthday.schema)
})
export type ContactRecord = typeof ContactRecord.Type

// -----------------------------------------------------------------------------
// Construction
// -----------------------------------------------------------------------------

export const make = (name: string): Either.Either<ContactRecord, ValidationError> =>
  Schema.decodeUnknownEither(ContactName)(name).pipe(
    Either.mapLeft(() => ValidationError(EMPTY_NAME_MESSAGE)),
    Either.map((contactName) => ({
      name: contactName,
      phones: [],
      birthday: Option.none()
    }))
  )

// -----------------------------------------------------------------------------
// Phones
// -----------------------------------------------------------------------------

export const addPhone = (
  record: ContactRecord,
  raw: string
): Either.Either<ContactRecord, ValidationError> =>
  Either.map(PhoneNumber.decode(raw), (phone) => ({
    ...record,
    phones: [...record.phones, phone]
  }))

// Removes every phone equal to `raw`; no match is not an error
export const removePhone = (record: ContactRecord, raw: string): ContactRecord => ({
  ...record,
  phones: record.phones.filter((phone) => phone !== raw)
})

// Replaces the FIRST phone equal to `oldRaw`. The lookup happens before the
// new value is validated, so an unknown old phone reports NotFound even when
// the new value is also invalid.
export const editPhone = (
  record: ContactRecord,
  oldRaw: string,
  newRaw: string
): Either.Either<ContactRecord, ValidationError | NotFoundError> => {
  const index = record.phones.findIndex((phone) => phone === oldRaw)
  if (index === -1) {
    return Either.left(NotFoundError(PHONE_NOT_FOUND))
  }
  return Either.map(PhoneNumber.decode(newRaw), (phone) => ({
    ...record,
    phones: record.phones.map((current, i) => (i === index ? phone : current))
  }))
}

// -----------------------------------------------------------------------------
// Birthday
// -----------------------------------------------------------------------------

export const setBirthday = (
  record: ContactRecord,
  raw: string
): Either.Either<ContactRecord, ValidationError> =>
  Either.map(Birthday.decode(raw), (birthday) => ({
    ...record,
    birthday: Option.some(birthday)
  }))

// -----------------------------------------------------------------------------
// Rendering
// -----------------------------------------------------------------------------

export const renderPhones = (record: ContactRecord): string => record.phones.join("; ")

// Contact name: Alice, phones: 1234567890; 0987654321
export const render = (record: ContactRecord): string =>
  `Contact name: ${record.name}, phones: ${renderPhones(record)}`

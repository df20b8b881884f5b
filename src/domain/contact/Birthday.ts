// =============================================================================
// Birthday — Value Object
// =============================================================================
//
// Carries both the text the user typed ("05.03.1990") and the calendar date it
// resolves to. Rendering gives back the text as typed, never a reformatted
// date: "5.3.1990" stays "5.3.1990".
//
// SCHEMA:
// `Birthday.schema` is a transformation string <-> Birthday. Decoding parses
// the text; encoding returns `raw`. Persisted contacts therefore store exactly
// the original text.
//
import { Either, Option, ParseResult, Schema } from "effect"
import { CalendarDate, parseDotted } from "../../shared/CalendarDate.js"
import { ValidationError } from "./Errors.js"

export const INVALID_BIRTHDAY_MESSAGE = "Invalid date format. Use DD.MM.YYYY"

const BirthdayValue = Schema.Struct({
  raw: Schema.String,
  date: CalendarDate
})

export type Birthday = typeof BirthdayValue.Type

const BirthdayFromString = Schema.transformOrFail(Schema.String, BirthdayValue, {
  strict: true,
  decode: (raw, _options, ast) =>
    Option.match(parseDotted(raw), {
      onNone: () => ParseResult.fail(new ParseResult.Type(ast, raw, INVALID_BIRTHDAY_MESSAGE)),
      onSome: (date) => ParseResult.succeed({ raw, date })
    }),
  encode: (birthday) => ParseResult.succeed(birthday.raw)
})

export const Birthday = {
  schema: BirthdayFromString,
  make: (raw: string): Birthday => Schema.decodeSync(BirthdayFromString)(raw),
  decode: (raw: string): Either.Either<Birthday, ValidationError> =>
    Schema.decodeUnknownEither(BirthdayFromString)(raw).pipe(
      Either.mapLeft(() => ValidationError(INVALID_BIRTHDAY_MESSAGE))
    ),
  render: (birthday: Birthday): string => birthday.raw
}

// =============================================================================
// PhoneNumber — Value Object
// =============================================================================
//
// Exactly ten ASCII digits. A branded string: at runtime it is the digits
// themselves, so rendering a PhoneNumber is rendering the string.
//
// There is no setter. Replacing a phone means decoding the new text first and
// swapping values only on success (see ContactRecord.editPhone).
//
import { Either, Schema } from "effect"
import { ValidationError } from "./Errors.js"

export const INVALID_PHONE_MESSAGE = "Invalid phone format"

const PHONE_PATTERN = /^\d{10}$/

const PhoneNumberSchema = Schema.String.pipe(
  Schema.pattern(PHONE_PATTERN, {
    message: () => INVALID_PHONE_MESSAGE
  }),
  Schema.brand("PhoneNumber")
)

export type PhoneNumber = typeof PhoneNumberSchema.Type

// Companion object: schema plus smart constructors
export const PhoneNumber = {
  schema: PhoneNumberSchema,
  // Throws on invalid input; for trusted text such as test fixtures
  make: (raw: string): PhoneNumber => Schema.decodeSync(PhoneNumberSchema)(raw),
  decode: (raw: string): Either.Either<PhoneNumber, ValidationError> =>
    Schema.decodeUnknownEither(PhoneNumberSchema)(raw).pipe(
      Either.mapLeft(() => ValidationError(INVALID_PHONE_MESSAGE))
    )
}

// =============================================================================
// RemovePhone Use Case — `remove-phone <name> <phone>`
// =============================================================================
//
// Drops every copy of the phone. Removing a phone the contact does not have
// is a silent no-op at the record level; here it still answers "Phone
// removed." because the end state is the one asked for.
//
import { Effect, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import * as ContactRecord from "../domain/contact/ContactRecord.js"
import { type ArgumentCountError, ContactNotFound, type NotFoundError } from "../domain/contact/Errors.js"
import { requireArguments } from "./Arguments.js"

export const PHONE_REMOVED = "Phone removed."

export type RemovePhoneError = ArgumentCountError | NotFoundError

export const removePhone = (
  args: ReadonlyArray<string>
): Effect.Effect<string, RemovePhoneError, ContactBook> =>
  Effect.gen(function* () {
    const [name, phone] = yield* requireArguments("remove-phone", args, 2)

    const book = yield* ContactBook
    const existing = yield* book.find(name)
    if (Option.isNone(existing)) {
      return yield* Effect.fail(ContactNotFound())
    }

    yield* book.put(ContactRecord.removePhone(existing.value, phone))
    return PHONE_REMOVED
  })

// =============================================================================
// ChangeContact Use Case — `change <name> <old phone> <new phone>`
// =============================================================================
//
// Replaces the first matching phone in place; the other phones keep their
// positions. Unknown contact and unknown old phone are both NotFoundError,
// with different messages.
//
import { Effect, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import * as ContactRecord from "../domain/contact/ContactRecord.js"
import {
  type ArgumentCountError,
  ContactNotFound,
  type NotFoundError,
  type ValidationError
} from "../domain/contact/Errors.js"
import { requireArguments } from "./Arguments.js"
import { CONTACT_UPDATED } from "./AddContact.js"

export type ChangeContactError = ArgumentCountError | NotFoundError | ValidationError

export const changeContact = (
  args: ReadonlyArray<string>
): Effect.Effect<string, ChangeContactError, ContactBook> =>
  Effect.gen(function* () {
    const [name, oldPhone, newPhone] = yield* requireArguments("change", args, 3)

    const book = yield* ContactBook
    const existing = yield* book.find(name)
    if (Option.isNone(existing)) {
      return yield* Effect.fail(ContactNotFound())
    }

    const updated = yield* ContactRecord.editPhone(existing.value, oldPhone, newPhone)
    yield* book.put(updated)

    return CONTACT_UPDATED
  })

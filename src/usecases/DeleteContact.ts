// =============================================================================
// DeleteContact Use Case — `delete <name>`
// =============================================================================
//
// The book's own delete is a no-op for unknown names; the command reports
// them, so a typo does not look like a successful delete.
//
import { Effect, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import { type ArgumentCountError, ContactNotFound, type NotFoundError } from "../domain/contact/Errors.js"
import { requireArguments } from "./Arguments.js"

export const CONTACT_DELETED = "Contact deleted."

export type DeleteContactError = ArgumentCountError | NotFoundError

export const deleteContact = (
  args: ReadonlyArray<string>
): Effect.Effect<string, DeleteContactError, ContactBook> =>
  Effect.gen(function* () {
    const [name] = yield* requireArguments("delete", args, 1)

    const book = yield* ContactBook
    const existing = yield* book.find(name)
    if (Option.isNone(existing)) {
      return yield* Effect.fail(ContactNotFound())
    }

    yield* book.remove(name)
    return CONTACT_DELETED
  })

// =============================================================================
// ShowBirthday Use Case — `show-birthday <name>`
// =============================================================================
//
// READ-ONLY. A contact without a birthday is not an error: the result is
// Option.none() and the shell says so.
//
import { Effect, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import type { Birthday } from "../domain/contact/Birthday.js"
import { type ArgumentCountError, ContactNotFound, type NotFoundError } from "../domain/contact/Errors.js"
import { requireArguments } from "./Arguments.js"

export type ShowBirthdayError = ArgumentCountError | NotFoundError

export const showBirthday = (
  args: ReadonlyArray<string>
): Effect.Effect<Option.Option<Birthday>, ShowBirthdayError, ContactBook> =>
  Effect.gen(function* () {
    const [name] = yield* requireArguments("show-birthday", args, 1)

    const book = yield* ContactBook
    const existing = yield* book.find(name)
    if (Option.isNone(existing)) {
      return yield* Effect.fail(ContactNotFound())
    }
    return existing.value.birthday
  })

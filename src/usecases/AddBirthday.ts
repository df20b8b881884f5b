// =============================================================================
// AddBirthday Use Case — `add-birthday <name> <DD.MM.YYYY>`
// =============================================================================
//
// Sets the contact's birthday, replacing any earlier one. The contact must
// already exist: this command never creates one.
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

export const BIRTHDAY_ADDED = "Birthday added."

export type AddBirthdayError = ArgumentCountError | NotFoundError | ValidationError

export const addBirthday = (
  args: ReadonlyArray<string>
): Effect.Effect<string, AddBirthdayError, ContactBook> =>
  Effect.gen(function* () {
    const [name, birthday] = yield* requireArguments("add-birthday", args, 2)

    const book = yield* ContactBook
    const existing = yield* book.find(name)
    if (Option.isNone(existing)) {
      return yield* Effect.fail(ContactNotFound())
    }

    const updated = yield* ContactRecord.setBirthday(existing.value, birthday)
    yield* book.put(updated)

    return BIRTHDAY_ADDED
  })

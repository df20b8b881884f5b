// =============================================================================
// ShowPhone Use Case — `phone <name>`
// =============================================================================
//
// READ-ONLY. Returns the whole record; the shell renders its phones in
// stored order.
//
import { Effect, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import type { ContactRecord } from "../domain/contact/ContactRecord.js"
import { type ArgumentCountError, ContactNotFound, type NotFoundError } from "../domain/contact/Errors.js"
import { requireArguments } from "./Arguments.js"

export type ShowPhoneError = ArgumentCountError | NotFoundError

export const showPhone = (
  args: ReadonlyArray<string>
): Effect.Effect<ContactRecord, ShowPhoneError, ContactBook> =>
  Effect.gen(function* () {
    const [name] = yield* requireArguments("phone", args, 1)

    const book = yield* ContactBook
    const existing = yield* book.find(name)
    if (Option.isNone(existing)) {
      return yield* Effect.fail(ContactNotFound())
    }
    return existing.value
  })

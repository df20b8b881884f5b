// =============================================================================
// AddContact Use Case — `add <name> <phone>`
// =============================================================================
//
// ORCHESTRATION:
//   1. Check arguments
//   2. Look the contact up; create it when missing
//   3. Append the phone (validation happens here, before anything is stored)
//   4. Store the record
//
// One command covers both "new contact" and "another phone for an existing
// contact"; the message tells which one happened.
//
import { Effect, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import * as ContactRecord from "../domain/contact/ContactRecord.js"
import type { ArgumentCountError, ValidationError } from "../domain/contact/Errors.js"
import { requireArguments } from "./Arguments.js"

export const CONTACT_ADDED = "Contact added."
export const CONTACT_UPDATED = "Contact updated."

export type AddContactError = ArgumentCountError | ValidationError

export const addContact = (
  args: ReadonlyArray<string>
): Effect.Effect<string, AddContactError, ContactBook> =>
  Effect.gen(function* () {
    const [name, phone] = yield* requireArguments("add", args, 2)

    const book = yield* ContactBook
    const existing = yield* book.find(name)

    // A rejected phone must not leave an empty new contact behind, so the
    // record is only stored once the phone is in
    const record = Option.isSome(existing) ? existing.value : yield* ContactRecord.make(name)
    const updated = yield* ContactRecord.addPhone(record, phone)
    yield* book.put(updated)

    return Option.isSome(existing) ? CONTACT_UPDATED : CONTACT_ADDED
  })

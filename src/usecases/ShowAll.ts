// =============================================================================
// ShowAll Use Case — `all`
// =============================================================================
//
// READ-ONLY. Every record, in the order contacts were first added.
//
import { Effect } from "effect"
import { ContactBook } from "../ContactBook.js"
import * as AddressBook from "../domain/contact/AddressBook.js"
import type { ContactRecord } from "../domain/contact/ContactRecord.js"

export const showAll = (): Effect.Effect<ReadonlyArray<ContactRecord>, never, ContactBook> =>
  Effect.gen(function* () {
    const book = yield* ContactBook
    return AddressBook.records(yield* book.get)
  })

// =============================================================================
// ContactBook — the live address book
// =============================================================================
//
// The one AddressBook value the running program works on, held in a Ref.
// Use cases read it with `get`/`find` and replace records with `put`/`remove`;
// the domain functions themselves stay pure.
//
// Two ways to build it:
//   - makeContactBookLayer(book)  — from a given book (tests)
//   - ContactBookFromStore        — loaded from the ContactStore (the program)
//
import { Context, Effect, Layer, Option, Ref } from "effect"
import * as AddressBook from "./domain/contact/AddressBook.js"
import type { ContactRecord } from "./domain/contact/ContactRecord.js"
import { ContactStore } from "./ContactStore.js"

// =============================================================================
// ContactBook Service Interface
// =============================================================================

export interface ContactBookService {
  readonly get: Effect.Effect<AddressBook.AddressBook>
  // Lookup — Option, absence is not an error
  readonly find: (name: string) => Effect.Effect<Option.Option<ContactRecord>>
  // Insert, or overwrite the record with the same name
  readonly put: (record: ContactRecord) => Effect.Effect<void>
  // No-op when the name is unknown
  readonly remove: (name: string) => Effect.Effect<void>
}

export class ContactBook extends Context.Tag("ContactBook")<ContactBook, ContactBookService>() {}

// =============================================================================
// Implementation (Ref-backed)
// =============================================================================

const makeContactBook = (ref: Ref.Ref<AddressBook.AddressBook>): ContactBookService => ({
  get: Ref.get(ref),

  find: (name) =>
    Ref.get(ref).pipe(
      Effect.map((book) => AddressBook.find(book, name))
    ),

  put: (record) => Ref.update(ref, (book) => AddressBook.addRecord(book, record)),

  remove: (name) => Ref.update(ref, (book) => AddressBook.remove(book, name))
})

// Layer.effect runs Ref.make on every provide: each test gets its own book
export const makeContactBookLayer = (
  initial: AddressBook.AddressBook = AddressBook.empty
): Layer.Layer<ContactBook> =>
  Layer.effect(
    ContactBook,
    Ref.make(initial).pipe(Effect.map(makeContactBook))
  )

export const ContactBookFromStore = Layer.effect(
  ContactBook,
  Effect.gen(function* () {
    const store = yield* ContactStore
    const book = yield* store.load
    yield* Effect.logInfo("Address book loaded").pipe(
      Effect.annotateLogs("contacts", AddressBook.size(book))
    )
    const ref = yield* Ref.make(book)
    return makeContactBook(ref)
  })
)

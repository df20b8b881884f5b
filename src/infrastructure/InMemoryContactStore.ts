// =============================================================================
// InMemoryContactStore — Adapter Implementation
// =============================================================================
//
// A ContactStore that never touches the disk. Starts from a given book
// (empty by default) and remembers every save, so tests can assert on what the
// shell persisted.
//
import { Effect, Layer, Option } from "effect"
import { ContactStore, type ContactStoreService } from "../ContactStore.js"
import * as AddressBook from "../domain/contact/AddressBook.js"

export interface InMemoryContactStore {
  readonly service: ContactStoreService
  // Most recent save, if any
  readonly lastSaved: () => Option.Option<AddressBook.AddressBook>
  readonly saveCount: () => number
}

export const makeInMemoryContactStore = (
  initial: AddressBook.AddressBook = AddressBook.empty
): InMemoryContactStore => {
  let stored = initial
  let saved: Option.Option<AddressBook.AddressBook> = Option.none()
  let count = 0

  const service: ContactStoreService = {
    load: Effect.sync(() => stored),
    save: (book) =>
      Effect.sync(() => {
        stored = book
        saved = Option.some(book)
        count += 1
      })
  }

  return {
    service,
    lastSaved: () => saved,
    saveCount: () => count
  }
}

// Layer.sync: a fresh store for every provide
export const InMemoryContactStoreLive = Layer.sync(
  ContactStore,
  () => makeInMemoryContactStore().service
)

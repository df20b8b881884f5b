// =============================================================================
// ContactStore — The Port (Interface)
// =============================================================================
//
// HEXAGONAL ARCHITECTURE:
// The persistence port. The application depends on this; adapters in
// infrastructure/ decide HOW the address book reaches the disk (JSON file) or
// stays in memory (tests).
//
// WHOLE-STRUCTURE PERSISTENCE:
// No partial writes. `load` returns the entire book once at startup, `save`
// overwrites the entire previous state at shutdown.
//
import type { Effect } from "effect"
import { Context } from "effect"
import type { AddressBook } from "./domain/contact/AddressBook.js"

// =============================================================================
// ContactStore Errors
// =============================================================================
//
// Reading or writing failed (I/O error, or a file that does not decode as an
// address book). Not a command error: it never reaches the user as a
// "please try again" message.
//
export type ContactStoreError = {
  readonly _tag: "ContactStoreError"
  readonly message: string
  readonly cause?: unknown
}

export const ContactStoreError = (message: string, cause?: unknown): ContactStoreError => ({
  _tag: "ContactStoreError",
  message,
  cause
})

// =============================================================================
// ContactStore Service
// =============================================================================

export interface ContactStoreService {
  /**
   * Load the whole address book.
   * No prior state is not an error: it loads as an empty book.
   */
  readonly load: Effect.Effect<AddressBook, ContactStoreError>

  /**
   * Replace the previously saved state with `book`.
   */
  readonly save: (book: AddressBook) => Effect.Effect<void, ContactStoreError>
}

export class ContactStore extends Context.Tag("ContactStore")<
  ContactStore,
  ContactStoreService
>() {}

// =============================================================================
// JsonFileContactStore — Adapter Implementation
// =============================================================================
//
// HEXAGONAL ARCHITECTURE:
// A ContactStore that keeps the address book in one JSON file.
//
// FORMAT:
//   [
//     { "name": "Alice", "phones": ["1234567890"], "birthday": "29.02.2020" },
//     { "name": "Bob", "phones": [], "birthday": null }
//   ]
// Produced and read by `Schema.parseJson(AddressBook.schema)`, so the file
// round-trips every field: name, phones in order, birthday as typed.
//
// WRITES:
// The new content goes to `<file>.tmp` first and is renamed over the target,
// so an interrupted save never leaves a half-written book behind.
//
import { FileSystem } from "@effect/platform"
import { Effect, Layer, Schema } from "effect"
import { AppConfig } from "../Config.js"
import { ContactStore, ContactStoreError, type ContactStoreService } from "../ContactStore.js"
import * as AddressBook from "../domain/contact/AddressBook.js"

const AddressBookJson = Schema.parseJson(AddressBook.schema, { space: 2 })

// =============================================================================
// Factory
// =============================================================================

export const makeJsonFileContactStore = (
  filePath: string
): Effect.Effect<ContactStoreService, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    // -------------------------------------------------------------------------
    // load: missing file → empty book
    // -------------------------------------------------------------------------
    const load = Effect.gen(function* () {
      const exists = yield* fs.exists(filePath).pipe(
        Effect.mapError((cause) => ContactStoreError(`Cannot access ${filePath}`, cause))
      )
      if (!exists) {
        yield* Effect.logDebug("No contacts file yet, starting with an empty book")
        return AddressBook.empty
      }
      const text = yield* fs.readFileString(filePath).pipe(
        Effect.mapError((cause) => ContactStoreError(`Cannot read ${filePath}`, cause))
      )
      return yield* Schema.decodeUnknown(AddressBookJson)(text).pipe(
        Effect.mapError((cause) => ContactStoreError(`${filePath} is not a valid contacts file`, cause))
      )
    }).pipe(Effect.annotateLogs("file", filePath))

    // -------------------------------------------------------------------------
    // save: write to a temp file, then rename over the target
    // -------------------------------------------------------------------------
    const save = (book: AddressBook.AddressBook) =>
      Effect.gen(function* () {
        const text = yield* Schema.encode(AddressBookJson)(book).pipe(
          // Every value in a book was decoded by the same schema; encoding back cannot fail
          Effect.orDie
        )
        const tempPath = `${filePath}.tmp`
        yield* fs.writeFileString(tempPath, text).pipe(
          Effect.mapError((cause) => ContactStoreError(`Cannot write ${tempPath}`, cause))
        )
        yield* fs.rename(tempPath, filePath).pipe(
          Effect.mapError((cause) => ContactStoreError(`Cannot replace ${filePath}`, cause))
        )
        yield* Effect.logInfo("Address book saved").pipe(
          Effect.annotateLogs("contacts", AddressBook.size(book))
        )
      }).pipe(Effect.annotateLogs("file", filePath))

    return { load, save }
  })

// =============================================================================
// Layer: file path from AppConfig
// =============================================================================

export const JsonFileContactStoreLive = Layer.effect(
  ContactStore,
  Effect.gen(function* () {
    const config = yield* AppConfig
    return yield* makeJsonFileContactStore(config.contactsFile)
  })
)

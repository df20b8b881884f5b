import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"
import { ContactBook, makeContactBookLayer } from "../../src/ContactBook.js"
import { CONTACT_NOT_FOUND, PHONE_NOT_FOUND } from "../../src/domain/contact/Errors.js"
import { INVALID_PHONE_MESSAGE } from "../../src/domain/contact/PhoneNumber.js"
import { CONTACT_UPDATED } from "../../src/usecases/AddContact.js"
import { changeContact } from "../../src/usecases/ChangeContact.js"
import { bookOf, contact } from "../fixtures/contacts.js"

const BookWithAlice = makeContactBookLayer(
  bookOf(contact("Alice", ["1112223334", "1234567890", "1112223334"]))
)

const alicePhones = Effect.flatMap(ContactBook, (book) => book.find("Alice")).pipe(
  Effect.map(Option.map((record) => record.phones))
)

describe("changeContact", () => {
  it.effect("replaces the first matching phone in place", () =>
    Effect.gen(function* () {
      const message = yield* changeContact(["Alice", "1112223334", "0987654321"])

      expect(message).toBe(CONTACT_UPDATED)
      expect(yield* alicePhones).toEqual(Option.some(["0987654321", "1234567890", "1112223334"]))
    }).pipe(Effect.provide(BookWithAlice))
  )

  it.effect("unknown contact → NotFoundError", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(changeContact(["Bob", "1112223334", "0987654321"]))

      expect(error).toEqual({ _tag: "NotFoundError", message: CONTACT_NOT_FOUND })
    }).pipe(Effect.provide(BookWithAlice))
  )

  it.effect("unknown old phone → NotFoundError, even with an invalid new phone", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(changeContact(["Alice", "5555555555", "bad"]))

      expect(error).toEqual({ _tag: "NotFoundError", message: PHONE_NOT_FOUND })
    }).pipe(Effect.provide(BookWithAlice))
  )

  it.effect("invalid new phone → ValidationError, phones unchanged", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(changeContact(["Alice", "1234567890", "123"]))

      expect(error).toEqual({ _tag: "ValidationError", message: INVALID_PHONE_MESSAGE })
      expect(yield* alicePhones).toEqual(Option.some(["1112223334", "1234567890", "1112223334"]))
    }).pipe(Effect.provide(BookWithAlice))
  )

  it.effect("too few arguments → ArgumentCountError", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(changeContact(["Alice", "1112223334"]))

      expect(error).toEqual({ _tag: "ArgumentCountError", command: "change", expected: 3, received: 2 })
    }).pipe(Effect.provide(BookWithAlice))
  )
})

// =============================================================================
// Shell: dispatch and the full loop
// =============================================================================
//
// dispatch is tested one line at a time against an in-memory book; runShell
// with a scripted UI and an in-memory store, so the whole session (greeting,
// answers, save, goodbye) is observable.
//
import { describe, expect, it } from "@effect/vitest"
import { Deferred, Effect, Fiber, Layer, Option, TestClock } from "effect"
import {
  dispatch,
  EMPTY_BOOK,
  GOOD_BYE,
  GREETING,
  INVALID_COMMAND,
  NO_BIRTHDAY,
  NO_UPCOMING_BIRTHDAYS,
  PROMPT,
  runShell,
  WELCOME
} from "../../src/cli/Shell.js"
import { ENTER_CORRECT_INFORMATION } from "../../src/cli/CommandResult.js"
import { makeContactBookLayer } from "../../src/ContactBook.js"
import { ContactStore } from "../../src/ContactStore.js"
import * as AddressBook from "../../src/domain/contact/AddressBook.js"
import { INVALID_BIRTHDAY_MESSAGE } from "../../src/domain/contact/Birthday.js"
import { CONTACT_NOT_FOUND, PHONE_NOT_FOUND } from "../../src/domain/contact/Errors.js"
import { INVALID_PHONE_MESSAGE } from "../../src/domain/contact/PhoneNumber.js"
import { makeInMemoryContactStore } from "../../src/infrastructure/InMemoryContactStore.js"
import { makeScriptedUserInterface } from "../../src/infrastructure/TerminalUserInterface.js"
import { UserInterface, type UserInterfaceService } from "../../src/UserInterface.js"
import { bookOf, contact } from "../fixtures/contacts.js"

const linesOf = (line: string) => Effect.map(dispatch(line), (step) => step.lines)

describe("dispatch", () => {
  const layer = () =>
    makeContactBookLayer(bookOf(contact("Alice", ["1234567890"], "26.10.1990"), contact("Bob")))

  it.effect("hello → greeting, blank → nothing", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("hello")).toEqual([GREETING])
      expect(yield* linesOf("HeLLo")).toEqual([GREETING])
      expect(yield* linesOf("   ")).toEqual([])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("close and exit end the session", () =>
    Effect.gen(function* () {
      expect(yield* dispatch("close")).toEqual({ lines: [], exit: true })
      expect(yield* dispatch("exit")).toEqual({ lines: [], exit: true })
      expect((yield* dispatch("hello")).exit).toBe(false)
    }).pipe(Effect.provide(layer()))
  )

  it.effect("unknown command → invalid command", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("fly Alice")).toEqual([INVALID_COMMAND])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("command errors become messages", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("add Carol 123")).toEqual([INVALID_PHONE_MESSAGE])
      expect(yield* linesOf("add Carol")).toEqual([ENTER_CORRECT_INFORMATION])
      expect(yield* linesOf("phone Carol")).toEqual([CONTACT_NOT_FOUND])
      expect(yield* linesOf("change Alice 5555555555 0987654321")).toEqual([PHONE_NOT_FOUND])
      expect(yield* linesOf("add-birthday Alice 1990-10-26")).toEqual([INVALID_BIRTHDAY_MESSAGE])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("phone joins the numbers with '; '", () =>
    Effect.gen(function* () {
      yield* dispatch("add Alice 0987654321")

      expect(yield* linesOf("phone Alice")).toEqual(["1234567890; 0987654321"])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("all renders one line per contact", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("all")).toEqual([
        "Contact name: Alice, phones: 1234567890",
        "Contact name: Bob, phones: "
      ])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("all on an empty book says so", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("all")).toEqual([EMPTY_BOOK])
    }).pipe(Effect.provide(makeContactBookLayer()))
  )

  it.effect("show-birthday prints the text as typed, or that none is set", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("show-birthday Alice")).toEqual(["26.10.1990"])
      expect(yield* linesOf("show-birthday Bob")).toEqual([NO_BIRTHDAY])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("birthdays lists name and date, or that there are none", () =>
    Effect.gen(function* () {
      yield* TestClock.setTime(new Date(2026, 9, 19, 12).getTime())

      expect(yield* linesOf("birthdays")).toEqual(["Alice: 2026.10.26"])
      expect(yield* linesOf("birthdays 3")).toEqual([NO_UPCOMING_BIRTHDAYS])
      expect(yield* linesOf("birthdays soon")).toEqual(["Invalid number of days"])
    }).pipe(Effect.provide(layer()))
  )

  it.effect("remove-phone and delete", () =>
    Effect.gen(function* () {
      expect(yield* linesOf("remove-phone Alice 1234567890")).toEqual(["Phone removed."])
      expect(yield* linesOf("phone Alice")).toEqual([""])
      expect(yield* linesOf("delete Bob")).toEqual(["Contact deleted."])
      expect(yield* linesOf("delete Bob")).toEqual([CONTACT_NOT_FOUND])
    }).pipe(Effect.provide(layer()))
  )
})

describe("runShell", () => {
  const session = (script: ReadonlyArray<string>) => {
    const ui = makeScriptedUserInterface(script)
    const store = makeInMemoryContactStore()
    const layer = Layer.mergeAll(
      makeContactBookLayer(),
      Layer.succeed(ContactStore, store.service),
      Layer.succeed(UserInterface, ui.service)
    )
    return { ui, store, run: runShell.pipe(Effect.provide(layer)) }
  }

  it.effect("runs a whole session and saves on exit", () =>
    Effect.gen(function* () {
      const { run, store, ui } = session([
        "hello",
        "add Alice 1234567890",
        "add Alice 0987654321",
        "change Alice 1234567890 1112223334",
        "phone Alice",
        "add-birthday Alice 29.02.2020",
        "show-birthday Alice",
        "all",
        "exit",
        "hello"
      ])

      yield* run

      expect(ui.getOutput()).toEqual([
        WELCOME,
        GREETING,
        "Contact added.",
        "Contact updated.",
        "Contact updated.",
        "1112223334; 0987654321",
        "Birthday added.",
        "29.02.2020",
        "Contact name: Alice, phones: 1112223334; 0987654321",
        GOOD_BYE
      ])
      expect(ui.getPrompts()).toEqual(Array.from({ length: 9 }, () => PROMPT))
      expect(store.saveCount()).toBe(1)
      const saved = Option.getOrThrow(store.lastSaved())
      expect(Option.map(AddressBook.find(saved, "Alice"), (r) => r.phones)).toEqual(
        Option.some(["1112223334", "0987654321"])
      )
    })
  )

  it.effect("end of input also saves and says goodbye", () =>
    Effect.gen(function* () {
      const { run, store, ui } = session(["add Bob 5555555555"])

      yield* run

      expect(ui.getOutput()).toEqual([WELCOME, "Contact added.", GOOD_BYE])
      expect(store.saveCount()).toBe(1)
      expect(Option.map(store.lastSaved(), AddressBook.size)).toEqual(Option.some(1))
    })
  )

  it.effect("interrupted while waiting for input → still saves and says goodbye", () =>
    Effect.gen(function* () {
      const scripted = makeScriptedUserInterface(["add Alice 1234567890"])
      const waiting = yield* Deferred.make<void>()
      // After the script, block like a terminal with no input yet
      const blocking: UserInterfaceService = {
        displayMessage: scripted.service.displayMessage,
        readLine: (prompt) =>
          scripted.service.readLine(prompt).pipe(
            Effect.flatMap(Option.match({
              onNone: () => Deferred.succeed(waiting, undefined).pipe(Effect.zipRight(Effect.never)),
              onSome: (line) => Effect.succeed(Option.some(line))
            }))
          )
      }
      const store = makeInMemoryContactStore()
      const layer = Layer.mergeAll(
        makeContactBookLayer(),
        Layer.succeed(ContactStore, store.service),
        Layer.succeed(UserInterface, blocking)
      )

      const fiber = yield* Effect.fork(runShell.pipe(Effect.provide(layer)))
      yield* Deferred.await(waiting)
      yield* Fiber.interrupt(fiber)

      expect(scripted.getOutput()).toEqual([WELCOME, "Contact added.", GOOD_BYE])
      expect(store.saveCount()).toBe(1)
      expect(Option.map(store.lastSaved(), (book) => AddressBook.records(book).map((r) => r.name))).toEqual(
        Option.some(["Alice"])
      )
    })
  )
})

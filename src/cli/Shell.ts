// =============================================================================
// Shell — the read-eval-print loop
// =============================================================================
//
// dispatch(line): parse one line, run the matching use case, render the answer.
// runShell:       greet, loop over dispatch until close/exit or end of input,
//                 then save the book.
//
// The shell is the only place that knows about command words and message
// text for lists; use cases return data and tagged errors.
//
import { Effect, Exit, Option } from "effect"
import { ContactBook } from "../ContactBook.js"
import { ContactStore, type ContactStoreError } from "../ContactStore.js"
import { Birthday } from "../domain/contact/Birthday.js"
import * as ContactRecord from "../domain/contact/ContactRecord.js"
import type { ContactError } from "../domain/contact/Errors.js"
import { UserInterface } from "../UserInterface.js"
import { addBirthday } from "../usecases/AddBirthday.js"
import { addContact } from "../usecases/AddContact.js"
import { changeContact } from "../usecases/ChangeContact.js"
import { deleteContact } from "../usecases/DeleteContact.js"
import { removePhone } from "../usecases/RemovePhone.js"
import { showAll } from "../usecases/ShowAll.js"
import { showBirthday } from "../usecases/ShowBirthday.js"
import { showPhone } from "../usecases/ShowPhone.js"
import { upcomingBirthdays } from "../usecases/UpcomingBirthdays.js"
import { renderResult, toCommandResult } from "./CommandResult.js"
import { parseInput } from "./parseInput.js"

export const WELCOME = "Welcome to the assistant bot!"
export const PROMPT = "Enter a command: "
export const GREETING = "How can I help you?"
export const GOOD_BYE = "Good bye!"
export const INVALID_COMMAND = "Invalid command."
export const EMPTY_BOOK = "The address book is empty."
export const NO_BIRTHDAY = "Birthday is not set."
export const NO_UPCOMING_BIRTHDAYS = "There are no upcoming birthdays."

export interface ShellStep {
  readonly lines: ReadonlyArray<string>
  readonly exit: boolean
}

const reply = (lines: ReadonlyArray<string>): ShellStep => ({ lines, exit: false })

const single = (message: string): ReadonlyArray<string> => [message]

// Run a use case through the CommandResult boundary and render the answer
const answer = <A, R>(
  command: Effect.Effect<A, ContactError, R>,
  render: (output: A) => ReadonlyArray<string>
): Effect.Effect<ShellStep, never, R> =>
  Effect.map(toCommandResult(command, render), (result) => reply(renderResult(result)))

// =============================================================================
// dispatch
// =============================================================================

export const dispatch = (line: string): Effect.Effect<ShellStep, never, ContactBook> => {
  const { command, args } = parseInput(line)

  const run = (): Effect.Effect<ShellStep, never, ContactBook> => {
    switch (command) {
      case "":
        return Effect.succeed(reply([]))

      case "hello":
        return Effect.succeed(reply([GREETING]))

      case "close":
      case "exit":
        return Effect.succeed({ lines: [], exit: true })

      case "add":
        return answer(addContact(args), single)

      case "change":
        return answer(changeContact(args), single)

      case "phone":
        return answer(showPhone(args), (record) => [ContactRecord.renderPhones(record)])

      case "all":
        return answer(showAll(), (records) =>
          records.length === 0 ? [EMPTY_BOOK] : records.map(ContactRecord.render))

      case "add-birthday":
        return answer(addBirthday(args), single)

      case "show-birthday":
        return answer(showBirthday(args), (birthday) => [
          Option.match(birthday, { onNone: () => NO_BIRTHDAY, onSome: Birthday.render })
        ])

      case "birthdays":
        return answer(upcomingBirthdays(args), (upcoming) =>
          upcoming.length === 0
            ? [NO_UPCOMING_BIRTHDAYS]
            : upcoming.map(({ date, name }) => `${name}: ${date}`))

      case "remove-phone":
        return answer(removePhone(args), single)

      case "delete":
        return answer(deleteContact(args), single)

      default:
        return Effect.succeed(reply([INVALID_COMMAND]))
    }
  }

  return run().pipe(
    Effect.tap((step) => Effect.logDebug("Command handled").pipe(
      Effect.annotateLogs({ command, lines: step.lines.length })
    ))
  )
}

// =============================================================================
// runShell
// =============================================================================
//
// The book is saved once, on the way out, whether the user typed exit, the
// input ended, or the fiber was interrupted (SIGINT under runMain). The loop
// alone is interruptible; saving and saying goodbye are not.
//

const readEvalLoop: Effect.Effect<void, never, ContactBook | UserInterface> = Effect.gen(function* () {
  const ui = yield* UserInterface

  while (true) {
    const input = yield* ui.readLine(PROMPT)
    if (Option.isNone(input)) {
      return
    }

    const step = yield* dispatch(input.value)
    for (const line of step.lines) {
      yield* ui.displayMessage(line)
    }
    if (step.exit) {
      return
    }
  }
})

export const runShell: Effect.Effect<
  void,
  ContactStoreError,
  ContactBook | ContactStore | UserInterface
> = Effect.uninterruptibleMask((restore) =>
  Effect.gen(function* () {
    const ui = yield* UserInterface
    const book = yield* ContactBook
    const store = yield* ContactStore

    yield* ui.displayMessage(WELCOME)
    const ended = yield* Effect.exit(restore(readEvalLoop))
    if (Exit.isInterrupted(ended)) {
      yield* Effect.logDebug("Shell interrupted, saving before exit")
    }

    yield* store.save(yield* book.get)
    yield* ui.displayMessage(GOOD_BYE)
  })
)

// =============================================================================
// TerminalUserInterface — Adapter Implementations
// =============================================================================
//
// Two adapters for the UserInterface port:
//   1. `TerminalUserInterface` — stdin/stdout through node:readline
//   2. `makeScriptedUserInterface()` — replays scripted input lines and
//      captures everything displayed, for tests
//
// END OF INPUT:
// The readline interface closes when its input ends (EOF on a pipe, Ctrl+D on
// an empty line) and, in a terminal, on Ctrl+C. Every read after that returns
// Option.none(), which ends the shell like `exit`.
//
import * as readline from "node:readline"
import { Effect, Layer, Option, Queue, type Scope } from "effect"
import { UserInterface, type UserInterfaceService } from "../UserInterface.js"

// =============================================================================
// Terminal Adapter
// =============================================================================
//
// Lines are queued as readline emits them, so input that arrives while a
// command is still running (pasted or piped text) is read in order, not lost.
// `none` on the queue marks the end and is put back for the next reader.
//

export const makeTerminalUserInterface = (
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Effect.Effect<UserInterfaceService, never, Scope.Scope> =>
  Effect.gen(function* () {
    const lines = yield* Queue.unbounded<Option.Option<string>>()
    let closed = false

    const rl = yield* Effect.acquireRelease(
      Effect.sync(() => {
        const created = readline.createInterface({ input, output })
        created.on("line", (line) => {
          Queue.unsafeOffer(lines, Option.some(line))
        })
        created.on("close", () => {
          closed = true
          Queue.unsafeOffer(lines, Option.none())
        })
        return created
      }),
      (created) =>
        Effect.sync(() => {
          if (!closed) {
            created.close()
          }
        })
    )

    return {
      displayMessage: (message) =>
        Effect.sync(() => {
          output.write(`${message}\n`)
        }),

      readLine: (prompt) =>
        Effect.sync(() => {
          if (!closed) {
            rl.setPrompt(prompt)
            rl.prompt()
          }
        }).pipe(
          Effect.zipRight(Queue.take(lines)),
          Effect.tap((line) => (Option.isNone(line) ? Queue.offer(lines, line) : Effect.void))
        )
    }
  })

export const TerminalUserInterface = Layer.scoped(
  UserInterface,
  makeTerminalUserInterface(process.stdin, process.stdout)
)

// =============================================================================
// Scripted Adapter (for tests)
// =============================================================================
//
// USAGE IN TESTS:
//   const ui = makeScriptedUserInterface(["add Alice 1234567890", "exit"])
//   // ... run the shell with ui.service ...
//   expect(ui.getOutput()).toContain("Contact added.")
//
// Prompts are recorded separately from output so assertions on output do not
// have to skip "Enter a command: " lines.
//

export interface ScriptedUserInterface {
  readonly service: UserInterfaceService
  readonly getOutput: () => ReadonlyArray<string>
  readonly getPrompts: () => ReadonlyArray<string>
}

export const makeScriptedUserInterface = (
  script: ReadonlyArray<string>
): ScriptedUserInterface => {
  const pending = [...script]
  const output: Array<string> = []
  const prompts: Array<string> = []

  const service: UserInterfaceService = {
    displayMessage: (message) =>
      Effect.sync(() => {
        output.push(message)
      }),

    readLine: (prompt) =>
      Effect.sync(() => {
        prompts.push(prompt)
        return Option.fromNullable(pending.shift())
      })
  }

  return {
    service,
    getOutput: () => [...output],
    getPrompts: () => [...prompts]
  }
}

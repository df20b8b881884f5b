// =============================================================================
// CommandResult — what the shell gets back from a command
// =============================================================================
//
// The boundary between use cases and the loop. Every ContactError is caught
// here and becomes a value; the loop never sees a failed Effect from a command.
//
//   Success              — lines to display
//   ValidationFailure    — bad phone, date, name or day count
//   NotFound             — unknown contact or phone
//   ArgumentCountFailure — too few arguments
//
import { Effect, Match } from "effect"
import type { ContactError } from "../domain/contact/Errors.js"

export const ENTER_CORRECT_INFORMATION = "Enter correct information."

export type CommandResult =
  | { readonly _tag: "Success"; readonly lines: ReadonlyArray<string> }
  | { readonly _tag: "ValidationFailure"; readonly reason: string }
  | { readonly _tag: "NotFound"; readonly message: string }
  | { readonly _tag: "ArgumentCountFailure"; readonly command: string }

export const success = (lines: ReadonlyArray<string>): CommandResult => ({ _tag: "Success", lines })

// -----------------------------------------------------------------------------
// toCommandResult: Effect<A, ContactError, R> → Effect<CommandResult, never, R>
// -----------------------------------------------------------------------------
// `render` turns the use case's output into display lines.
//
export const toCommandResult = <A, R>(
  command: Effect.Effect<A, ContactError, R>,
  render: (output: A) => ReadonlyArray<string>
): Effect.Effect<CommandResult, never, R> =>
  command.pipe(
    Effect.map((output) => success(render(output))),
    Effect.catchTags({
      ValidationError: (e) =>
        Effect.succeed<CommandResult>({ _tag: "ValidationFailure", reason: e.message }),
      NotFoundError: (e) =>
        Effect.succeed<CommandResult>({ _tag: "NotFound", message: e.message }),
      ArgumentCountError: (e) =>
        Effect.succeed<CommandResult>({ _tag: "ArgumentCountFailure", command: e.command })
    })
  )

export const renderResult = (result: CommandResult): ReadonlyArray<string> =>
  Match.value(result).pipe(
    Match.tag("Success", (r) => r.lines),
    Match.tag("ValidationFailure", (r) => [r.reason]),
    Match.tag("NotFound", (r) => [r.message]),
    Match.tag("ArgumentCountFailure", () => [ENTER_CORRECT_INFORMATION]),
    Match.exhaustive
  )

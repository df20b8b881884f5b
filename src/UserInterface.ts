// =============================================================================
// UserInterface — The Port (Interface)
// =============================================================================
//
// Where the shell reads commands and writes answers. The port knows nothing
// about terminals; adapters (infrastructure/TerminalUserInterface.ts) do.
//
// Neither operation fails: the end of input is a value, not an error.
//
import type { Effect, Option } from "effect"
import { Context } from "effect"

export interface UserInterfaceService {
  readonly displayMessage: (message: string) => Effect.Effect<void>

  /**
   * Show `prompt` and read one line.
   * `Option.none()` means the input is exhausted (end of file, Ctrl+C, or the
   * script ran out) and the shell should wind down.
   */
  readonly readLine: (prompt: string) => Effect.Effect<Option.Option<string>>
}

export class UserInterface extends Context.Tag("UserInterface")<
  UserInterface,
  UserInterfaceService
>() {}

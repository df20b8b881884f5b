// =============================================================================
// Command arguments
// =============================================================================
//
// Use cases receive the tokens that followed the command word. Too few is an
// ArgumentCountError; extra tokens are ignored ("add Alice 1234567890 home"
// adds the phone and drops "home").
//
import { Either } from "effect"
import { ArgumentCountError } from "../domain/contact/Errors.js"

export const requireArguments = (
  command: string,
  args: ReadonlyArray<string>,
  expected: number
): Either.Either<ReadonlyArray<string>, ArgumentCountError> =>
  args.length < expected
    ? Either.left(ArgumentCountError(command, expected, args.length))
    : Either.right(args.slice(0, expected))

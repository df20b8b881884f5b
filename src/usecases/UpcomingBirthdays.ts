// =============================================================================
// UpcomingBirthdays Use Case — `birthdays [days]`
// =============================================================================
//
// "Today" comes from Effect's Clock, read as a local calendar date. Under
// @effect/vitest the TestClock drives it, so tests pick the day.
//
import { Clock, Effect, Either } from "effect"
import { ContactBook } from "../ContactBook.js"
import * as AddressBook from "../domain/contact/AddressBook.js"
import { ValidationError } from "../domain/contact/Errors.js"
import { type CalendarDate, fromDate } from "../shared/CalendarDate.js"

export const INVALID_WINDOW_MESSAGE = "Invalid number of days"

const WINDOW_PATTERN = /^\d+$/

// Optional first argument: the window in days (non-negative integer)
const parseWindow = (args: ReadonlyArray<string>): Either.Either<number, ValidationError> => {
  if (args.length === 0) {
    return Either.right(AddressBook.DEFAULT_WINDOW_DAYS)
  }
  const [raw] = args
  return WINDOW_PATTERN.test(raw)
    ? Either.right(Number(raw))
    : Either.left(ValidationError(INVALID_WINDOW_MESSAGE))
}

export const today: Effect.Effect<CalendarDate> = Clock.currentTimeMillis.pipe(
  Effect.map((millis) => fromDate(new Date(millis)))
)

export const upcomingBirthdays = (
  args: ReadonlyArray<string> = []
): Effect.Effect<ReadonlyArray<AddressBook.UpcomingBirthday>, ValidationError, ContactBook> =>
  Effect.gen(function* () {
    const windowDays = yield* parseWindow(args)
    const book = yield* ContactBook
    const current = yield* book.get
    return AddressBook.upcomingBirthdays(current, yield* today, windowDays)
  })

// =============================================================================
// Contact Domain Errors
// =============================================================================
//
// Errors are discriminated unions tagged by `_tag`, the same shape as the
// domain's other tagged values. Pure functions return them on the Left of an
// Either; use cases fail with them; the CLI boundary matches on `_tag`.
//
// Every error here is recoverable: the operation that produced it changed
// nothing.
//

// Invalid phone, birthday, name or day count
export type ValidationError = {
  readonly _tag: "ValidationError"
  readonly message: string
}

// A contact or a phone that an operation needs does not exist
export type NotFoundError = {
  readonly _tag: "NotFoundError"
  readonly message: string
}

// Fewer arguments than the command needs
export type ArgumentCountError = {
  readonly _tag: "ArgumentCountError"
  readonly command: string
  readonly expected: number
  readonly received: number
}

export type ContactError = ValidationError | NotFoundError | ArgumentCountError

// -----------------------------------------------------------------------------
// Constructors
// -----------------------------------------------------------------------------

export const ValidationError = (message: string): ValidationError => ({
  _tag: "ValidationError",
  message
})

export const NotFoundError = (message: string): NotFoundError => ({
  _tag: "NotFoundError",
  message
})

export const ArgumentCountError = (
  command: string,
  expected: number,
  received: number
): ArgumentCountError => ({
  _tag: "ArgumentCountError",
  command,
  expected,
  received
})

export const CONTACT_NOT_FOUND = "Name not found. Please, check and try again."
export const PHONE_NOT_FOUND = "Phone number not found"

export const ContactNotFound = (): NotFoundError => NotFoundError(CONTACT_NOT_FOUND)

// Splits one input line into a lower-cased command word and its arguments.
// Arguments keep their case: contact names are case-sensitive.

export interface ParsedInput {
  readonly command: string
  readonly args: ReadonlyArray<string>
}

export const parseInput = (line: string): ParsedInput => {
  const tokens = line.trim().split(/\s+/).filter((token) => token.length > 0)
  if (tokens.length === 0) {
    return { command: "", args: [] }
  }
  const [command, ...args] = tokens
  return { command: command.toLowerCase(), args }
}

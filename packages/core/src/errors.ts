/**
 * Error kinds surfaced to the command-line tools.
 *
 * The CLI maps each to an exit code; library code only throws them.
 */

/** Wrong number of command-line arguments. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/** Agenda date token is not "today", "tomorrow" or YYYY-MM-DD. */
export class InvalidDateArgumentError extends Error {
  readonly token: string

  constructor(token: string) {
    super('Date must be "today", "tomorrow", or YYYY-MM-DD.')
    this.name = 'InvalidDateArgumentError'
    this.token = token
  }
}

/** A timestamp or stamp value could not be parsed. */
export class FormatError extends Error {
  readonly value: string

  constructor(value: string, reason?: string) {
    super(`Invalid timestamp "${value}"${reason ? `: ${reason}` : ''}`)
    this.name = 'FormatError'
    this.value = value
  }
}

/** The events file is unreadable, not JSON, or not shaped like an export. */
export class InputError extends Error {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`Could not read events from ${path}: ${reason}`)
    this.name = 'InputError'
    this.path = path
  }
}

import { FormatError, InputError, InvalidDateArgumentError, UsageError } from '../errors.js'
import type { CliIo } from './io.js'

/** Exit status for wrong argument counts */
export const EXIT_USAGE = 2

export const EXIT_FAILURE = 1

/**
 * Report a known error kind and return its exit status.
 * Anything else is rethrown to the entry point.
 */
export function reportCliError(err: unknown, io: CliIo, usage: string): number {
  if (err instanceof UsageError) {
    io.stderr(err.message)
    io.stderr(usage)
    return EXIT_USAGE
  }
  if (err instanceof InvalidDateArgumentError) {
    io.stderr(err.message)
    io.stderr(usage)
    return EXIT_FAILURE
  }
  if (err instanceof FormatError || err instanceof InputError) {
    io.stderr(`Error: ${err.message}`)
    return EXIT_FAILURE
  }
  throw err
}

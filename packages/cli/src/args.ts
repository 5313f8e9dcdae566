/**
 * Command-line arguments: `--mode interactive`, `--mode headless <file>` or
 * `--mode gui`. No arguments means interactive.
 */

export type RunMode =
  | { mode: 'interactive' }
  | { mode: 'headless'; file: string }
  | { mode: 'gui' }

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export const USAGE = 'Usage: caldesk [--mode interactive | --mode headless <file> | --mode gui]'

export function parseArgs(args: readonly string[]): RunMode {
  if (args.length === 0) {
    return { mode: 'interactive' }
  }
  if (args[0].toLowerCase() !== '--mode' || args.length < 2) {
    throw new UsageError(USAGE)
  }

  const mode = args[1].toLowerCase()
  switch (mode) {
    case 'interactive':
      if (args.length > 2) throw new UsageError(USAGE)
      return { mode: 'interactive' }
    case 'headless':
      if (args.length !== 3) {
        throw new UsageError('Headless mode requires exactly one command file')
      }
      return { mode: 'headless', file: args[2] }
    case 'gui':
      return { mode: 'gui' }
    default:
      throw new UsageError(`Unknown mode: ${args[1]}. ${USAGE}`)
  }
}

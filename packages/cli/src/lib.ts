// Public API for embedding the command layer

export { parseCommand, collapseWhitespace } from './commands/parser.js'
export { CommandExecutor } from './commands/executor.js'
export type { CommandExecutorOptions } from './commands/executor.js'
export { formatEventLine, formatEventList } from './commands/format.js'
export { CommandSyntaxError } from './commands/types.js'
export type {
  Command,
  CommandKind,
  CommandResult,
  CalendarProperty,
  EventTiming,
  RepeatRule,
} from './commands/types.js'
export { parseArgs, UsageError, USAGE } from './args.js'
export type { RunMode } from './args.js'
export { runInteractive, runHeadless, readCommandFile } from './modes.js'
export type { Prompt } from './modes.js'
export { createSession } from './session.js'
export type { Session, SessionConfig } from './session.js'

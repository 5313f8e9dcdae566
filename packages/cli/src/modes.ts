/**
 * Run modes: an interactive prompt and a headless command-file runner.
 */

import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { readFile } from 'node:fs/promises'
import { UsageError } from './args.js'
import type { CommandExecutor } from './commands/executor.js'

/** The part of a readline interface the prompt loop uses */
export interface Prompt {
  question(query: string): Promise<string>
  close(): void
}

export async function runInteractive(
  executor: CommandExecutor,
  prompt: Prompt = readline.createInterface({ input, output }),
): Promise<void> {
  console.log('Calendar ready. Type commands, or "exit" to quit.\n')

  try {
    while (true) {
      const line = await prompt.question('> ')
      if (!line.trim()) continue

      const result = await executor.execute(line)
      if (result.ok) console.log(result.output)
      else console.error(result.output)

      if (result.exit) break
    }
  } finally {
    prompt.close()
  }
}

/**
 * Read a headless command file: one command per line, blank lines and
 * `#` comments ignored. The file must contain at least one command and end
 * with `exit`.
 */
export async function readCommandFile(file: string): Promise<string[]> {
  const text = await readFile(file, 'utf-8')
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))

  if (lines.length === 0) {
    throw new UsageError(`Command file is empty: ${file}`)
  }
  if (lines[lines.length - 1] !== 'exit') {
    throw new UsageError(`Command file must end with 'exit': ${file}`)
  }
  return lines
}

/**
 * Execute a command file, stopping at the first failing command.
 *
 * @returns Process exit code
 */
export async function runHeadless(executor: CommandExecutor, file: string): Promise<number> {
  const lines = await readCommandFile(file)

  for (const line of lines) {
    const result = await executor.execute(line)
    if (!result.ok) {
      console.error(result.output)
      console.error(`[Headless] Stopped at: ${line}`)
      return 1
    }
    console.log(result.output)
    if (result.exit) break
  }
  return 0
}

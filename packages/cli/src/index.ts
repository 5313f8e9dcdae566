import { loadConfig } from '@caldesk/core'
import { parseArgs, UsageError, type RunMode } from './args.js'
import { runHeadless, runInteractive } from './modes.js'
import { createSession } from './session.js'

function readMode(): RunMode {
  try {
    return parseArgs(process.argv.slice(2))
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message)
      process.exit(2)
    }
    throw err
  }
}

async function main(): Promise<void> {
  const mode = readMode()
  const { executor } = createSession(loadConfig())

  switch (mode.mode) {
    case 'headless':
      process.exitCode = await runHeadless(executor, mode.file)
      return
    case 'gui':
      console.warn('[CLI] GUI mode is not available in this build. Starting interactive mode.')
      await runInteractive(executor)
      return
    case 'interactive':
      await runInteractive(executor)
      return
  }
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})

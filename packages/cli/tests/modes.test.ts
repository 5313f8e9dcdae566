import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import { parseArgs, UsageError } from '../src/args.js'
import { readCommandFile, runHeadless, runInteractive, type Prompt } from '../src/modes.js'
import { createSession, type Session } from '../src/session.js'

function newSession(): Session {
  return createSession({
    defaultTimezone: 'America/New_York',
    defaultCalendar: 'Default',
    exportDirectory: '.',
    autoDecline: false,
  })
}

function scriptedPrompt(lines: string[]): Prompt {
  const queue = [...lines]
  return {
    question: vi.fn(async () => queue.shift() ?? 'exit'),
    close: vi.fn(),
  }
}

// -------------------------------------------------------------------
// Arguments
// -------------------------------------------------------------------

describe('parseArgs', () => {
  it('defaults to interactive', () => {
    expect(parseArgs([])).toEqual({ mode: 'interactive' })
    expect(parseArgs(['--mode', 'Interactive'])).toEqual({ mode: 'interactive' })
  })

  it('reads headless and gui modes', () => {
    expect(parseArgs(['--mode', 'headless', 'commands.txt'])).toEqual({ mode: 'headless', file: 'commands.txt' })
    expect(parseArgs(['--mode', 'gui'])).toEqual({ mode: 'gui' })
  })

  it('rejects malformed arguments', () => {
    expect(() => parseArgs(['--mode'])).toThrow(UsageError)
    expect(() => parseArgs(['--mode', 'headless'])).toThrow('Headless mode requires exactly one command file')
    expect(() => parseArgs(['--mode', 'batch'])).toThrow('Unknown mode: batch')
    expect(() => parseArgs(['commands.txt'])).toThrow(UsageError)
  })
})

// -------------------------------------------------------------------
// Headless
// -------------------------------------------------------------------

describe('headless mode', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'headless-test-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  function writeCommands(lines: string[]): string {
    const file = path.join(tempDir, 'commands.txt')
    fs.writeFileSync(file, lines.join('\n'), 'utf-8')
    return file
  }

  it('skips blank lines and comments', async () => {
    const file = writeCommands(['# setup', '', 'create calendar --name Work --timezone UTC', '  exit  '])
    await expect(readCommandFile(file)).resolves.toEqual(['create calendar --name Work --timezone UTC', 'exit'])
  })

  it('rejects an empty file', async () => {
    const file = writeCommands(['', '# nothing here'])
    await expect(readCommandFile(file)).rejects.toThrow(`Command file is empty: ${file}`)
  })

  it('requires exit as the last command', async () => {
    const file = writeCommands(['create calendar --name Work --timezone UTC'])
    await expect(readCommandFile(file)).rejects.toThrow(`Command file must end with 'exit': ${file}`)
  })

  it('runs every command and returns 0', async () => {
    const session = newSession()
    const file = writeCommands([
      'create calendar --name Work --timezone UTC',
      'use calendar --name Work',
      'create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15',
      'exit',
    ])

    await expect(runHeadless(session.executor, file)).resolves.toBe(0)
    expect(session.manager.getActiveCalendar().getAllEvents()).toHaveLength(1)
    expect(console.log).toHaveBeenLastCalledWith('Exiting...')
  })

  it('stops at the first failing command and returns 1', async () => {
    const session = newSession()
    const file = writeCommands([
      'create calendar --name Work --timezone Nowhere/City',
      'create calendar --name Home --timezone UTC',
      'exit',
    ])

    await expect(runHeadless(session.executor, file)).resolves.toBe(1)
    expect(session.manager.hasCalendar('Home')).toBe(false)
    expect(console.error).toHaveBeenCalledWith('Error: Invalid timezone: Nowhere/City')
  })
})

// -------------------------------------------------------------------
// Interactive
// -------------------------------------------------------------------

describe('interactive mode', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('runs commands until exit and keeps going after errors', async () => {
    const session = newSession()
    const prompt = scriptedPrompt([
      'create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15',
      '',
      'dance',
      'show status on 2024-03-26T09:05',
      'exit',
      'create event Never from 2024-03-27T09:00 to 2024-03-27T09:15',
    ])

    await runInteractive(session.executor, prompt)

    expect(console.error).toHaveBeenCalledWith('Error: Unknown command: dance')
    expect(console.log).toHaveBeenCalledWith('Status on 2024-03-26T09:05: Busy')
    expect(session.manager.getActiveCalendar().getAllEvents().map((e) => e.subject)).toEqual(['Standup'])
    expect(prompt.close).toHaveBeenCalledTimes(1)
  })
})

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'

import { createSession, type Session } from '../src/session.js'

async function outputOf(session: Session, line: string): Promise<string> {
  return (await session.executor.execute(line)).output
}

describe('CommandExecutor', () => {
  let tempDir: string
  let session: Session

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'executor-test-'))
    session = createSession({
      defaultTimezone: 'America/New_York',
      defaultCalendar: 'Default',
      exportDirectory: tempDir,
      autoDecline: false,
    })
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  // -------------------------------------------------------------------
  // Calendars
  // -------------------------------------------------------------------

  it('starts with the default calendar active', () => {
    expect(session.manager.getActiveCalendarName()).toBe('Default')
    expect(session.manager.getActiveCalendar().timezone).toBe('America/New_York')
  })

  it('creates, edits and selects calendars', async () => {
    expect(await outputOf(session, 'create calendar --name Work --timezone America/New_York')).toBe(
      "Calendar 'Work' created successfully with timezone America/New_York",
    )
    expect(await session.executor.execute('create calendar --name Work --timezone Europe/Paris')).toEqual({
      output: "Error: Calendar with name 'Work' already exists",
      ok: false,
      exit: false,
    })
    expect(await outputOf(session, 'edit calendar --name Work --property timezone Europe/London')).toBe(
      "Timezone updated to Europe/London for calendar 'Work'",
    )
    expect(await outputOf(session, 'edit calendar --name Work --property name Office')).toBe(
      "Calendar name updated from 'Work' to 'Office'",
    )
    expect(await outputOf(session, 'use calendar --name Office')).toBe("Now using calendar: 'Office'")
    expect(session.manager.getActiveCalendar().timezone).toBe('Europe/London')
    expect(await outputOf(session, 'use calendar --name Work')).toBe('Error: Calendar not found: Work')
  })

  it('lists calendars with the active one marked', async () => {
    await session.executor.execute('create calendar --name Travel --timezone Asia/Kolkata')
    expect(await outputOf(session, 'show calendar')).toBe(
      [
        'Active calendar: Default',
        'Available calendars:',
        '  Default (America/New_York) (active)',
        '  Travel (Asia/Kolkata)',
      ].join('\n'),
    )
  })

  // -------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------

  it('creates events and reports conflicts', async () => {
    expect(await outputOf(session, 'create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15')).toBe(
      "Event 'Standup' created successfully",
    )
    expect(
      await session.executor.execute('create event --autoDecline Standup2 from 2024-03-26T09:10 to 2024-03-26T09:20'),
    ).toEqual({
      output: "Error: Event 'Standup2' conflicts with an existing event",
      ok: false,
      exit: false,
    })
    expect(
      await session.executor.execute('create event Standup2 from 2024-03-26T09:10 to 2024-03-26T09:20'),
    ).toEqual({
      output: "Failed to create event 'Standup2' due to a conflict with an existing event",
      ok: true,
      exit: false,
    })
    expect(session.manager.getActiveCalendar().getAllEvents().map((e) => e.subject)).toEqual(['Standup'])
  })

  it('applies the configured auto-decline default', async () => {
    const strict = createSession({
      defaultTimezone: 'UTC',
      defaultCalendar: 'Default',
      exportDirectory: tempDir,
      autoDecline: true,
    })
    await strict.executor.execute('create event A from 2024-03-26T09:00 to 2024-03-26T10:00')
    const result = await strict.executor.execute('create event B from 2024-03-26T09:30 to 2024-03-26T10:30')
    expect(result.ok).toBe(false)
    expect(result.output).toBe("Error: Event 'B' conflicts with an existing event")
  })

  it('prints events for a day and a range', async () => {
    await session.executor.execute('create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15')
    await session.executor.execute(
      'create event "Team Lunch" from 2024-03-26T12:00 to 2024-03-26T13:00 desc "Quarterly, all hands" at "Cafe" private',
    )
    await session.executor.execute('create event Release on 2024-03-27')

    expect(await outputOf(session, 'print events on 2024-03-26')).toBe(
      [
        'Events on 2024-03-26:',
        '- Standup: 2024-03-26 09:00 to 2024-03-26 09:15',
        '- Team Lunch: 2024-03-26 12:00 to 2024-03-26 13:00 at Cafe [private]',
      ].join('\n'),
    )
    expect(await outputOf(session, 'print events from 2024-03-27 to 2024-03-28')).toBe(
      ['Events from 2024-03-27 to 2024-03-28:', '- Release: 2024-03-27 (all day)'].join('\n'),
    )
    expect(await outputOf(session, 'print events on 2024-03-29')).toBe('No events on 2024-03-29')
    expect(await outputOf(session, 'print events from 2024-03-29 to 2024-03-28')).toBe(
      'Error: Start date cannot be after end date',
    )
  })

  it('prints events overlapping a date-time range', async () => {
    await session.executor.execute('create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15')
    await session.executor.execute('create event Lunch from 2024-03-26T12:00 to 2024-03-26T13:00')

    expect(await outputOf(session, 'print events from 2024-03-26T09:10 to 2024-03-26T11:00')).toBe(
      ['Events from 2024-03-26T09:10 to 2024-03-26T11:00:', '- Standup: 2024-03-26 09:00 to 2024-03-26 09:15'].join('\n'),
    )
    expect(await outputOf(session, 'print events from 2024-03-26T13:30 to 2024-03-27')).toBe(
      'No events from 2024-03-26T13:30 to 2024-03-27T23:59',
    )
  })

  it('edits a single event matched by start and end', async () => {
    await session.executor.execute('create event Gym from 2024-03-06T18:00 to 2024-03-06T19:00')
    expect(
      await outputOf(session, 'edit event location Gym from 2024-03-06T18:00 to 2024-03-06T18:30 with Pool'),
    ).toBe("Failed to edit event 'Gym' at 2024-03-06T18:00.")
    expect(
      await outputOf(session, 'edit event location Gym from 2024-03-06T18:00 to 2024-03-06T19:00 with Pool'),
    ).toBe("Successfully edited event 'Gym'.")
    expect(session.manager.getActiveCalendar().getAllEvents().map((e) => e.location)).toEqual(['Pool'])
  })

  it('shows busy status', async () => {
    await session.executor.execute('create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15')
    expect(await outputOf(session, 'show status on 2024-03-26T09:10')).toBe('Status on 2024-03-26T09:10: Busy')
    expect(await outputOf(session, 'show status on 2024-03-26T10:00')).toBe(
      'Status on 2024-03-26T10:00: Available',
    )
  })

  it('creates and edits a recurring series', async () => {
    expect(
      await outputOf(session, 'create event Gym from 2024-03-04T18:00 to 2024-03-04T19:00 repeats MWF for 3 times'),
    ).toBe("Recurring event 'Gym' created successfully")

    expect(await outputOf(session, 'edit events location Gym with Club')).toBe('Successfully edited 3 events')
    expect(await outputOf(session, 'edit event location Gym from 2024-03-06T18:00 with "Pool B"')).toBe(
      "Successfully edited event 'Gym'.",
    )
    expect(await outputOf(session, 'edit events description Gym from 2024-03-06T18:00 with Legs')).toBe(
      'Successfully edited 2 events',
    )
    expect(await outputOf(session, 'edit events location Yoga with Club')).toBe('No matching events found to edit')
    expect(await outputOf(session, 'edit event location Gym from 2024-03-05T18:00 with Pool')).toBe(
      "Failed to edit event 'Gym' at 2024-03-05T18:00.",
    )

    expect(await outputOf(session, 'print events from 2024-03-04 to 2024-03-08')).toBe(
      [
        'Events from 2024-03-04 to 2024-03-08:',
        '- Gym: 2024-03-04 18:00 to 2024-03-04 19:00 at Club',
        '- Gym: 2024-03-06 18:00 to 2024-03-06 19:00 at Pool B',
        '- Gym: 2024-03-08 18:00 to 2024-03-08 19:00 at Club',
      ].join('\n'),
    )
  })

  // -------------------------------------------------------------------
  // Copies
  // -------------------------------------------------------------------

  it('copies events across zones', async () => {
    await session.executor.execute('create calendar --name Travel --timezone Asia/Kolkata')
    await session.executor.execute('create event Gym from 2024-03-11T18:00 to 2024-03-11T19:00')

    expect(await outputOf(session, 'copy events on 2024-03-11 --target Travel to 2024-03-11')).toBe(
      "Successfully copied 1 events to calendar 'Travel'.",
    )
    expect(await outputOf(session, 'copy event Gym on 2024-03-11T18:00 --target Travel to 2024-03-13T07:00')).toBe(
      "Event 'Gym' copied successfully to calendar 'Travel'.",
    )
    expect(await outputOf(session, 'copy events on 2024-03-11 --target Travel to 2024-03-11')).toBe(
      "Failed to copy any events to calendar 'Travel'.",
    )
    expect(
      await outputOf(session, 'copy events between 2024-05-01 and 2024-05-02 --target Travel to 2024-06-01'),
    ).toBe('No events found between 2024-05-01 and 2024-05-02 to copy.')
    expect(await outputOf(session, 'copy event Yoga on 2024-03-11T18:00 --target Travel to 2024-03-13T07:00')).toBe(
      'Error: Event not found: Yoga at 2024-03-11T18:00',
    )
    expect(await outputOf(session, 'copy events on 2024-03-11 --target Moon to 2024-03-11')).toBe(
      'Error: Calendar not found: Moon',
    )

    await session.executor.execute('use calendar --name Travel')
    expect(await outputOf(session, 'print events from 2024-03-12 to 2024-03-13')).toBe(
      [
        'Events from 2024-03-12 to 2024-03-13:',
        '- Gym: 2024-03-12 03:30 to 2024-03-12 04:30',
        '- Gym: 2024-03-13 07:00 to 2024-03-13 08:00',
      ].join('\n'),
    )
  })

  // -------------------------------------------------------------------
  // Files and control
  // -------------------------------------------------------------------

  it('exports and imports relative to the export directory', async () => {
    await session.executor.execute('create event Standup from 2024-03-26T09:00 to 2024-03-26T09:15')

    expect(await outputOf(session, 'export cal work.csv')).toBe(
      `Calendar exported successfully to: ${path.join(tempDir, 'work.csv')}`,
    )

    await session.executor.execute('create calendar --name Copy --timezone America/New_York')
    await session.executor.execute('use calendar --name Copy')
    expect(await outputOf(session, 'import cal work.csv')).toBe('Imported 1 of 1 events (0 skipped due to conflicts)')
    expect(await outputOf(session, 'import cal work.csv')).toBe('Imported 0 of 1 events (1 skipped due to conflicts)')
  })

  it('reports an empty CSV file', async () => {
    fs.writeFileSync(
      path.join(tempDir, 'empty.csv'),
      'Subject,Start Date,Start Time,End Date,End Time,All Day,Description,Location,Public\n',
    )
    expect(await outputOf(session, 'import cal empty.csv')).toBe('No events found in the CSV file')
  })

  it('renders syntax errors and signals exit', async () => {
    expect(await session.executor.execute('dance')).toEqual({
      output: 'Error: Unknown command: dance',
      ok: false,
      exit: false,
    })
    expect(await session.executor.execute('exit')).toEqual({ output: 'Exiting...', ok: true, exit: true })
  })
})

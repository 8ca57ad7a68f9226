/**
 * Reminder round against the in-memory service and a temporary history directory
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { REMINDER_MESSAGE_THRESHOLD, runReminder } from '../../src/actions/reminder.js'
import type { ActionContext } from '../../src/actions/types.js'
import { parseConfig } from '../../src/config/loader.js'
import { HistoryStore } from '../../src/history/history-store.js'
import { getMessages } from '../../src/messages/catalog.js'
import {
  InMemoryCommunicationService,
  pairKey,
} from '../../src/services/connectors/in-memory-connector.js'
import { CommunicationError } from '../../src/services/service-error.js'
import type { Logger } from '../../src/services/types.js'
import { configFile } from '../fixtures/members.js'

describe('Reminder flow', () => {
  let directory: string
  let logger: Logger
  let history: HistoryStore

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'coffee-pairing-reminder-'))
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    history = new HistoryStore(directory, { configName: 'config.json', testMode: false })
  })

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  function createContext(
    service: InMemoryCommunicationService,
    onProgress?: (step: number) => void
  ): ActionContext {
    return {
      config: parseConfig(configFile({ slack: { backtrackDays: 14 } })),
      service,
      history,
      logger,
      onProgress,
    }
  }

  async function saveRound(): Promise<string> {
    await history.save([['U5', 'U6']], new Date(2026, 9, 4, 9, 0))
    return history.save(
      [
        ['U1', 'U2'],
        ['U3', 'U4'],
      ],
      new Date(2026, 9, 11, 9, 0)
    )
  }

  it('reminds only the pairs of the last round that have not chatted', async () => {
    const historyFile = await saveRound()
    const service = new InMemoryCommunicationService({
      recentMessageCounts: { [pairKey('U1', 'U2')]: 5, [pairKey('U3', 'U4')]: 4 },
    })

    const summary = await runReminder(createContext(service))

    expect(historyFile).toBe('20261011-0900-config.json.json')
    expect(summary).toEqual({ historyFile, checked: 2, reminded: 1, failed: [] })
    expect(service.sentMessages).toEqual([
      { pair: ['U3', 'U4'], text: getMessages('en').reminder() },
    ])
    expect(service.calls.slice(0, 2)).toEqual([
      { operation: 'hasRecentExchange', pair: ['U1', 'U2'], withinDays: 14, threshold: 5 },
      { operation: 'hasRecentExchange', pair: ['U3', 'U4'], withinDays: 14, threshold: 5 },
    ])
    expect(logger.info).toHaveBeenCalledWith('Working on: 20261011-0900-config.json.json')
    expect(logger.info).toHaveBeenCalledWith('Sent 1 reminder')
  })

  it('counts a conversation as a chat from the invitation plus four replies', () => {
    expect(REMINDER_MESSAGE_THRESHOLD).toBe(5)
  })

  it('does nothing without a history file', async () => {
    const service = new InMemoryCommunicationService()

    const summary = await runReminder(createContext(service))

    expect(summary).toEqual({ historyFile: null, checked: 0, reminded: 0, failed: [] })
    expect(service.calls).toEqual([])
    expect(logger.warn).toHaveBeenCalledWith('No valid file history found')
  })

  it('keeps going when a reminder cannot be delivered', async () => {
    await saveRound()
    const service = new InMemoryCommunicationService({ failures: { sendMessage: [1] } })
    const progress: number[] = []

    const summary = await runReminder(createContext(service, (step) => progress.push(step)))

    expect(summary.reminded).toBe(1)
    expect(summary.failed).toEqual([['U1', 'U2']])
    expect(progress).toEqual([1, 1])
    expect(logger.info).toHaveBeenCalledWith('Sent 1 reminder')
  })

  it('aborts when a conversation cannot be inspected', async () => {
    await saveRound()
    const service = new InMemoryCommunicationService({ failures: { hasRecentExchange: [2] } })

    const error = await runReminder(createContext(service)).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(CommunicationError)
    expect(error).toMatchObject({ operation: 'hasRecentExchange' })
    expect(service.sentMessages).toEqual([
      { pair: ['U1', 'U2'], text: getMessages('en').reminder() },
    ])
  })
})

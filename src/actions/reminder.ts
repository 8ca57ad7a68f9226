/**
 * Reminder round: nudge the pairs of the last invitation that have not chatted yet
 * @module actions/reminder
 */

import type { Pair } from '../types/member.js'
import { getMessages } from '../messages/catalog.js'
import { toCommunicationError } from '../services/service-error.js'
import { Pacer } from '../services/resilience/pacing.js'
import { pluralize } from '../utils/text.js'
import { trySend } from './delivery.js'
import type { ActionContext } from './types.js'

/**
 * Messages a pair's conversation must hold to count as an actual chat:
 * four replies plus the invitation itself.
 */
export const REMINDER_MESSAGE_THRESHOLD = 5

/**
 * Outcome of a reminder round
 */
export interface ReminderSummary {
  /** History file the pairs came from, or null when there was none */
  historyFile: string | null
  /** Pairs whose conversation was inspected */
  checked: number
  /** Reminders delivered */
  reminded: number
  /** Pairs whose reminder could not be delivered */
  failed: Pair[]
}

/**
 * Runs a reminder round over the most recent history file of this configuration
 */
export async function runReminder(context: ActionContext): Promise<ReminderSummary> {
  const { config, service, history, logger } = context

  const historyFile = await history.findMostRecent()
  if (historyFile === null) {
    logger.warn('No valid file history found')
    return { historyFile: null, checked: 0, reminded: 0, failed: [] }
  }
  logger.info(`Working on: ${historyFile}`)

  const pairs = await history.load(historyFile)
  const text = getMessages(config.general.language).reminder()
  const pacer = new Pacer(config.pacing.sendDelayMs)
  const failed: Pair[] = []
  let reminded = 0
  let checked = 0

  for (const pair of pairs) {
    let chatted: boolean
    try {
      chatted = await service.hasRecentExchange(
        pair,
        config.slack.backtrackDays,
        REMINDER_MESSAGE_THRESHOLD
      )
    } catch (error) {
      throw toCommunicationError('hasRecentExchange', error, { pair: [...pair] })
    }
    checked++
    context.onProgress?.(1)

    if (chatted) {
      continue
    }

    logger.debug(`Sending reminder to: (${pair.join(', ')})`)
    await pacer.wait()
    if (await trySend(service, pair, text, logger)) {
      reminded++
    } else {
      failed.push(pair)
    }
  }

  logger.info(`Sent ${reminded} ${pluralize(reminded, 'reminder', 'reminders')}`)
  return { historyFile, checked, reminded, failed }
}

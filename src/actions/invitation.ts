/**
 * Invitation round: pair the channel members, invite every pair, record the round
 * @module actions/invitation
 */

import type { MemberId, Pair } from '../types/member.js'
import { createPairingStrategy } from '../core/pairing/strategy-factory.js'
import { getMessages } from '../messages/catalog.js'
import { toCommunicationError } from '../services/service-error.js'
import { Pacer } from '../services/resilience/pacing.js'
import { formatMemberList, pluralize } from '../utils/text.js'
import { trySend } from './delivery.js'
import type { ActionContext } from './types.js'

/**
 * Outcome of an invitation round
 */
export interface InvitationSummary {
  pairs: Pair[]
  ignored: MemberId[]
  /** Number of invitations delivered */
  sent: number
  /** Pairs whose invitation could not be delivered */
  failed: Pair[]
  /** History file holding the round */
  historyFile: string
}

/**
 * Runs an invitation round.
 *
 * Members of the configured channel (minus `ignoreUsers`) are paired with the
 * configured strategy, each pair receives the invitation, and the pairs are
 * saved for the reminder round. Failures while reading members or checking
 * recent exchanges abort the round; failed deliveries are only logged.
 */
export async function runInvitation(context: ActionContext): Promise<InvitationSummary> {
  const { config, service, history, logger } = context
  const { channelId, ignoreUsers } = config.slack

  let members: MemberId[]
  try {
    members = await service.listChannelMembers(channelId, ignoreUsers)
  } catch (error) {
    throw toCommunicationError('listChannelMembers', error, { channelId })
  }
  logger.info(`Found ${members.length} ${pluralize(members.length, 'member', 'members')} in ${channelId}`)

  const strategy = createPairingStrategy(config.general.generatorAlgorithmType)
  const { pairs, ignored } = await strategy.computePairs(members, service, {
    backtrackDays: config.slack.backtrackDays,
    backtrackMaxAttempts: config.slack.backtrackMaxAttempts,
    checkDelayMs: config.pacing.checkDelayMs,
    requestDelayMs: config.pacing.channelScanDelayMs,
    excluding: ignoreUsers,
    random: context.random,
    logger,
    onProgress: context.onProgress,
  })

  logger.debug(`Generated the pairs with ${strategy.name}: ${JSON.stringify(pairs)}`)
  if (ignored.length > 0) {
    logger.info(
      `The ${pluralize(ignored.length, 'user', 'users')} ${formatMemberList(ignored)} ` +
        `${pluralize(ignored.length, 'has', 'have')} been excluded from this round`
    )
  }

  const text = getMessages(config.general.language).invitation(channelId)
  const pacer = new Pacer(config.pacing.sendDelayMs)
  const failed: Pair[] = []
  let sent = 0

  for (const pair of pairs) {
    await pacer.wait()
    if (await trySend(service, pair, text, logger)) {
      sent++
    } else {
      failed.push(pair)
    }
  }

  const historyFile = await history.save(pairs, (context.now ?? (() => new Date()))())
  logger.info(`Generated ${pairs.length} ${pluralize(pairs.length, 'pair', 'pairs')}, saved to ${historyFile}`)

  return { pairs, ignored, sent, failed, historyFile }
}

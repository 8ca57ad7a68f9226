import type { GroupCommunicationService, Logger } from '../services/types.js'
import type { Pair } from '../types/member.js'

/**
 * Posts a message to a pair; a failure is logged as a warning and reported as false.
 * Delivery failures never abort a round.
 */
export async function trySend(
  service: GroupCommunicationService,
  pair: Pair,
  text: string,
  logger: Logger
): Promise<boolean> {
  try {
    await service.sendMessage(pair, text)
    return true
  } catch (error) {
    logger.warn(
      `Error sending message to the pair (${pair.join(', ')}), continuing with the next one`,
      { error: error instanceof Error ? error.message : String(error) }
    )
    return false
  }
}

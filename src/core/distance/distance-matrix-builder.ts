import type { GroupCommunicationService, Logger } from '../../services/types.js'
import type { MemberId, Roster } from '../../types/member.js'
import { DEFAULT_REQUEST_DELAY_MS } from '../../types/pairing.js'
import { toCommunicationError } from '../../services/service-error.js'
import { createSilentLogger } from '../../services/logger.js'
import { Pacer } from '../../services/resilience/pacing.js'
import { requireNonNegative } from '../../utils/errors.js'
import { DistanceMatrix } from './distance-matrix.js'

/**
 * Options for building a distance matrix
 */
export interface DistanceMatrixBuildOptions {
  /** Pause between consecutive service calls in milliseconds (default: 500) */
  requestDelayMs?: number

  /** Members hidden from every channel listing */
  excluding?: Iterable<MemberId>

  /** Logger for per-channel progress (default: silent) */
  logger?: Logger
}

/**
 * Builds the co-occurrence matrix of a roster by scanning every public channel.
 *
 * One `listPublicChannels` call is followed by one `listChannelMembers` call
 * per channel, strictly in sequence and spaced by `requestDelayMs`. For each
 * channel every pair of roster members found in it gains one unit of distance.
 *
 * @param service - Communication service to scan
 * @param roster - Sorted, deduplicated roster (see `createRoster`)
 * @param options - Pacing, exclusions and logging
 * @returns The populated matrix
 * @throws CommunicationError when any listing fails; no partial matrix is returned
 */
export async function buildDistanceMatrix(
  service: GroupCommunicationService,
  roster: Roster,
  options: DistanceMatrixBuildOptions = {}
): Promise<DistanceMatrix> {
  const matrix = new DistanceMatrix(roster)
  const logger = options.logger ?? createSilentLogger()
  const excluding = [...(options.excluding ?? [])]
  const pacer = new Pacer(
    requireNonNegative(options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS, 'requestDelayMs')
  )

  let channelIds: string[]
  try {
    await pacer.wait()
    channelIds = await service.listPublicChannels()
  } catch (error) {
    throw toCommunicationError('listPublicChannels', error)
  }

  logger.debug(`Scanning ${channelIds.length} channels for ${roster.length} members`)

  for (const channelId of channelIds) {
    let members: MemberId[]
    try {
      await pacer.wait()
      members = await service.listChannelMembers(channelId, excluding)
    } catch (error) {
      throw toCommunicationError('listChannelMembers', error, { channelId })
    }

    const indices = collectRosterIndices(matrix, members)
    for (let a = 0; a < indices.length; a++) {
      for (let b = a + 1; b < indices.length; b++) {
        matrix.incrementAt(indices[a], indices[b])
      }
    }

    logger.debug(`Channel ${channelId}: ${indices.length} roster members`)
  }

  return matrix
}

/**
 * Distinct roster positions of the given members, ascending
 */
function collectRosterIndices(matrix: DistanceMatrix, members: readonly MemberId[]): number[] {
  const indices = new Set<number>()
  for (const member of members) {
    const index = matrix.indexOf(member)
    if (index !== undefined) {
      indices.add(index)
    }
  }
  return [...indices].sort((a, b) => a - b)
}

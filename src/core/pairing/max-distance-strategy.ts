import type { GroupCommunicationService } from '../../services/types.js'
import type { MemberId, PairingResult } from '../../types/member.js'
import type { PairingOptions } from '../../types/pairing.js'
import { createRoster } from '../roster.js'
import { shuffleInPlace, takeRandom } from '../random.js'
import { buildDistanceMatrix } from '../distance/distance-matrix-builder.js'
import type { DistanceMatrix } from '../distance/distance-matrix.js'
import { EligibilityChecker } from './eligibility.js'
import { pairWorkingSet } from './pairing-loop.js'
import type { PairingStrategy } from './types.js'
import { resolvePairingOptions } from './types.js'

/**
 * Members sharing one distance value to the member being paired
 */
export interface DistanceGroup {
  distance: number
  members: MemberId[]
}

/**
 * Buckets candidates by their distance to `current`, smallest distance first.
 * Within a bucket candidates keep their working-set order.
 */
export function groupByDistance(
  current: MemberId,
  candidates: readonly MemberId[],
  matrix: DistanceMatrix
): DistanceGroup[] {
  const groups = new Map<number, MemberId[]>()
  for (const candidate of candidates) {
    const distance = matrix.distance(current, candidate)
    const group = groups.get(distance)
    if (group) {
      group.push(candidate)
    } else {
      groups.set(distance, [candidate])
    }
  }

  return [...groups]
    .sort(([a], [b]) => a - b)
    .map(([distance, members]) => ({ distance, members }))
}

/**
 * Distance-guided greedy pairing.
 *
 * Builds the channel co-occurrence matrix of the roster, then offers each
 * member the candidates it shares the fewest channels with first. Candidates
 * with a recent exchange are skipped, moving to the next distance bucket only
 * when the current one is exhausted; one retry budget covers the whole search.
 * The shuffle only breaks ties within a bucket.
 */
export class MaxDistancePairingStrategy implements PairingStrategy {
  readonly name = 'max-distance' as const

  async computePairs(
    roster: readonly MemberId[],
    service: GroupCommunicationService,
    options: PairingOptions
  ): Promise<PairingResult> {
    const resolved = resolvePairingOptions(options)
    const { random, logger, onProgress } = resolved
    const sortedRoster = createRoster(roster)

    const matrix = await buildDistanceMatrix(service, sortedRoster, {
      requestDelayMs: resolved.requestDelayMs,
      excluding: resolved.excluding,
      logger,
    })
    logger.debug(`Distance matrix built for ${matrix.size} members`)

    const checker = new EligibilityChecker(service, resolved)
    const workingSet = shuffleInPlace([...sortedRoster], random)

    return pairWorkingSet(
      workingSet,
      async (current, remaining) => {
        const search = checker.startSearch(current)

        for (const group of groupByDistance(current, remaining, matrix)) {
          while (search.canCheck) {
            const candidate = takeRandom(group.members, random)
            if (candidate === undefined) {
              break
            }
            if (await search.check(candidate)) {
              return candidate
            }
          }
          if (!search.canCheck) {
            break
          }
        }
        return undefined
      },
      { onProgress, logger }
    )
  }
}

import type { GroupCommunicationService } from '../../services/types.js'
import type { MemberId, PairingResult } from '../../types/member.js'
import type { PairingOptions } from '../../types/pairing.js'
import { createRoster } from '../roster.js'
import { shuffleInPlace, takeRandom } from '../random.js'
import { EligibilityChecker } from './eligibility.js'
import { pairWorkingSet } from './pairing-loop.js'
import type { PairingStrategy } from './types.js'
import { resolvePairingOptions } from './types.js'

/**
 * Randomized greedy pairing.
 *
 * The roster is shuffled, then each member in turn is offered random partners
 * from the rest of the working set, drawn without replacement, until one has no
 * recent exchange with it or the retry budget runs out.
 *
 * @example
 * ```typescript
 * const strategy = new SimplePairingStrategy()
 * const { pairs, ignored } = await strategy.computePairs(members, service, {
 *   backtrackDays: 180,
 *   backtrackMaxAttempts: 3,
 * })
 * ```
 */
export class SimplePairingStrategy implements PairingStrategy {
  readonly name = 'simple' as const

  async computePairs(
    roster: readonly MemberId[],
    service: GroupCommunicationService,
    options: PairingOptions
  ): Promise<PairingResult> {
    const resolved = resolvePairingOptions(options)
    const { random, logger, onProgress } = resolved
    const checker = new EligibilityChecker(service, resolved)

    const workingSet = shuffleInPlace([...createRoster(roster)], random)

    return pairWorkingSet(
      workingSet,
      async (current, remaining) => {
        const pool = [...remaining]
        const search = checker.startSearch(current)

        while (search.canCheck) {
          const candidate = takeRandom(pool, random)
          if (candidate === undefined) {
            break
          }
          if (await search.check(candidate)) {
            return candidate
          }
        }
        return undefined
      },
      { onProgress, logger }
    )
  }
}

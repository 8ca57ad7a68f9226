import type { MemberId, Pair, PairingResult } from '../../types/member.js'
import type { Logger } from '../../services/types.js'
import type { ProgressCallback } from '../../types/pairing.js'

/**
 * Finds a partner for `current` among `remaining`, or undefined.
 * Must not modify `remaining`.
 */
export type PartnerFinder = (
  current: MemberId,
  remaining: readonly MemberId[]
) => Promise<MemberId | undefined>

/**
 * Consumes a working set front to back: each member either gets a partner
 * from the rest of the set or is ignored, and a lone leftover is ignored.
 */
export async function pairWorkingSet(
  workingSet: MemberId[],
  findPartner: PartnerFinder,
  hooks: { onProgress: ProgressCallback; logger: Logger }
): Promise<PairingResult> {
  const pairs: Pair[] = []
  const ignored: MemberId[] = []

  while (workingSet.length > 1) {
    const [current] = workingSet.splice(0, 1)
    const partner = await findPartner(current, workingSet)

    if (partner === undefined) {
      hooks.logger.debug(`No valid pairs found for ${current}`)
      ignored.push(current)
      hooks.onProgress(1)
      continue
    }

    workingSet.splice(workingSet.indexOf(partner), 1)
    pairs.push([current, partner])
    hooks.onProgress(2)
  }

  // The leftover, if any, closes the progress count at the roster size
  hooks.onProgress(workingSet.length)
  ignored.push(...workingSet)

  return { pairs, ignored }
}

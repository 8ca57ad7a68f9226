import type { GroupCommunicationService, Logger } from '../../services/types.js'
import type { MemberId, PairingResult } from '../../types/member.js'
import type {
  GeneratorAlgorithmType,
  PairingOptions,
  ProgressCallback,
  RandomSource,
} from '../../types/pairing.js'
import {
  DEFAULT_CHECK_DELAY_MS,
  DEFAULT_REQUEST_DELAY_MS,
} from '../../types/pairing.js'
import { createSilentLogger } from '../../services/logger.js'
import { requireNonNegative, requireNonNegativeInteger } from '../../utils/errors.js'
import { defaultRandom } from '../random.js'

/**
 * Interface that all pairing strategies implement.
 * A strategy turns a roster into disjoint pairs plus the members left out.
 */
export interface PairingStrategy {
  /** Configuration name of this strategy */
  readonly name: GeneratorAlgorithmType

  /**
   * Pairs the members of a roster.
   *
   * @param roster - Members to pair; duplicates are collapsed, the input is never mutated
   * @param service - Capability used for recent-exchange checks (and channel scans)
   * @param options - Backtracking, pacing and randomness settings
   * @returns Pairs and ignored members, together covering the roster exactly once
   * @throws CommunicationError when a remote call fails
   * @throws InvalidParameterError when an option is out of range
   */
  computePairs(
    roster: readonly MemberId[],
    service: GroupCommunicationService,
    options: PairingOptions
  ): Promise<PairingResult>
}

/**
 * Pairing options with every default applied
 */
export interface ResolvedPairingOptions {
  backtrackDays: number
  backtrackMaxAttempts: number
  checkDelayMs: number
  requestDelayMs: number
  excluding: MemberId[]
  random: RandomSource
  logger: Logger
  onProgress: ProgressCallback
}

/**
 * Validates pairing options and fills in defaults
 */
export function resolvePairingOptions(options: PairingOptions): ResolvedPairingOptions {
  return {
    backtrackDays: requireNonNegativeInteger(options.backtrackDays, 'backtrackDays'),
    backtrackMaxAttempts: requireNonNegativeInteger(
      options.backtrackMaxAttempts,
      'backtrackMaxAttempts'
    ),
    checkDelayMs: requireNonNegative(options.checkDelayMs ?? DEFAULT_CHECK_DELAY_MS, 'checkDelayMs'),
    requestDelayMs: requireNonNegative(
      options.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS,
      'requestDelayMs'
    ),
    excluding: [...(options.excluding ?? [])],
    random: options.random ?? defaultRandom,
    logger: options.logger ?? createSilentLogger(),
    onProgress: options.onProgress ?? (() => {}),
  }
}

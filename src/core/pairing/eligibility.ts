/**
 * Recent-exchange checks with a bounded retry budget
 * @module core/pairing/eligibility
 */

import type { GroupCommunicationService, Logger } from '../../services/types.js'
import type { MemberId, Pair } from '../../types/member.js'
import { toCommunicationError } from '../../services/service-error.js'
import { sleep } from '../../services/resilience/pacing.js'

/**
 * Settings for eligibility checks
 */
export interface EligibilityCheckerConfig {
  /** Day window searched for a recent exchange */
  backtrackDays: number

  /** Retries allowed after the first rejected candidate */
  backtrackMaxAttempts: number

  /** Pause before every retried check, in milliseconds */
  checkDelayMs: number

  logger: Logger
}

/**
 * Decides whether two members may be paired: they may when the service finds
 * no recent exchange between them.
 */
export class EligibilityChecker {
  private service: GroupCommunicationService
  private config: EligibilityCheckerConfig

  constructor(service: GroupCommunicationService, config: EligibilityCheckerConfig) {
    this.service = service
    this.config = config
  }

  /**
   * Starts the partner search for one member.
   * The returned search allows one initial check plus `backtrackMaxAttempts` retries.
   */
  startSearch(current: MemberId): CandidateSearch {
    return new CandidateSearch(current, this, this.config.backtrackMaxAttempts + 1)
  }

  /** Pause applied before retried checks */
  get retryDelayMs(): number {
    return this.config.checkDelayMs
  }

  /**
   * Asks the service whether the pair exchanged messages recently
   *
   * @throws CommunicationError when the service call fails
   */
  async hasRecentExchange(pair: Pair): Promise<boolean> {
    try {
      return await this.service.hasRecentExchange(pair, this.config.backtrackDays)
    } catch (error) {
      throw toCommunicationError('hasRecentExchange', error, { pair: [...pair] })
    }
  }

  get logger(): Logger {
    return this.config.logger
  }
}

/**
 * Partner search for a single member, tracking how many checks remain
 */
export class CandidateSearch {
  readonly current: MemberId
  private checker: EligibilityChecker
  private maxChecks: number
  private checks = 0

  constructor(current: MemberId, checker: EligibilityChecker, maxChecks: number) {
    this.current = current
    this.checker = checker
    this.maxChecks = maxChecks
  }

  /** Whether the retry budget still allows a check */
  get canCheck(): boolean {
    return this.checks < this.maxChecks
  }

  /** Number of checks performed so far */
  get checkCount(): number {
    return this.checks
  }

  /**
   * Checks one candidate, pausing first if this is a retry
   *
   * @returns true when the candidate is an eligible partner
   */
  async check(candidate: MemberId): Promise<boolean> {
    if (this.checks > 0) {
      await sleep(this.checker.retryDelayMs)
    }
    this.checks++

    const recent = await this.checker.hasRecentExchange([this.current, candidate])
    if (recent) {
      this.checker.logger.debug(
        `Found recent chat for (${this.current}, ${candidate}), trying another candidate`
      )
    }
    return !recent
  }
}

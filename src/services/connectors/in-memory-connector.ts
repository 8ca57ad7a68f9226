/**
 * In-memory communication service
 * Scriptable stand-in for a chat platform, for tests and dry runs
 * @module services/connectors/in-memory-connector
 */

import type { GroupCommunicationService, CommunicationOperation } from '../types.js'
import type { ChannelId, MemberId, Pair } from '../../types/member.js'
import { CommunicationError } from '../service-error.js'
import { canonicalPair } from '../../core/roster.js'

/**
 * Decides whether a pair exchanged at least `threshold` messages in `withinDays` days
 */
export type RecentExchangeFn = (pair: Pair, withinDays: number, threshold: number) => boolean

/**
 * Configuration for the in-memory service
 */
export interface InMemoryCommunicationConfig {
  /** Channel memberships, keyed by channel id, in listing order */
  channels?: Record<ChannelId, MemberId[]>

  /** Channels hidden from `listPublicChannels` but readable by id */
  privateChannels?: Record<ChannelId, MemberId[]>

  /**
   * Number of recent messages per pair, keyed by `pairKey`.
   * Ignored when `recentExchange` is given.
   */
  recentMessageCounts?: Record<string, number>

  /** Custom recent-exchange decision */
  recentExchange?: RecentExchangeFn

  /** Operations that fail, optionally only for specific calls (1-based call numbers) */
  failures?: Partial<Record<CommunicationOperation, true | number[]>>
}

/**
 * Call history entry
 */
export type InMemoryCallEntry =
  | { operation: 'listPublicChannels' }
  | { operation: 'listChannelMembers'; channelId: ChannelId; excluding: MemberId[] }
  | { operation: 'hasRecentExchange'; pair: Pair; withinDays: number; threshold: number }
  | { operation: 'sendMessage'; pair: Pair; text: string }

/**
 * Message delivered through `sendMessage`
 */
export interface SentMessage {
  pair: Pair
  text: string
}

/**
 * Key used for per-pair settings, independent of member order
 */
export function pairKey(a: MemberId, b: MemberId): string {
  return canonicalPair(a, b).join(':')
}

/**
 * Communication service held entirely in memory.
 *
 * @example
 * ```typescript
 * const service = new InMemoryCommunicationService({
 *   channels: { C1: ['U1', 'U2'], C2: ['U1', 'U2', 'U3'] },
 *   recentMessageCounts: { [pairKey('U1', 'U2')]: 3 },
 * })
 * await service.hasRecentExchange(['U2', 'U1'], 180) // true
 * ```
 */
export class InMemoryCommunicationService implements GroupCommunicationService {
  private config: InMemoryCommunicationConfig
  private callLog: InMemoryCallEntry[] = []
  private sent: SentMessage[] = []
  private callCounts = new Map<CommunicationOperation, number>()

  constructor(config: InMemoryCommunicationConfig = {}) {
    this.config = config
  }

  async listPublicChannels(): Promise<ChannelId[]> {
    this.record({ operation: 'listPublicChannels' })
    return Object.keys(this.config.channels ?? {})
  }

  async listChannelMembers(
    channelId: ChannelId,
    excluding: Iterable<MemberId> = []
  ): Promise<MemberId[]> {
    const excluded = [...excluding]
    this.record({ operation: 'listChannelMembers', channelId, excluding: excluded })

    const members = this.config.channels?.[channelId] ?? this.config.privateChannels?.[channelId]
    if (!members) {
      throw new CommunicationError('listChannelMembers', 'channel_not_found', undefined, {
        channelId,
      })
    }
    return members.filter((member) => !excluded.includes(member))
  }

  async hasRecentExchange(
    pair: Pair,
    withinDays: number,
    messageCountThreshold = 1
  ): Promise<boolean> {
    this.record({
      operation: 'hasRecentExchange',
      pair,
      withinDays,
      threshold: messageCountThreshold,
    })

    if (this.config.recentExchange) {
      return this.config.recentExchange(pair, withinDays, messageCountThreshold)
    }
    const count = this.config.recentMessageCounts?.[pairKey(pair[0], pair[1])] ?? 0
    return count >= messageCountThreshold
  }

  async sendMessage(pair: Pair, text: string): Promise<void> {
    this.record({ operation: 'sendMessage', pair, text })
    this.sent.push({ pair, text })
  }

  /** Every call received, in order */
  get calls(): readonly InMemoryCallEntry[] {
    return this.callLog
  }

  /** Messages successfully delivered */
  get sentMessages(): readonly SentMessage[] {
    return this.sent
  }

  /** Pairs passed to `hasRecentExchange`, in order */
  get checkedPairs(): Pair[] {
    return this.callLog.flatMap((entry) =>
      entry.operation === 'hasRecentExchange' ? [entry.pair] : []
    )
  }

  /**
   * Number of calls made to an operation
   */
  countCalls(operation: CommunicationOperation): number {
    return this.callCounts.get(operation) ?? 0
  }

  private record(entry: InMemoryCallEntry): void {
    const callNumber = this.countCalls(entry.operation) + 1
    this.callCounts.set(entry.operation, callNumber)
    this.callLog.push(entry)

    const failure = this.config.failures?.[entry.operation]
    if (failure === true || (Array.isArray(failure) && failure.includes(callNumber))) {
      throw new CommunicationError(entry.operation, 'simulated failure', undefined, {
        callNumber,
      })
    }
  }
}

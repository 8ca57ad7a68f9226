/**
 * Group communication service type definitions
 * @module services/types
 */

import type { ChannelId, MemberId, Pair } from '../types/member.js'

/**
 * Logger interface used across pairing, actions and connectors
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Log levels in increasing order of severity
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/**
 * Operations of the group communication service, used to tag failures
 */
export type CommunicationOperation =
  | 'listPublicChannels'
  | 'listChannelMembers'
  | 'hasRecentExchange'
  | 'sendMessage'

/**
 * Capability the pairing core and the actions consume.
 * Every operation rejects with a `CommunicationError` on remote failure.
 */
export interface GroupCommunicationService {
  /**
   * Lists every public, non-archived channel visible to the service.
   * Pagination is handled by the implementation.
   */
  listPublicChannels(): Promise<ChannelId[]>

  /**
   * Lists the members of a channel, leaving out the `excluding` members.
   */
  listChannelMembers(
    channelId: ChannelId,
    excluding?: Iterable<MemberId>
  ): Promise<MemberId[]>

  /**
   * Whether the two members exchanged at least `messageCountThreshold`
   * messages (default 1) in their shared conversation within `withinDays` days.
   */
  hasRecentExchange(
    pair: Pair,
    withinDays: number,
    messageCountThreshold?: number
  ): Promise<boolean>

  /**
   * Opens (or reuses) the group conversation of the pair and posts `text`.
   */
  sendMessage(pair: Pair, text: string): Promise<void>
}

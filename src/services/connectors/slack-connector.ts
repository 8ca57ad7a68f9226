/**
 * Slack implementation of the group communication service
 * @module services/connectors/slack-connector
 */

import { WebClient } from '@slack/web-api'
import type {
  ChatPostMessageResponse,
  ConversationsHistoryResponse,
  ConversationsListResponse,
  ConversationsMembersResponse,
  ConversationsOpenResponse,
} from '@slack/web-api'
import type { GroupCommunicationService, Logger } from '../types.js'
import type { ChannelId, MemberId, Pair } from '../../types/member.js'
import { toCommunicationError } from '../service-error.js'
import { ConfigurationError } from '../../utils/errors.js'
import { createSilentLogger } from '../logger.js'
import { Pacer } from '../resilience/pacing.js'

/**
 * The subset of the Slack Web API used by the connector.
 * `WebClient` satisfies it; tests pass a scripted object.
 */
export interface SlackWebApi {
  conversations: {
    list(args: {
      types: string
      exclude_archived: boolean
      limit?: number
      cursor?: string
    }): Promise<ConversationsListResponse>
    members(args: {
      channel: string
      limit?: number
      cursor?: string
    }): Promise<ConversationsMembersResponse>
    open(args: { users: string }): Promise<ConversationsOpenResponse>
    history(args: {
      channel: string
      oldest: string
      limit: number
    }): Promise<ConversationsHistoryResponse>
  }
  chat: {
    postMessage(args: { channel: string; text: string }): Promise<ChatPostMessageResponse>
  }
}

/**
 * Configuration for the Slack connector
 */
export interface SlackConnectorConfig {
  /** Bot token; required unless `client` is given */
  apiToken?: string

  /** Pre-built client, used instead of creating one from the token */
  client?: SlackWebApi

  /** When on, conversations are opened but no message is posted */
  testMode?: boolean

  /** Pause between paginated requests in milliseconds (default: 500) */
  pageDelayMs?: number

  /** Page size requested from list endpoints (default: 100) */
  pageSize?: number

  /** Clock used to compute the history window */
  now?: () => Date

  logger?: Logger
}

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Talks to Slack through the official Web API client.
 *
 * @example
 * ```typescript
 * const slack = new SlackConnector({ apiToken: process.env.SLACK_API_TOKEN })
 * const members = await slack.listChannelMembers('C0123456789', ['U0BOT'])
 * ```
 */
export class SlackConnector implements GroupCommunicationService {
  private client: SlackWebApi
  private testMode: boolean
  private pageDelayMs: number
  private pageSize: number
  private now: () => Date
  private logger: Logger

  constructor(config: SlackConnectorConfig) {
    if (config.client) {
      this.client = config.client
    } else if (config.apiToken) {
      this.client = new WebClient(config.apiToken)
    } else {
      throw new ConfigurationError('A Slack API token or client is required', 'slack.apiToken')
    }
    this.testMode = config.testMode ?? false
    this.pageDelayMs = config.pageDelayMs ?? 500
    this.pageSize = config.pageSize ?? 100
    this.now = config.now ?? (() => new Date())
    this.logger = config.logger ?? createSilentLogger()
  }

  /**
   * Lists the ids of every public, non-archived channel.
   * https://api.slack.com/methods/conversations.list
   */
  async listPublicChannels(): Promise<ChannelId[]> {
    const channelIds: ChannelId[] = []
    const pacer = new Pacer(this.pageDelayMs)
    let cursor: string | undefined

    try {
      do {
        await pacer.wait()
        const response = await this.client.conversations.list({
          types: 'public_channel',
          exclude_archived: true,
          limit: this.pageSize,
          cursor,
        })
        for (const channel of response.channels ?? []) {
          if (channel.id) {
            channelIds.push(channel.id)
          }
        }
        cursor = response.response_metadata?.next_cursor || undefined
      } while (cursor)
    } catch (error) {
      throw toCommunicationError('listPublicChannels', error)
    }

    this.logger.debug(`Found ${channelIds.length} public channels in ${pacer.callCount} pages`)
    return channelIds
  }

  /**
   * Lists the members of a channel, leaving out `excluding`.
   * https://api.slack.com/methods/conversations.members
   */
  async listChannelMembers(
    channelId: ChannelId,
    excluding: Iterable<MemberId> = []
  ): Promise<MemberId[]> {
    const excluded = new Set(excluding)
    const members: MemberId[] = []
    const pacer = new Pacer(this.pageDelayMs)
    let cursor: string | undefined

    try {
      do {
        await pacer.wait()
        const response = await this.client.conversations.members({
          channel: channelId,
          limit: this.pageSize,
          cursor,
        })
        members.push(...(response.members ?? []))
        cursor = response.response_metadata?.next_cursor || undefined
      } while (cursor)
    } catch (error) {
      throw toCommunicationError('listChannelMembers', error, { channelId })
    }

    return members.filter((member) => !excluded.has(member))
  }

  /**
   * Opens the pair's group conversation and posts the message, unless in test mode.
   * https://api.slack.com/methods/conversations.open
   * https://api.slack.com/methods/chat.postMessage
   */
  async sendMessage(pair: Pair, text: string): Promise<void> {
    try {
      const channelId = await this.openConversation(pair)
      if (this.testMode) {
        this.logger.debug(`Test mode: message to (${pair.join(', ')}) not posted`)
        return
      }
      await this.client.chat.postMessage({ channel: channelId, text })
    } catch (error) {
      throw toCommunicationError('sendMessage', error, { pair: [...pair] })
    }
  }

  /**
   * Whether the pair's conversation holds at least `messageCountThreshold`
   * messages newer than `withinDays` days. Only that many messages are requested.
   * https://api.slack.com/methods/conversations.history
   */
  async hasRecentExchange(
    pair: Pair,
    withinDays: number,
    messageCountThreshold = 1
  ): Promise<boolean> {
    try {
      const channelId = await this.openConversation(pair)
      const oldest = (this.now().getTime() - withinDays * DAY_MS) / 1000

      const response = await this.client.conversations.history({
        channel: channelId,
        oldest: String(oldest),
        limit: messageCountThreshold,
      })
      return (response.messages ?? []).length >= messageCountThreshold
    } catch (error) {
      throw toCommunicationError('hasRecentExchange', error, { pair: [...pair] })
    }
  }

  private async openConversation(pair: Pair): Promise<string> {
    const response = await this.client.conversations.open({ users: pair.join(',') })
    const channelId = response.channel?.id
    if (!channelId) {
      throw new Error(`conversations.open returned no channel for (${pair.join(', ')})`)
    }
    return channelId
  }
}

/**
 * Tests for the in-memory communication service
 */

import { describe, it, expect } from 'vitest'
import { InMemoryCommunicationService, pairKey } from './in-memory-connector.js'
import { CommunicationError } from '../service-error.js'

describe('InMemoryCommunicationService', () => {
  it('lists public channels in declaration order', async () => {
    const service = new InMemoryCommunicationService({
      channels: { C2: ['U1'], C1: ['U2'] },
      privateChannels: { G1: ['U3'] },
    })

    expect(await service.listPublicChannels()).toEqual(['C2', 'C1'])
  })

  it('lists members of public and private channels minus exclusions', async () => {
    const service = new InMemoryCommunicationService({
      channels: { C1: ['U1', 'UBOT', 'U2'] },
      privateChannels: { G1: ['U3', 'UBOT'] },
    })

    expect(await service.listChannelMembers('C1', ['UBOT'])).toEqual(['U1', 'U2'])
    expect(await service.listChannelMembers('G1', new Set(['UBOT']))).toEqual(['U3'])
  })

  it('fails for unknown channels', async () => {
    const service = new InMemoryCommunicationService()

    await expect(service.listChannelMembers('C404')).rejects.toThrow(
      "Communication error in 'listChannelMembers': channel_not_found"
    )
  })

  it('compares recent message counts with the threshold in either member order', async () => {
    const service = new InMemoryCommunicationService({
      recentMessageCounts: { [pairKey('U2', 'U1')]: 3 },
    })

    expect(pairKey('U2', 'U1')).toBe('U1:U2')
    expect(await service.hasRecentExchange(['U2', 'U1'], 180)).toBe(true)
    expect(await service.hasRecentExchange(['U1', 'U2'], 180, 3)).toBe(true)
    expect(await service.hasRecentExchange(['U1', 'U2'], 180, 4)).toBe(false)
    expect(await service.hasRecentExchange(['U1', 'U3'], 180)).toBe(false)
  })

  it('delegates to a custom decision', async () => {
    const service = new InMemoryCommunicationService({
      recentExchange: (pair, withinDays, threshold) =>
        pair.includes('U1') && withinDays > 30 && threshold === 5,
    })

    expect(await service.hasRecentExchange(['U1', 'U2'], 180, 5)).toBe(true)
    expect(await service.hasRecentExchange(['U1', 'U2'], 7, 5)).toBe(false)
  })

  it('records sent messages and calls', async () => {
    const service = new InMemoryCommunicationService()

    await service.sendMessage(['U1', 'U2'], 'hello')

    expect(service.sentMessages).toEqual([{ pair: ['U1', 'U2'], text: 'hello' }])
    expect(service.calls).toEqual([{ operation: 'sendMessage', pair: ['U1', 'U2'], text: 'hello' }])
    expect(service.countCalls('sendMessage')).toBe(1)
    expect(service.countCalls('listPublicChannels')).toBe(0)
  })

  it('fails the configured calls only', async () => {
    const service = new InMemoryCommunicationService({ failures: { sendMessage: [2] } })

    await service.sendMessage(['U1', 'U2'], 'first')
    const error = await service.sendMessage(['U3', 'U4'], 'second').catch((caught: unknown) => caught)
    await service.sendMessage(['U5', 'U6'], 'third')

    expect(error).toBeInstanceOf(CommunicationError)
    expect(error).toMatchObject({
      message: "Communication error in 'sendMessage': simulated failure",
      context: { operation: 'sendMessage', callNumber: 2 },
    })
    expect(service.sentMessages.map((message) => message.text)).toEqual(['first', 'third'])
    expect(service.countCalls('sendMessage')).toBe(3)
  })

  it('fails every call when configured with true', async () => {
    const service = new InMemoryCommunicationService({ failures: { listPublicChannels: true } })

    await expect(service.listPublicChannels()).rejects.toBeInstanceOf(CommunicationError)
    await expect(service.listPublicChannels()).rejects.toBeInstanceOf(CommunicationError)
  })
})

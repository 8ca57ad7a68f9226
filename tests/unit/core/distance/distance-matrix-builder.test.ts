/**
 * Unit tests for building the distance matrix from channel memberships
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { buildDistanceMatrix } from '../../../../src/core/distance/distance-matrix-builder.js'
import { createRoster } from '../../../../src/core/roster.js'
import { InMemoryCommunicationService } from '../../../../src/services/connectors/in-memory-connector.js'
import { CommunicationError } from '../../../../src/services/service-error.js'
import type { GroupCommunicationService } from '../../../../src/services/types.js'

const roster = createRoster(['U1', 'U2', 'U3', 'U4'])

describe('buildDistanceMatrix', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('counts the channels shared by every pair', async () => {
    const service = new InMemoryCommunicationService({
      channels: {
        C1: ['U1', 'U2', 'U4'],
        C2: ['U2', 'U1'],
        C3: ['U3', 'U2'],
      },
    })

    const matrix = await buildDistanceMatrix(service, roster, { requestDelayMs: 0 })

    expect(matrix.toArray()).toEqual([
      [0, 2, 0, 1],
      [2, 0, 1, 1],
      [0, 1, 0, 0],
      [1, 1, 0, 0],
    ])
  })

  it('ignores members outside the roster and repeated listings', async () => {
    const service = new InMemoryCommunicationService({
      channels: { C1: ['U1', 'U1', 'U2', 'U9'] },
    })

    const matrix = await buildDistanceMatrix(service, roster, { requestDelayMs: 0 })

    expect(matrix.distance('U1', 'U2')).toBe(1)
    expect(matrix.distance('U1', 'U3')).toBe(0)
  })

  it('lists channels once and every channel once, forwarding exclusions', async () => {
    const service = new InMemoryCommunicationService({
      channels: { C1: ['U1', 'U2', 'UBOT'], C2: ['U3', 'UBOT'] },
    })

    await buildDistanceMatrix(service, roster, { requestDelayMs: 0, excluding: ['UBOT'] })

    expect(service.calls).toEqual([
      { operation: 'listPublicChannels' },
      { operation: 'listChannelMembers', channelId: 'C1', excluding: ['UBOT'] },
      { operation: 'listChannelMembers', channelId: 'C2', excluding: ['UBOT'] },
    ])
  })

  it('returns an empty matrix when there are no channels', async () => {
    const service = new InMemoryCommunicationService()

    const matrix = await buildDistanceMatrix(service, roster, { requestDelayMs: 0 })

    expect(matrix.distance('U1', 'U4')).toBe(0)
  })

  it('fails without a partial result when a channel listing fails', async () => {
    const service = new InMemoryCommunicationService({
      channels: { C1: ['U1', 'U2'], C2: ['U1', 'U3'], C3: ['U2', 'U3'] },
      failures: { listChannelMembers: [2] },
    })

    const error = await buildDistanceMatrix(service, roster, { requestDelayMs: 0 }).catch(
      (caught: unknown) => caught
    )

    expect(error).toBeInstanceOf(CommunicationError)
    expect(error).toMatchObject({ operation: 'listChannelMembers' })
    expect(service.countCalls('listChannelMembers')).toBe(2)
  })

  it('wraps foreign errors from the channel listing', async () => {
    const cause = new Error('socket hang up')
    const service: GroupCommunicationService = {
      listPublicChannels: () => Promise.reject(cause),
      listChannelMembers: async () => [],
      hasRecentExchange: async () => false,
      sendMessage: async () => {},
    }

    const error = await buildDistanceMatrix(service, roster, { requestDelayMs: 0 }).catch(
      (caught: unknown) => caught
    )

    expect(error).toBeInstanceOf(CommunicationError)
    expect(error).toMatchObject({
      operation: 'listPublicChannels',
      message: "Communication error in 'listPublicChannels': socket hang up",
      cause,
    })
  })

  it('spaces out consecutive requests', async () => {
    vi.useFakeTimers()
    const service = new InMemoryCommunicationService({
      channels: { C1: ['U1', 'U2'], C2: ['U1', 'U2'] },
    })

    const promise = buildDistanceMatrix(service, roster, { requestDelayMs: 500 })

    await vi.advanceTimersByTimeAsync(0)
    expect(service.countCalls('listPublicChannels')).toBe(1)
    expect(service.countCalls('listChannelMembers')).toBe(0)

    await vi.advanceTimersByTimeAsync(500)
    expect(service.countCalls('listChannelMembers')).toBe(1)

    await vi.advanceTimersByTimeAsync(500)
    expect(service.countCalls('listChannelMembers')).toBe(2)

    const matrix = await promise
    expect(matrix.distance('U1', 'U2')).toBe(2)
  })

  it('rejects a negative delay', async () => {
    const service = new InMemoryCommunicationService()

    await expect(buildDistanceMatrix(service, roster, { requestDelayMs: -1 })).rejects.toThrow(
      "Invalid parameter 'requestDelayMs'"
    )
    expect(service.calls).toEqual([])
  })
})

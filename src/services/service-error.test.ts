/**
 * Tests for communication error helpers
 */

import { describe, it, expect } from 'vitest'
import {
  CommunicationError,
  isCommunicationError,
  toCommunicationError,
} from './service-error.js'
import { CoffeePairingError } from '../utils/errors.js'

describe('CommunicationError', () => {
  it('creates error with operation and cause', () => {
    const cause = new Error('channel_not_found')
    const error = new CommunicationError('listChannelMembers', 'channel_not_found', cause, {
      channelId: 'C001',
    })

    expect(error.message).toBe("Communication error in 'listChannelMembers': channel_not_found")
    expect(error.code).toBe('COMMUNICATION_ERROR')
    expect(error.operation).toBe('listChannelMembers')
    expect(error.cause).toBe(cause)
    expect(error.context).toEqual({ operation: 'listChannelMembers', channelId: 'C001' })
    expect(error.name).toBe('CommunicationError')
    expect(error).toBeInstanceOf(CoffeePairingError)
    expect(error).toBeInstanceOf(Error)
  })

  it('has proper stack trace', () => {
    const error = new CommunicationError('sendMessage', 'boom')
    expect(error.stack).toBeDefined()
  })
})

describe('isCommunicationError', () => {
  it('recognizes communication errors only', () => {
    expect(isCommunicationError(new CommunicationError('sendMessage', 'x'))).toBe(true)
    expect(isCommunicationError(new Error('x'))).toBe(false)
    expect(isCommunicationError('x')).toBe(false)
  })
})

describe('toCommunicationError', () => {
  it('returns existing communication errors unchanged', () => {
    const original = new CommunicationError('hasRecentExchange', 'ratelimited')
    expect(toCommunicationError('sendMessage', original)).toBe(original)
  })

  it('wraps plain errors and keeps them as cause', () => {
    const cause = new Error('socket hang up')
    const error = toCommunicationError('listPublicChannels', cause)

    expect(error.operation).toBe('listPublicChannels')
    expect(error.message).toBe("Communication error in 'listPublicChannels': socket hang up")
    expect(error.cause).toBe(cause)
  })

  it('wraps non-error values', () => {
    const error = toCommunicationError('sendMessage', 'not_in_channel')

    expect(error.message).toBe("Communication error in 'sendMessage': not_in_channel")
    expect(error.cause).toBe('not_in_channel')
  })
})

/**
 * Unit tests for roster helpers
 */

import { describe, it, expect } from 'vitest'
import {
  canonicalPair,
  checkPartition,
  compareMembers,
  createRoster,
  isPartitionOf,
  isRoster,
} from '../../../src/core/roster.js'

describe('createRoster', () => {
  it('sorts and deduplicates members', () => {
    expect(createRoster(['U3', 'U1', 'U3', 'U2'])).toEqual(['U1', 'U2', 'U3'])
  })

  it('returns a frozen copy and leaves the input alone', () => {
    const input = ['U2', 'U1']
    const roster = createRoster(input)

    expect(Object.isFrozen(roster)).toBe(true)
    expect(input).toEqual(['U2', 'U1'])
  })

  it('orders by code unit rather than locale or numeric value', () => {
    expect(createRoster(['U2', 'U10', 'a', 'B'])).toEqual(['B', 'U10', 'U2', 'a'])
  })
})

describe('compareMembers', () => {
  it('returns the sign of the comparison', () => {
    expect(compareMembers('U1', 'U2')).toBe(-1)
    expect(compareMembers('U2', 'U1')).toBe(1)
    expect(compareMembers('U1', 'U1')).toBe(0)
  })
})

describe('isRoster', () => {
  it('accepts strictly increasing sequences', () => {
    expect(isRoster([])).toBe(true)
    expect(isRoster(['U1'])).toBe(true)
    expect(isRoster(['U1', 'U2', 'U3'])).toBe(true)
  })

  it('rejects unsorted or duplicated sequences', () => {
    expect(isRoster(['U2', 'U1'])).toBe(false)
    expect(isRoster(['U1', 'U1'])).toBe(false)
  })
})

describe('canonicalPair', () => {
  it('puts the smaller member first', () => {
    expect(canonicalPair('U2', 'U1')).toEqual(['U1', 'U2'])
    expect(canonicalPair('U1', 'U2')).toEqual(['U1', 'U2'])
  })
})

describe('checkPartition', () => {
  const roster = ['U1', 'U2', 'U3', 'U4']

  it('reports nothing for a valid partition', () => {
    const result = { pairs: [['U1', 'U3'] as const, ['U4', 'U2'] as const], ignored: [] }

    expect(checkPartition(roster, result)).toEqual({
      missing: [],
      duplicated: [],
      unknown: [],
      selfPairs: [],
    })
    expect(isPartitionOf(roster, result)).toBe(true)
  })

  it('reports every kind of problem', () => {
    const result = {
      pairs: [['U1', 'U1'] as const, ['U2', 'U9'] as const],
      ignored: ['U2'],
    }

    expect(checkPartition(roster, result)).toEqual({
      missing: ['U3', 'U4'],
      duplicated: ['U1', 'U2'],
      unknown: ['U9'],
      selfPairs: [['U1', 'U1']],
    })
    expect(isPartitionOf(roster, result)).toBe(false)
  })
})

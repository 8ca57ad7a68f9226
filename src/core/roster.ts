/**
 * Roster construction and pairing-result invariants
 * @module core/roster
 */

import type { MemberId, Pair, PairingResult, Roster } from '../types/member.js'

/**
 * Lexicographic comparison by UTF-16 code units, independent of locale
 */
export function compareMembers(a: MemberId, b: MemberId): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Builds the deduplicated, sorted and frozen roster for one run
 */
export function createRoster(members: Iterable<MemberId>): Roster {
  return Object.freeze([...new Set(members)].sort(compareMembers))
}

/**
 * Whether a sequence is strictly increasing, i.e. sorted without duplicates
 */
export function isRoster(members: readonly MemberId[]): boolean {
  for (let i = 1; i < members.length; i++) {
    if (compareMembers(members[i - 1], members[i]) >= 0) {
      return false
    }
  }
  return true
}

/**
 * Orders a pair with the lexicographically smaller member first
 */
export function canonicalPair(a: MemberId, b: MemberId): Pair {
  return compareMembers(a, b) <= 0 ? [a, b] : [b, a]
}

/**
 * Problems found when checking a result against its roster
 */
export interface PartitionReport {
  /** Roster members absent from the result */
  missing: MemberId[]
  /** Members placed more than once */
  duplicated: MemberId[]
  /** Members in the result that are not in the roster */
  unknown: MemberId[]
  /** Pairs joining a member with itself */
  selfPairs: Pair[]
}

/**
 * Checks that every roster member appears exactly once across pairs and ignored
 */
export function checkPartition(roster: readonly MemberId[], result: PairingResult): PartitionReport {
  const expected = new Set(roster)
  const seen = new Map<MemberId, number>()
  const selfPairs: Pair[] = []

  const placed = [...result.pairs.flat(), ...result.ignored]
  for (const member of placed) {
    seen.set(member, (seen.get(member) ?? 0) + 1)
  }
  for (const pair of result.pairs) {
    if (pair[0] === pair[1]) {
      selfPairs.push(pair)
    }
  }

  return {
    missing: [...expected].filter((member) => !seen.has(member)),
    duplicated: [...seen].filter(([, count]) => count > 1).map(([member]) => member),
    unknown: [...seen.keys()].filter((member) => !expected.has(member)),
    selfPairs,
  }
}

/**
 * Whether a result places every roster member exactly once
 */
export function isPartitionOf(roster: readonly MemberId[], result: PairingResult): boolean {
  const report = checkPartition(roster, result)
  return (
    report.missing.length === 0 &&
    report.duplicated.length === 0 &&
    report.unknown.length === 0 &&
    report.selfPairs.length === 0
  )
}

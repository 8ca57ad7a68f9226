import type { MemberId, Roster } from '../../types/member.js'
import { InvalidParameterError } from '../../utils/errors.js'
import { isRoster } from '../roster.js'

/**
 * Symmetric co-occurrence counts between roster members.
 *
 * Only the upper triangle (diagonal included) is stored, row by row, in a
 * dense array of `n(n+1)/2` cells. Row and column indices are roster
 * positions, so the roster must stay sorted and unchanged for the lifetime
 * of the matrix.
 *
 * @example
 * ```typescript
 * const matrix = new DistanceMatrix(createRoster(['U2', 'U1', 'U3']))
 * matrix.increment('U3', 'U1')
 * matrix.distance('U1', 'U3') // 1
 * ```
 */
export class DistanceMatrix {
  readonly roster: Roster
  private readonly cells: Uint32Array
  private readonly positions: Map<MemberId, number>

  constructor(roster: Roster) {
    if (!isRoster(roster)) {
      throw new InvalidParameterError(
        'roster',
        roster,
        'must be sorted and free of duplicates'
      )
    }
    const n = roster.length
    this.roster = roster
    this.cells = new Uint32Array((n * (n + 1)) / 2)
    this.positions = new Map(roster.map((member, index) => [member, index]))
  }

  /** Number of roster members (rows) */
  get size(): number {
    return this.roster.length
  }

  /**
   * Roster position of a member, or undefined when not in the roster
   */
  indexOf(member: MemberId): number | undefined {
    return this.positions.get(member)
  }

  /**
   * Adds one co-occurrence between the members at two roster positions
   */
  incrementAt(i: number, j: number): void {
    this.cells[this.cellIndex(i, j)]++
  }

  /**
   * Adds one co-occurrence between two members
   */
  increment(a: MemberId, b: MemberId): void {
    this.incrementAt(this.requireIndex(a), this.requireIndex(b))
  }

  /**
   * Distance between the members at two roster positions
   */
  distanceAt(i: number, j: number): number {
    return this.cells[this.cellIndex(i, j)]
  }

  /**
   * Number of channels shared by two distinct members
   */
  distance(a: MemberId, b: MemberId): number {
    return this.distanceAt(this.requireIndex(a), this.requireIndex(b))
  }

  /**
   * Expands the matrix to a full symmetric grid, diagonal set to 0
   */
  toArray(): number[][] {
    const n = this.size
    return Array.from({ length: n }, (_, i) =>
      Array.from({ length: n }, (_, j) => (i === j ? 0 : this.distanceAt(i, j)))
    )
  }

  private requireIndex(member: MemberId): number {
    const index = this.positions.get(member)
    if (index === undefined) {
      throw new InvalidParameterError('member', member, 'is not part of the roster')
    }
    return index
  }

  private cellIndex(i: number, j: number): number {
    const n = this.size
    if (!Number.isInteger(i) || !Number.isInteger(j) || i < 0 || j < 0 || i >= n || j >= n) {
      throw new InvalidParameterError('index', [i, j], `must be within [0, ${n})`)
    }
    if (i === j) {
      throw new InvalidParameterError('index', [i, j], 'a member has no distance to itself')
    }
    const [row, column] = i < j ? [i, j] : [j, i]
    // Row r starts after the r preceding rows of lengths n, n-1, ..., n-r+1
    return row * n - (row * (row - 1)) / 2 + (column - row)
  }
}

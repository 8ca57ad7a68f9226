/**
 * Opaque member identifier.
 * Only equality and lexicographic ordering are ever applied to it.
 */
export type MemberId = string

/**
 * Identifier of a channel visible to the communication service.
 */
export type ChannelId = string

/**
 * Two distinct members placed into one conversation.
 * In a pairing result the first member is the one the pair was built for.
 */
export type Pair = readonly [MemberId, MemberId]

/**
 * The full, deduplicated and sorted sequence of members for one run.
 * Matrix indices are roster positions, so it is never re-sorted or mutated.
 */
export type Roster = readonly MemberId[]

/**
 * Outcome of one pairing run.
 * Every roster member appears exactly once, either in a pair or in `ignored`.
 */
export interface PairingResult {
  /** Committed pairs, in commit order */
  pairs: Pair[]
  /** Members left without a partner this round */
  ignored: MemberId[]
}

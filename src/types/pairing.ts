import type { Logger } from '../services/types.js'
import type { MemberId } from './member.js'

/**
 * Names of the available pairing strategies, as written in configuration.
 */
export const GENERATOR_ALGORITHM_TYPES = ['simple', 'max-distance'] as const

export type GeneratorAlgorithmType = (typeof GENERATOR_ALGORITHM_TYPES)[number]

/**
 * Source of uniformly distributed numbers in [0, 1).
 * `Math.random` satisfies it; tests inject a seeded or scripted one.
 */
export type RandomSource = () => number

/**
 * Receives the number of members consumed since the previous call.
 */
export type ProgressCallback = (increment: number) => void

/**
 * Options shared by every pairing strategy.
 */
export interface PairingOptions {
  /** Day window searched for a recent exchange between two candidates */
  backtrackDays: number

  /** Extra candidates tried after the first rejection before giving up on a member */
  backtrackMaxAttempts: number

  /** Pause before every retried eligibility check, in milliseconds (default: 500) */
  checkDelayMs?: number

  /** Pause between channel scan calls when building the distance matrix (default: 500) */
  requestDelayMs?: number

  /** Members hidden from channel scans */
  excluding?: Iterable<MemberId>

  /** Randomness used for shuffling and candidate selection (default: Math.random) */
  random?: RandomSource

  /** Logger for per-candidate decisions (default: silent) */
  logger?: Logger

  /** Progress notifications, one unit per member consumed */
  onProgress?: ProgressCallback
}

/**
 * Pacing defaults, in milliseconds
 */
export const DEFAULT_CHECK_DELAY_MS = 500
export const DEFAULT_REQUEST_DELAY_MS = 500

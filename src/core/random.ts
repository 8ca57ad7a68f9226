/**
 * Randomness helpers with an injectable source
 * @module core/random
 */

import type { RandomSource } from '../types/pairing.js'

/**
 * Default source backed by Math.random
 */
export const defaultRandom: RandomSource = () => Math.random()

/**
 * Creates a reproducible source from a 32-bit seed (mulberry32)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Picks a uniform index in [0, length)
 */
export function randomIndex(length: number, random: RandomSource): number {
  // Guard against sources returning exactly 1
  return Math.min(Math.floor(random() * length), length - 1)
}

/**
 * Shuffles an array in place (Fisher-Yates) and returns it
 */
export function shuffleInPlace<T>(items: T[], random: RandomSource): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random)
    const held = items[i]
    items[i] = items[j]
    items[j] = held
  }
  return items
}

/**
 * Removes and returns a uniformly chosen element, or undefined when empty
 */
export function takeRandom<T>(items: T[], random: RandomSource): T | undefined {
  if (items.length === 0) {
    return undefined
  }
  const [taken] = items.splice(randomIndex(items.length, random), 1)
  return taken
}

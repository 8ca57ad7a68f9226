import type { ConfigInput } from '../../src/config/schema.js'
import type { PairingOptions, RandomSource } from '../../src/types/pairing.js'

/**
 * Member ids `U1` to `Un`
 */
export function memberIds(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `U${index + 1}`)
}

/**
 * Random source for traceable runs: shuffles leave arrays untouched and
 * `takeRandom` always takes the last element.
 */
export const lastPick: RandomSource = () => 0.99

/**
 * Random source that makes `takeRandom` always take the first element
 */
export const firstPick: RandomSource = () => 0

/**
 * Pairing options without pauses
 */
export function fastOptions(overrides: Partial<PairingOptions> = {}): PairingOptions {
  return {
    backtrackDays: 180,
    backtrackMaxAttempts: 3,
    checkDelayMs: 0,
    requestDelayMs: 0,
    ...overrides,
  }
}

/**
 * Configuration file contents with every pause disabled
 */
export function configFile(overrides: {
  general?: ConfigInput['general']
  slack?: Partial<ConfigInput['slack']>
} = {}): ConfigInput {
  return {
    general: { historyPath: './history/', ...overrides.general },
    slack: {
      apiToken: 'test-token',
      channelId: 'C0TEAM',
      ...overrides.slack,
    },
    pacing: { checkDelayMs: 0, channelScanDelayMs: 0, sendDelayMs: 0 },
  }
}

export type {
  MemberId,
  ChannelId,
  Pair,
  Roster,
  PairingResult,
} from './member.js'

export type {
  GeneratorAlgorithmType,
  RandomSource,
  ProgressCallback,
  PairingOptions,
} from './pairing.js'

export {
  GENERATOR_ALGORITHM_TYPES,
  DEFAULT_CHECK_DELAY_MS,
  DEFAULT_REQUEST_DELAY_MS,
} from './pairing.js'

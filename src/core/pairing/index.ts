export type { PairingStrategy, ResolvedPairingOptions } from './types.js'
export { resolvePairingOptions } from './types.js'
export { EligibilityChecker, CandidateSearch } from './eligibility.js'
export type { EligibilityCheckerConfig } from './eligibility.js'
export { pairWorkingSet } from './pairing-loop.js'
export type { PartnerFinder } from './pairing-loop.js'
export { SimplePairingStrategy } from './simple-strategy.js'
export { MaxDistancePairingStrategy, groupByDistance } from './max-distance-strategy.js'
export type { DistanceGroup } from './max-distance-strategy.js'
export { createPairingStrategy } from './strategy-factory.js'

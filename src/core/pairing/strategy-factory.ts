import { GENERATOR_ALGORITHM_TYPES } from '../../types/pairing.js'
import { requireOneOf } from '../../utils/errors.js'
import { MaxDistancePairingStrategy } from './max-distance-strategy.js'
import { SimplePairingStrategy } from './simple-strategy.js'
import type { PairingStrategy } from './types.js'

/**
 * Creates the pairing strategy named in configuration
 *
 * @throws InvalidParameterError for an unknown name
 */
export function createPairingStrategy(type: string): PairingStrategy {
  const name = requireOneOf(type, GENERATOR_ALGORITHM_TYPES, 'generatorAlgorithmType')
  switch (name) {
    case 'simple':
      return new SimplePairingStrategy()
    case 'max-distance':
      return new MaxDistancePairingStrategy()
  }
}

// Pairing strategies
export {
  SimplePairingStrategy,
  MaxDistancePairingStrategy,
  createPairingStrategy,
  groupByDistance,
  resolvePairingOptions,
  EligibilityChecker,
  CandidateSearch,
  pairWorkingSet,
} from './core/pairing/index.js'
export type {
  PairingStrategy,
  ResolvedPairingOptions,
  DistanceGroup,
  EligibilityCheckerConfig,
  PartnerFinder,
} from './core/pairing/index.js'

// Distance matrix
export { DistanceMatrix, buildDistanceMatrix } from './core/distance/index.js'
export type { DistanceMatrixBuildOptions } from './core/distance/index.js'

// Roster and randomness
export {
  createRoster,
  isRoster,
  canonicalPair,
  compareMembers,
  checkPartition,
  isPartitionOf,
  type PartitionReport,
} from './core/roster.js'
export {
  defaultRandom,
  createSeededRandom,
  shuffleInPlace,
  takeRandom,
  randomIndex,
} from './core/random.js'

// Types
export type {
  MemberId,
  ChannelId,
  Pair,
  Roster,
  PairingResult,
  GeneratorAlgorithmType,
  RandomSource,
  ProgressCallback,
  PairingOptions,
} from './types/index.js'
export {
  GENERATOR_ALGORITHM_TYPES,
  DEFAULT_CHECK_DELAY_MS,
  DEFAULT_REQUEST_DELAY_MS,
} from './types/index.js'

// Communication services
export type {
  GroupCommunicationService,
  CommunicationOperation,
  Logger,
  LogLevel,
} from './services/types.js'
export { LOG_LEVELS } from './services/types.js'
export {
  CommunicationError,
  isCommunicationError,
  toCommunicationError,
} from './services/service-error.js'
export {
  createLogger,
  createSilentLogger,
  createPrefixedLogger,
  formatLogLine,
  dailyLogFileName,
  type LoggerOptions,
} from './services/logger.js'
export { sleep, Pacer } from './services/resilience/pacing.js'
export {
  SlackConnector,
  type SlackConnectorConfig,
  type SlackWebApi,
} from './services/connectors/slack-connector.js'
export {
  InMemoryCommunicationService,
  pairKey,
  type InMemoryCommunicationConfig,
  type InMemoryCallEntry,
  type RecentExchangeFn,
  type SentMessage,
} from './services/connectors/in-memory-connector.js'

// Actions, history and configuration
export {
  runInvitation,
  runReminder,
  trySend,
  REMINDER_MESSAGE_THRESHOLD,
} from './actions/index.js'
export type { ActionContext, InvitationSummary, ReminderSummary } from './actions/index.js'
export { HistoryStore, historyFileName, type HistoryFileOptions } from './history/history-store.js'
export { configSchema, loadConfig, parseConfig } from './config/index.js'
export type { AppConfig, ConfigInput, ConfigEnvironment, ResolvedConfig } from './config/index.js'
export { getMessages, LANGUAGES, type Language, type MessageCatalog } from './messages/catalog.js'

// Errors
export {
  CoffeePairingError,
  InvalidParameterError,
  ConfigurationError,
  HistoryError,
  isCoffeePairingError,
} from './utils/errors.js'

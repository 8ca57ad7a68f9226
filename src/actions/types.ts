import type { AppConfig } from '../config/schema.js'
import type { HistoryStore } from '../history/history-store.js'
import type { GroupCommunicationService, Logger } from '../services/types.js'
import type { ProgressCallback, RandomSource } from '../types/pairing.js'

/**
 * Collaborators shared by the invitation and reminder actions
 */
export interface ActionContext {
  config: AppConfig
  service: GroupCommunicationService
  history: HistoryStore
  logger: Logger

  /** Clock used for history file names (default: current time) */
  now?: () => Date

  /** Randomness handed to the pairing strategy */
  random?: RandomSource

  /** Progress of pair generation and message delivery */
  onProgress?: ProgressCallback
}

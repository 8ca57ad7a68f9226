/**
 * Wiring of configuration, logging, Slack and history for one CLI run
 * @module cli/run
 */

import { basename } from 'node:path'
import { loadConfig } from '../config/loader.js'
import type { ConfigEnvironment, ResolvedConfig } from '../config/loader.js'
import { runInvitation } from '../actions/invitation.js'
import { runReminder } from '../actions/reminder.js'
import { HistoryStore } from '../history/history-store.js'
import { createLogger } from '../services/logger.js'
import { SlackConnector } from '../services/connectors/slack-connector.js'
import type { GroupCommunicationService, Logger } from '../services/types.js'
import { isCoffeePairingError } from '../utils/errors.js'

export const CLI_ACTIONS = ['invitation', 'reminder'] as const

export type CliAction = (typeof CLI_ACTIONS)[number]

/**
 * Parsed command line options
 */
export interface CliOptions {
  action: CliAction
  conf: string
}

/**
 * Process-level collaborators, replaceable in tests
 */
export interface CliRuntime {
  env: ConfigEnvironment
  createLogger(config: ResolvedConfig): Logger
  createService(config: ResolvedConfig, logger: Logger): GroupCommunicationService
  now(): Date
  /** Where errors raised before a logger exists are written */
  reportError(message: string): void
}

/**
 * Runtime used by the installed binary
 */
export const defaultRuntime: CliRuntime = {
  env: process.env,
  createLogger: (config) =>
    createLogger({
      level: config.log.logLevel,
      logDirectory: config.log.logToFile ? config.log.logPath : undefined,
    }),
  createService: (config, logger) =>
    new SlackConnector({
      apiToken: config.slack.apiToken,
      testMode: config.general.testMode,
      logger,
    }),
  now: () => new Date(),
  reportError: (message) => console.error(message),
}

function describeError(error: unknown): string {
  if (isCoffeePairingError(error)) {
    return `${error.name}: ${error.message}`
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * Executes one action and returns the process exit code
 */
export async function runCli(options: CliOptions, runtime: CliRuntime = defaultRuntime): Promise<number> {
  let config: ResolvedConfig
  try {
    config = await loadConfig(options.conf, runtime.env)
  } catch (error) {
    runtime.reportError(describeError(error))
    return 1
  }

  const logger = runtime.createLogger(config)
  logger.info('coffee-pairing BEGIN', { action: options.action })
  if (config.general.testMode) {
    logger.warn('Test mode: ON - NO MESSAGES WILL BE SENT')
  }

  const context = {
    config,
    service: runtime.createService(config, logger),
    history: new HistoryStore(config.general.historyPath, {
      configName: basename(options.conf),
      testMode: config.general.testMode,
    }),
    logger,
    now: runtime.now,
  }

  try {
    if (options.action === 'invitation') {
      await runInvitation(context)
    } else {
      await runReminder(context)
    }
  } catch (error) {
    logger.error(`Action '${options.action}' aborted: ${describeError(error)}`)
    return 1
  }

  logger.info('coffee-pairing END')
  return 0
}

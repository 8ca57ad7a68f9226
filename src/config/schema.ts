/**
 * Configuration file schema
 * @module config/schema
 */

import { z } from 'zod'
import { GENERATOR_ALGORITHM_TYPES } from '../types/pairing.js'
import { LOG_LEVELS } from '../services/types.js'
import { LANGUAGES } from '../messages/catalog.js'

const delayMs = z.number().int().nonnegative()

/**
 * Zod schema for the JSON configuration file.
 * Every section may be omitted except `slack`, whose channel id is required.
 */
export const configSchema = z.object({
  general: z
    .object({
      /** Language of the messages posted to the pairs */
      language: z.enum(LANGUAGES).default('en'),
      /** When on, conversations are opened but nothing is posted */
      testMode: z.boolean().default(false),
      /** Directory holding the pairing history files */
      historyPath: z.string().min(1).default('./logs/history/'),
      /** Pairing strategy */
      generatorAlgorithmType: z.enum(GENERATOR_ALGORITHM_TYPES).default('simple'),
    })
    .default({}),

  log: z
    .object({
      logToFile: z.boolean().default(false),
      logPath: z.string().min(1).default('./logs/'),
      logLevel: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),

  slack: z.object({
    /** Bot token; may come from SLACK_API_TOKEN instead */
    apiToken: z.string().min(1).optional(),
    /** Channel whose members are paired */
    channelId: z.string().min(1),
    /** Members never paired nor messaged (bots, channel maintainers) */
    ignoreUsers: z.array(z.string().min(1)).default([]),
    /** Day window in which a previous chat rules a pair out */
    backtrackDays: z.number().int().nonnegative().default(180),
    /** Extra partners tried per member before leaving it out */
    backtrackMaxAttempts: z.number().int().nonnegative().default(3),
  }),

  pacing: z
    .object({
      checkDelayMs: delayMs.default(500),
      channelScanDelayMs: delayMs.default(500),
      sendDelayMs: delayMs.default(250),
    })
    .default({}),
})

/** Configuration as written in the file */
export type ConfigInput = z.input<typeof configSchema>

/** Validated configuration with every default applied */
export type AppConfig = z.output<typeof configSchema>

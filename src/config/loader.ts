/**
 * Configuration loading and validation
 * @module config/loader
 */

import { readFile } from 'node:fs/promises'
import type { ZodError } from 'zod'
import { ConfigurationError } from '../utils/errors.js'
import { configSchema } from './schema.js'
import type { AppConfig } from './schema.js'

/**
 * Environment variables read on top of the file
 */
export interface ConfigEnvironment {
  SLACK_API_TOKEN?: string
}

/**
 * Validated configuration whose Slack token is known to be present
 */
export type ResolvedConfig = AppConfig & {
  slack: AppConfig['slack'] & { apiToken: string }
}

/**
 * Formats the first zod issue as `path.to.key: message`
 */
function describeIssue(error: ZodError): { field: string; message: string } {
  const [issue] = error.issues
  const field = issue ? issue.path.join('.') : ''
  return { field, message: issue ? `${field || '(root)'}: ${issue.message}` : error.message }
}

/**
 * Validates a parsed configuration object
 *
 * @throws ConfigurationError naming the first invalid key
 */
export function parseConfig(raw: unknown, env: ConfigEnvironment = {}): ResolvedConfig {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    const { field, message } = describeIssue(result.error)
    throw new ConfigurationError(`Invalid configuration value for ${message}`, field, {
      issues: result.error.issues.length,
    })
  }

  const config = result.data
  const apiToken = env.SLACK_API_TOKEN || config.slack.apiToken
  if (!apiToken) {
    throw new ConfigurationError(
      'Missing Slack API token: set slack.apiToken or SLACK_API_TOKEN',
      'slack.apiToken'
    )
  }

  return { ...config, slack: { ...config.slack, apiToken } }
}

/**
 * Reads, parses and validates a JSON configuration file
 *
 * @example
 * ```typescript
 * const config = await loadConfig('config.json', process.env)
 * console.log(config.slack.backtrackDays)
 * ```
 */
export async function loadConfig(
  path: string,
  env: ConfigEnvironment = {}
): Promise<ResolvedConfig> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    throw new ConfigurationError(`File "${path}" not found or unreadable`, undefined, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`File "${path}" is not valid JSON`, undefined, {
      path,
      reason: error instanceof Error ? error.message : String(error),
    })
  }

  return parseConfig(raw, env)
}

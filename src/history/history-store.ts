/**
 * Pairing history files, read back by the reminder action
 * @module history/history-store
 */

import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { z } from 'zod'
import type { Pair } from '../types/member.js'
import { HistoryError } from '../utils/errors.js'
import { formatMinuteStamp } from '../utils/time.js'

/**
 * Stored form of a round: an array of two-element member arrays
 */
const historySchema = z.array(z.tuple([z.string().min(1), z.string().min(1)]))

/** `yyyyMMdd-HHmm-` followed by the configuration suffix */
const STAMPED_NAME = /^\d{8}-\d{4}-(.+)$/

/**
 * Identity of the history files written for one configuration
 */
export interface HistoryFileOptions {
  /** Name of the configuration file driving the run, e.g. `config.json` */
  configName: string

  /** Test-mode runs are kept apart from real ones */
  testMode: boolean
}

/**
 * Builds a history file name.
 *
 * With a timestamp the name is `<yyyyMMdd-HHmm>-<configName>[-TESTMODE].json`;
 * without one it is the shared suffix used to find the files of a configuration.
 * Names sort lexicographically in chronological order.
 */
export function historyFileName(options: HistoryFileOptions, timestamp?: Date): string {
  const prefix = timestamp ? `${formatMinuteStamp(timestamp)}-` : ''
  const mode = options.testMode ? '-TESTMODE' : ''
  return `${prefix}${basename(options.configName)}${mode}.json`
}

/**
 * Reads and writes the history files of one configuration in one directory
 */
export class HistoryStore {
  readonly directory: string
  private options: HistoryFileOptions

  constructor(directory: string, options: HistoryFileOptions) {
    this.directory = directory
    this.options = options
  }

  /**
   * Writes the pairs of a round and returns the file name used
   */
  async save(pairs: readonly Pair[], at: Date): Promise<string> {
    const fileName = historyFileName(this.options, at)
    try {
      await mkdir(this.directory, { recursive: true })
      await writeFile(join(this.directory, fileName), JSON.stringify(pairs), 'utf-8')
    } catch (error) {
      throw new HistoryError(fileName, 'could not be written', error)
    }
    return fileName
  }

  /**
   * Name of the latest history file of this configuration, or null when none exists
   */
  async findMostRecent(): Promise<string | null> {
    let entries: string[]
    try {
      entries = await readdir(this.directory)
    } catch (error) {
      if (isMissingDirectory(error)) {
        return null
      }
      throw new HistoryError(this.directory, 'directory could not be listed', error)
    }

    const suffix = historyFileName(this.options)
    const latest = entries
      .filter((name) => {
        const match = STAMPED_NAME.exec(name)
        return match !== null && match[1] === suffix
      })
      .sort()
      .pop()

    return latest ?? null
  }

  /**
   * Reads the pairs stored in a history file
   *
   * @throws HistoryError when the file is missing or malformed
   */
  async load(fileName: string): Promise<Pair[]> {
    let raw: unknown
    try {
      raw = JSON.parse(await readFile(join(this.directory, fileName), 'utf-8'))
    } catch (error) {
      throw new HistoryError(fileName, 'could not be read', error)
    }

    const parsed = historySchema.safeParse(raw)
    if (!parsed.success) {
      throw new HistoryError(fileName, 'does not contain a list of member pairs', parsed.error)
    }
    return parsed.data
  }
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

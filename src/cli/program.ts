import { readFileSync } from 'node:fs'
import { Command, Option } from 'commander'
import { z } from 'zod'
import { CLI_ACTIONS, defaultRuntime, runCli } from './run.js'
import type { CliOptions, CliRuntime } from './run.js'

/**
 * Version declared in the package manifest
 */
export function readPackageVersion(): string {
  const manifest = readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
  return z.object({ version: z.string() }).parse(JSON.parse(manifest)).version
}

/**
 * Builds the command line program.
 * The exit code of the action is stored in `process.exitCode`.
 *
 * @example
 * ```bash
 * coffee-pairing --action invitation --conf team.json
 * coffee-pairing -a reminder
 * ```
 */
export function createProgram(runtime: CliRuntime = defaultRuntime): Command {
  return new Command('coffee-pairing')
    .description('Pairs the members of a channel for a coffee chat, or reminds the last pairs')
    .version(readPackageVersion())
    .addOption(
      new Option('-a, --action <action>', 'run a new "invitation" round or send a "reminder" for the last one')
        .choices(CLI_ACTIONS)
        .makeOptionMandatory()
    )
    .option('-c, --conf <file>', 'configuration file', 'config.json')
    .action(async (options: CliOptions) => {
      process.exitCode = await runCli(options, runtime)
    })
}

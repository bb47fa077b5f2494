#!/usr/bin/env node
/**
 * leakfan CLI entry point
 *
 * Runs a secret-leak scanner over every branch of many repositories in parallel
 */

import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { Command } from 'commander'
import { createLogger } from '../utils/logger.js'
import { createConfigLoader } from '../core/config/loader.js'
import { initCommand, DEFAULT_CONFIG_FILENAME } from './commands/init.js'
import { registerScanCommand } from './commands/scan.js'

/**
 * Exit codes for the CLI
 * - 0: every worker finished (leaks, if any, are listed in the summary)
 * - 1: error (precondition or worker failure)
 * - 2: leaks found and --fail-on-leaks given
 */
export const ExitCode = {
  OK: 0,
  ERROR: 1,
  LEAKS: 2
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('leakfan')
    .description('Scan every branch of many repositories for leaked secrets')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')

  registerScanCommand(program)

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_CONFIG_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const globalOpts = program.opts<GlobalOptions>()

      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        if (!globalOpts.quiet) {
          logger.info(`Created config file: ${result.outputPath}`)
        }
        process.exit(ExitCode.OK)
      } else {
        if (!globalOpts.quiet) {
          logger.error(`Failed to create config file: ${result.error}`)
        }
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (configPath: string) => {
      const globalOpts = program.opts<GlobalOptions>()
      const result = await createConfigLoader().validate(configPath)

      if (result.valid) {
        if (!globalOpts.quiet) {
          logger.info(`✓ Config file is valid: ${configPath}`)
        }
        process.exit(ExitCode.OK)
      } else {
        if (!globalOpts.quiet) {
          logger.error(`✗ Config file is invalid: ${configPath}`)
          for (const error of result.errors) {
            logger.error(`  - ${error}`)
          }
        }
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

/**
 * Whether the module at `moduleUrl` is the script Node was started with
 *
 * npm installs the bin as a symlink; Node resolves it for the module URL but
 * keeps the link in argv, so both sides are compared as real paths.
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) {
    return false
  }
  try {
    return realpathSync(fileURLToPath(moduleUrl)) === realpathSync(scriptPath)
  } catch {
    return false
  }
}

if (isMainModule(import.meta.url)) {
  void run()
}

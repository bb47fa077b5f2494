/**
 * Scan command implementation
 *
 * Orchestrates the full run:
 * Source → Filter → Distribution → Workers (parallel) → Aggregation → Reporter
 */

import { resolve } from 'path'
import type { Command } from 'commander'
import { InvalidArgumentError, Option } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import {
  consoleSink,
  createLogger,
  fileSink,
  type LogSink,
  type Logger
} from '../../utils/logger.js'
import { maskToken } from '../../utils/mask.js'
import { ConfigLoader } from '../../core/config/loader.js'
import type { Config } from '../../core/config/schema.js'
import { errorMessage } from '../../core/errors.js'
import { ChildProcessRunner, type CommandRunner } from '../../core/executor/command.js'
import {
  GitHubClient,
  resolveToken,
  type GitHubGateway
} from '../../core/github/client.js'
import { matchRepos } from '../../core/repos/filter.js'
import { loadRepos, type RepoSource } from '../../core/repos/source.js'
import { ProgressChannel } from '../../core/progress/channel.js'
import { ProgressTracker } from '../../core/progress/tracker.js'
import { executeScans } from '../../core/runner/index.js'
import { buildReport, createReporter } from '../../core/reporter/index.js'
import { COMPLETE_MESSAGE, ProgressDisplay, type DisplayStream } from '../progress.js'

/**
 * Scan command options
 */
export interface ScanOptions {
  file?: string
  user?: boolean
  org?: string
  include?: string
  exclude?: string
  progress?: boolean
  workers?: number
  workDir?: string
  output?: string
  format?: 'text' | 'json'
  failOnLeaks?: boolean
}

/**
 * Collaborators that tests replace
 */
export interface ScanDependencies {
  env?: NodeJS.ProcessEnv
  github?: GitHubGateway
  runner?: CommandRunner
  logSinks?: LogSink[]
  progressStream?: DisplayStream
}

/**
 * Parse a positive integer option value
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

/**
 * Decide where the repository list comes from
 */
export function resolveRepoSource(options: ScanOptions, config: Config): RepoSource {
  if (options.org) {
    return { kind: 'github', scope: { kind: 'org', org: options.org } }
  }
  if (options.user) {
    return { kind: 'github', scope: { kind: 'user' } }
  }
  return { kind: 'file', path: resolve(process.cwd(), options.file ?? config.paths.reposFile) }
}

function createRunLogger(
  config: Config,
  baseDir: string,
  options: ScanOptions,
  globalOptions: GlobalOptions,
  deps: ScanDependencies
): Logger {
  const sinks = deps.logSinks ?? [
    consoleSink({
      level: globalOptions.verbose ? 'debug' : 'info',
      // the progress display owns the terminal while it runs
      quiet: globalOptions.quiet || options.progress
    }),
    fileSink(resolve(baseDir, config.logging.file), config.logging.level)
  ]
  return createLogger('scan', sinks)
}

/**
 * Log worker identity changes when no progress display is drawn
 */
function logIdentities(channel: ProgressChannel, logger: Logger): () => void {
  return channel.subscribe(event => {
    if (event.type === 'identity') {
      logger.info(`[${event.label}] processing ${event.detail ?? event.label}`)
    } else if (event.type === 'complete') {
      logger.info(`[${event.workerId}] ${COMPLETE_MESSAGE}`)
    }
  })
}

/**
 * Execute scan command
 */
export async function executeScan(
  options: ScanOptions,
  globalOptions: GlobalOptions,
  deps: ScanDependencies = {}
): Promise<number> {
  let config: Config
  try {
    config = await new ConfigLoader().resolve(globalOptions.config)
  } catch (error) {
    if (!globalOptions.quiet) {
      createLogger('scan', deps.logSinks).error(`Scan failed: ${errorMessage(error)}`)
    }
    return ExitCode.ERROR
  }

  const baseDir = resolve(process.cwd(), options.workDir ?? config.paths.baseDir ?? '.')
  const logger = createRunLogger(config, baseDir, options, globalOptions, deps)
  const channel = new ProgressChannel()
  const tracker = new ProgressTracker().attach(channel)
  const display = options.progress ? new ProgressDisplay(tracker, deps.progressStream) : undefined
  const stopLogging = display ? undefined : logIdentities(channel, logger)

  try {
    // 1. Preconditions
    const token = resolveToken(deps.env ?? process.env)
    logger.debug(`using GitHub token ${maskToken(token)}`)
    const github = deps.github ?? new GitHubClient({ token })

    // 2. Load and filter repositories
    const source = resolveRepoSource(options, config)
    const repos = await loadRepos(source, github)
    const matched = matchRepos(repos, { include: options.include, exclude: options.exclude })
    logger.info(`Matched ${matched.length} of ${repos.length} repositories`)

    // 3. Run workers
    display?.start()
    const result = await executeScans(matched, {
      baseDir,
      maxWorkers: options.workers ?? config.workers.max,
      idleTimeoutMs: config.workers.idleTimeoutMs,
      scanner: config.scanner,
      git: config.git,
      branches: github,
      runner: deps.runner ?? new ChildProcessRunner(),
      logger,
      progress: channel
    })
    display?.stop()

    // 4. Report
    const report = buildReport(result, config.scanner.command)
    const reporter = createReporter(options.format ?? 'text')
    await reporter.write(report, {
      output: options.output,
      quiet: globalOptions.quiet
    })

    if (options.output && !globalOptions.quiet) {
      logger.info(`Report written to ${options.output}`)
    }

    if (options.failOnLeaks && report.failures.length > 0) {
      return ExitCode.LEAKS
    }
    return ExitCode.OK
  } catch (error) {
    display?.stop()
    logger.error(`Scan failed: ${errorMessage(error)}`)
    return ExitCode.ERROR
  } finally {
    stopLogging?.()
    tracker.detach()
    await logger.close()
  }
}

/**
 * Register scan command on the program
 */
export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Scan every branch of many repositories for leaked secrets')
    .option('--file <path>', 'File with one repository address per line (default: repos.txt)')
    .option('--user', 'Scan every repository of the authenticated user')
    .option('--org <name>', 'Scan every repository of an organisation')
    .option('--include <regex>', 'Only scan repositories whose name matches')
    .option('--exclude <regex>', 'Skip repositories whose name matches')
    .option('--progress', 'Display a progress bar for each worker')
    .option('-w, --workers <n>', 'Maximum number of workers', parsePositiveInt)
    .option('--work-dir <path>', 'Directory under which scans/ is created')
    .option('-o, --output <file>', 'Output file path')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(['text', 'json']).default('text')
    )
    .option('--fail-on-leaks', 'Exit with code 2 when any branch fails the scan')
    .action(async (options: ScanOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeScan(options, globalOpts)
      process.exit(exitCode)
    })
}

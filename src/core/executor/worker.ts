import { mkdir, rm } from 'fs/promises'
import { dirname } from 'path'
import type {
  RepoRef,
  ScanDirectories,
  ScanResultKey,
  ScanResultValue,
  WorkAssignment,
  WorkerOutcome
} from '../../types/index.js'
import type { Logger } from '../../utils/logger.js'
import { maskSecrets } from '../../utils/mask.js'
import type { BranchLister } from '../github/client.js'
import type { ProgressChannel } from '../progress/channel.js'
import { formatCommand, type CommandResult, type CommandRunner } from './command.js'
import { cloneDirFor, reportPathFor, resultKey, type ReportNaming } from './workspace.js'

/**
 * How the scanner is invoked on each branch
 */
export interface ScannerSettings {
  /** Executable name or path */
  command: string
  /** Parallelism hint passed as `--threads` */
  threads: number
  /** Per-invocation timeout in milliseconds; 0 disables it */
  timeoutMs: number
}

export interface GitSettings {
  command: string
  timeoutMs: number
}

export interface WorkerDependencies {
  branches: BranchLister
  runner: CommandRunner
  dirs: ScanDirectories
  scanner: ScannerSettings
  git: GitSettings
  progress: ProgressChannel
  logger: Logger
  /** How long a queue-mode worker waits for an item before it stops */
  idleTimeoutMs: number
  /** Report naming for every repository of the run */
  reportNaming?: ReportNaming
}

/**
 * Number of commands a repository takes: one clone, then checkout and scan per branch
 */
export function commandTotal(branchCount: number): number {
  return branchCount * 2 + 1
}

/**
 * Clones repositories and runs the scanner on every branch
 */
export class WorkerExecutor {
  constructor(private readonly deps: WorkerDependencies) {}

  /**
   * Process an assignment and return the results of every branch scanned
   *
   * Errors from listing branches propagate; scanner failures are results.
   */
  async execute(assignment: WorkAssignment): Promise<WorkerOutcome> {
    const workerId = assignment.label
    const outcome: WorkerOutcome = { workerId, results: {}, timedOut: [] }
    const { progress } = this.deps

    progress.emit({ type: 'identity', workerId, label: assignment.label })

    switch (assignment.kind) {
      case 'direct':
        await this.scanRepo(workerId, assignment.repo, outcome)
        break
      case 'queued': {
        for (;;) {
          const repo = await assignment.queue.tryGet(this.deps.idleTimeoutMs)
          if (!repo) {
            this.deps.logger.debug(`worker ${workerId} found the queue empty`)
            break
          }
          progress.emit({
            type: 'identity',
            workerId,
            label: assignment.label,
            detail: repo.fullName
          })
          await this.scanRepo(workerId, repo, outcome)
        }
        break
      }
    }

    progress.emit({ type: 'complete', workerId })
    return outcome
  }

  private async scanRepo(workerId: string, repo: RepoRef, outcome: WorkerOutcome): Promise<void> {
    const { dirs, logger, progress } = this.deps

    logger.debug(`processing repo ${repo.fullName}`)

    const branches = await this.deps.branches.listBranches(repo)
    const total = commandTotal(branches.length)
    logger.debug(`processing total of ${total} commands for repo ${repo.fullName}`)
    progress.emit({ type: 'total', workerId, total, repo: repo.fullName })

    const cloneDir = cloneDirFor(dirs, repo)
    await rm(cloneDir, { recursive: true, force: true })
    await mkdir(dirname(cloneDir), { recursive: true })

    const clone = await this.git(workerId, ['clone', repo.address, cloneDir], dirname(cloneDir))
    if (clone.exitCode !== 0) {
      logger.warn(`clone of ${repo.fullName} exited with ${clone.exitCode}`)
    }

    for (const branch of branches) {
      logger.debug(`processing branch ${branch} for repo ${repo.fullName}`)
      const key = resultKey(repo, branch)

      const checkout = await this.git(workerId, ['checkout', '-B', branch, `origin/${branch}`], cloneDir)
      if (checkout.exitCode !== 0) {
        logger.warn(`checkout of ${key} exited with ${checkout.exitCode}`)
      }

      const report = reportPathFor(dirs, repo, branch, this.deps.reportNaming)
      const scan = await this.scan(workerId, branch, report, cloneDir)
      this.record(outcome, key, scan, report)

      logger.debug(`processing of branch ${branch} for repo ${repo.fullName} is complete`)
    }

    logger.debug(`processing of repo ${repo.fullName} complete`)
  }

  private record(outcome: WorkerOutcome, key: ScanResultKey, scan: CommandResult, report: string): void {
    outcome.results[key] = scanResultValue(scan.exitCode, report)
    if (scan.timedOut) {
      this.deps.logger.warn(`scan of ${key} timed out after ${this.deps.scanner.timeoutMs}ms`)
      outcome.timedOut.push(key)
    }
  }

  private git(workerId: string, args: string[], cwd: string): Promise<CommandResult> {
    const { git } = this.deps
    return this.exec(workerId, git.command, args, cwd, git.timeoutMs)
  }

  private scan(workerId: string, branch: string, report: string, cwd: string): Promise<CommandResult> {
    const { scanner } = this.deps
    const args = [
      '--path=.',
      `--branch=${branch}`,
      `--report=${report}`,
      `--threads=${scanner.threads}`
    ]
    return this.exec(workerId, scanner.command, args, cwd, scanner.timeoutMs)
  }

  private async exec(
    workerId: string,
    command: string,
    args: string[],
    cwd: string,
    timeoutMs: number
  ): Promise<CommandResult> {
    const { logger, progress, runner } = this.deps
    const commandLine = formatCommand(command, args)

    logger.debug(`executing command: ${commandLine}`)
    progress.emit({ type: 'increment', workerId, command: commandLine })

    const result = await runner.run(command, args, { cwd, timeoutMs })

    logger.debug(`returncode: ${result.exitCode}`)
    if (result.stdout) {
      logger.debug(`stdout:\n${maskSecrets(result.stdout)}`)
    }
    if (result.stderr) {
      logger.debug(`stderr:\n${maskSecrets(result.stderr)}`)
    }

    return result
  }
}

/**
 * `false` for a clean scan, otherwise the report path
 */
export function scanResultValue(exitCode: number, report: string): ScanResultValue {
  return exitCode === 0 ? false : report
}

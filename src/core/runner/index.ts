import type {
  DistributionMode,
  RepoRef,
  ResultMap,
  ScanResultKey,
  WorkAssignment,
  WorkerOutcome
} from '../../types/index.js'
import type { Logger } from '../../utils/logger.js'
import { mergeResults, mergeTimeouts } from '../aggregator/index.js'
import { planAssignments } from '../distributor/index.js'
import { WorkerFailureError, errorMessage, type WorkerFailure } from '../errors.js'
import type { CommandRunner } from '../executor/command.js'
import { WorkerExecutor, type GitSettings, type ScannerSettings } from '../executor/worker.js'
import { ReportNaming, createDirectories } from '../executor/workspace.js'
import type { BranchLister } from '../github/client.js'
import { ProgressChannel } from '../progress/channel.js'

export interface RunOptions {
  /** Directory under which `scans/` is created */
  baseDir: string
  maxWorkers: number
  idleTimeoutMs: number
  scanner: ScannerSettings
  git: GitSettings
  branches: BranchLister
  runner: CommandRunner
  logger: Logger
  /** Channel for progress events; a private one is used when omitted */
  progress?: ProgressChannel
}

export interface RunResult {
  mode: DistributionMode
  workerCount: number
  results: ResultMap
  timedOut: ScanResultKey[]
  /** Items left in the shared queue once every worker stopped; 0 in direct mode */
  remaining: number
  /** Duration in milliseconds */
  duration: number
}

/**
 * Scan every branch of every repository with a bounded number of workers
 *
 * All workers are joined before failures are reported: if any worker threw,
 * a WorkerFailureError listing each one is raised and no results are returned.
 */
export async function executeScans(repos: readonly RepoRef[], options: RunOptions): Promise<RunResult> {
  const startTime = Date.now()
  const { logger } = options

  const plan = planAssignments(repos, options.maxWorkers)
  const assignments: WorkAssignment[] = plan.assignments
  logger.info(
    `Scanning ${repos.length} repositories with ${assignments.length} worker(s) in ${plan.mode} mode`
  )

  const dirs = await createDirectories(options.baseDir)
  const progress = options.progress ?? new ProgressChannel()
  const reportNaming = new ReportNaming(repos)

  const settled = await Promise.allSettled(
    assignments.map(assignment => {
      const executor = new WorkerExecutor({
        branches: options.branches,
        runner: options.runner,
        dirs,
        scanner: options.scanner,
        git: options.git,
        progress,
        logger: logger.child(assignment.label),
        idleTimeoutMs: options.idleTimeoutMs,
        reportNaming
      })
      return executor.execute(assignment)
    })
  )

  const outcomes: WorkerOutcome[] = []
  const failures: WorkerFailure[] = []
  settled.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      outcomes.push(result.value)
    } else {
      const workerId = assignments[index]?.label ?? String(index)
      failures.push({ workerId, message: errorMessage(result.reason) })
    }
  })

  if (failures.length > 0) {
    for (const failure of failures) {
      logger.error(`worker ${failure.workerId} failed: ${failure.message}`)
    }
    throw new WorkerFailureError(failures)
  }

  return {
    mode: plan.mode,
    workerCount: assignments.length,
    results: mergeResults(outcomes),
    timedOut: mergeTimeouts(outcomes),
    remaining: plan.mode === 'queue' ? plan.queue.size : 0,
    duration: Date.now() - startTime
  }
}

import type { FailedScan, ResultMap, ScanResultKey, WorkerOutcome } from '../../types/index.js'

/**
 * Merge the result maps of every worker
 *
 * Each (repository, branch) is scanned by exactly one worker, so the maps are
 * disjoint and no conflict policy is needed.
 */
export function mergeResults(outcomes: readonly WorkerOutcome[]): ResultMap {
  const merged: ResultMap = {}
  for (const outcome of outcomes) {
    Object.assign(merged, outcome.results)
  }
  return merged
}

/**
 * Keys of every scan killed by its timeout, in worker order
 */
export function mergeTimeouts(outcomes: readonly WorkerOutcome[]): ScanResultKey[] {
  return outcomes.flatMap(outcome => outcome.timedOut)
}

/**
 * Branches whose scan reported leaks, in result order
 */
export function failedEntries(results: ResultMap): FailedScan[] {
  const failures: FailedScan[] = []
  for (const [key, value] of Object.entries(results)) {
    if (value !== false) {
      failures.push({ key, report: value })
    }
  }
  return failures
}

import type {
  DirectAssignment,
  QueuedAssignment,
  RepoRef
} from '../../types/index.js'
import { PreconditionError } from '../errors.js'
import { WorkQueue } from '../queue/work-queue.js'

/**
 * Default cap on concurrently running workers
 */
export const DEFAULT_MAX_WORKERS = 35

/**
 * How a run's repositories are spread over workers
 */
export type DistributionPlan =
  | { mode: 'direct'; assignments: DirectAssignment[] }
  | { mode: 'queue'; queue: WorkQueue<RepoRef>; assignments: QueuedAssignment[] }

/**
 * Zero-padded display label for a pool offset
 */
export function offsetLabel(offset: number, maxWorkers: number): string {
  const width = String(Math.max(maxWorkers - 1, 0)).length
  return String(offset).padStart(width, '0')
}

/**
 * Choose between one worker per repository and a capped pool draining a queue
 *
 * With `repos.length <= maxWorkers` every repository gets its own worker.
 * Otherwise `maxWorkers` workers share a queue pre-filled with all repositories.
 */
export function planAssignments(repos: readonly RepoRef[], maxWorkers: number): DistributionPlan {
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new PreconditionError(`Worker cap must be a positive integer, got ${maxWorkers}`)
  }
  if (repos.length === 0) {
    throw new PreconditionError('No repositories to scan')
  }

  if (repos.length <= maxWorkers) {
    return {
      mode: 'direct',
      assignments: repos.map(repo => ({ kind: 'direct', repo, label: repo.fullName }))
    }
  }

  const queue = new WorkQueue<RepoRef>(repos)
  const assignments: QueuedAssignment[] = Array.from({ length: maxWorkers }, (_, offset) => ({
    kind: 'queued',
    offset,
    label: offsetLabel(offset, maxWorkers),
    queue
  }))

  return { mode: 'queue', queue, assignments }
}

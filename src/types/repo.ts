/**
 * A repository to scan, derived from its clone address
 */
export interface RepoRef {
  /** Clone address as read from the source (usually an SSH address) */
  readonly address: string

  /** Owning user or organisation */
  readonly owner: string

  /** Repository name without a trailing `.git` */
  readonly name: string

  /** `owner/name` */
  readonly fullName: string
}

/**
 * Result key of the form `owner/name:branch`
 */
export type ScanResultKey = string

/**
 * `false` when the branch passed, otherwise the path of the scanner report
 */
export type ScanResultValue = false | string

export type ResultMap = Record<ScanResultKey, ScanResultValue>

/**
 * Consumer side of a shared work queue
 */
export interface WorkSource<T> {
  tryGet(timeoutMs: number): Promise<T | undefined>
  readonly size: number
}

/**
 * One worker bound to a single repository
 */
export interface DirectAssignment {
  kind: 'direct'
  repo: RepoRef
  label: string
}

/**
 * One worker of a capped pool draining a shared queue
 */
export interface QueuedAssignment {
  kind: 'queued'
  offset: number
  label: string
  queue: WorkSource<RepoRef>
}

export type WorkAssignment = DirectAssignment | QueuedAssignment

export type DistributionMode = 'direct' | 'queue'

/**
 * Working directories shared by every worker of a run
 */
export interface ScanDirectories {
  scans: string
  clones: string
  reports: string
}

/**
 * What one worker hands back once it has finished its assignment
 */
export interface WorkerOutcome {
  workerId: string
  results: ResultMap
  /** Result keys whose scan was killed by the command timeout */
  timedOut: ScanResultKey[]
}

import type { DistributionMode, ResultMap, ScanResultKey } from './repo.js'

/**
 * A branch whose scan reported leaks
 */
export interface FailedScan {
  key: ScanResultKey
  report: string
}

/**
 * Complete run report
 */
export interface RunReport {
  /** Report version */
  version: string

  /** Timestamp of the run */
  timestamp: string

  /** Scanner command that was run on every branch */
  scanner: string

  mode: DistributionMode

  workerCount: number

  /** Run duration in milliseconds */
  duration: number

  results: ResultMap

  failures: FailedScan[]

  timedOut: ScanResultKey[]
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  format: 'text' | 'json'
  output?: string
  quiet?: boolean
}

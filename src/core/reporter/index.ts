import type { RunReport } from '../../types/index.js'
import { failedEntries } from '../aggregator/index.js'
import type { RunResult } from '../runner/index.js'
import type { Reporter } from './base.js'
import { JsonReporter } from './json.js'
import { TextReporter } from './text.js'

export type { Reporter, JsonReportOptions } from './base.js'
export { JsonReporter } from './json.js'
export { TextReporter, scannerName } from './text.js'

export const REPORT_VERSION = '1.0.0'

/**
 * Build the report for a finished run
 */
export function buildReport(result: RunResult, scanner: string, timestamp = new Date()): RunReport {
  return {
    version: REPORT_VERSION,
    timestamp: timestamp.toISOString(),
    scanner,
    mode: result.mode,
    workerCount: result.workerCount,
    duration: result.duration,
    results: result.results,
    failures: failedEntries(result.results),
    timedOut: result.timedOut
  }
}

export function createReporter(format: 'text' | 'json'): Reporter {
  return format === 'json' ? new JsonReporter() : new TextReporter()
}

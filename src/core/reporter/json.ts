import { writeFile } from 'node:fs/promises'
import type { RunReport } from '../../types/index.js'
import type { Reporter, JsonReportOptions } from './base.js'

/**
 * JSON Reporter for run results
 *
 * Outputs the full result map, the failed branches and any timeouts in JSON
 * format for machine consumption.
 */
export class JsonReporter implements Reporter {
  private readonly defaultOptions: JsonReportOptions = {
    format: 'json',
    pretty: true
  }

  /**
   * Generate JSON string from a run report
   */
  generate(report: RunReport, options?: Partial<JsonReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }

    if (opts.pretty) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }

  /**
   * Write report to file or stdout
   */
  async write(report: RunReport, options?: Partial<JsonReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    const json = this.generate(report, opts)

    if (opts.output) {
      await writeFile(opts.output, json, 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(json + '\n')
    }
  }
}

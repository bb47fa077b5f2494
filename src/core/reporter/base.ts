import type { RunReport, ReportOptions } from '../../types/index.js'

/**
 * Base interface for all reporters
 */
export interface Reporter {
  /**
   * Generate a report from run results
   */
  generate(report: RunReport): string

  /**
   * Write report to file or stdout
   */
  write(report: RunReport, options?: Partial<ReportOptions>): Promise<void>
}

/**
 * Extended report options with format-specific settings
 */
export interface JsonReportOptions extends ReportOptions {
  /** Pretty print JSON with indentation */
  pretty?: boolean
}

import { writeFile } from 'node:fs/promises'
import type { ReportOptions, RunReport } from '../../types/index.js'
import type { Reporter } from './base.js'

/**
 * Name of the scanner as shown in the summary (`/usr/bin/gitleaks` -> `gitleaks`)
 */
export function scannerName(command: string): string {
  return command.split(/[\\/]/).at(-1) ?? command
}

/**
 * Plain-text summary listing every branch that failed
 */
export class TextReporter implements Reporter {
  generate(report: RunReport): string {
    const tool = scannerName(report.scanner)
    const lines: string[] = []

    if (report.failures.length > 0) {
      lines.push(`The following repos failed ${tool} scan:`)
      for (const failure of report.failures) {
        lines.push(`${failure.key} (${failure.report})`)
      }
    } else {
      lines.push(`All branches in all repos passed ${tool} scan`)
    }

    if (report.timedOut.length > 0) {
      lines.push('Scans that timed out:')
      for (const key of report.timedOut) {
        lines.push(key)
      }
    }

    return lines.join('\n')
  }

  async write(report: RunReport, options?: Partial<ReportOptions>): Promise<void> {
    const text = this.generate(report)

    if (options?.output) {
      await writeFile(options.output, text + '\n', 'utf-8')
    } else if (!options?.quiet) {
      process.stdout.write(text + '\n')
    }
  }
}

import chalk from 'chalk'
import type { ProgressTracker, WorkerProgress } from '../core/progress/tracker.js'

export const COMPLETE_MESSAGE = 'scanning of all branches complete'

const BAR_WIDTH = 30

/**
 * Minimal writable the display draws on
 */
export interface DisplayStream {
  write(chunk: string): boolean
}

/**
 * Render one worker's progress as a single line (no colour)
 */
export function formatProgressLine(state: WorkerProgress, labelWidth: number, barWidth = BAR_WIDTH): string {
  const label = state.label.padEnd(labelWidth)

  if (state.complete) {
    return `${label} ${COMPLETE_MESSAGE}`
  }

  const ratio = state.total > 0 ? Math.min(state.count / state.total, 1) : 0
  const filled = Math.round(ratio * barWidth)
  const bar = '#'.repeat(filled) + '.'.repeat(barWidth - filled)
  const percent = `${Math.floor(ratio * 100)}%`.padStart(4)
  const detail = state.detail ? ` ${state.detail}` : ''

  return `${label} [${bar}] ${percent} ${state.count}/${state.total}${detail}`
}

/**
 * Draws one progress bar per worker, redrawing in place on every change
 */
export class ProgressDisplay {
  private renderedLines = 0
  private unsubscribe?: () => void

  constructor(
    private readonly tracker: ProgressTracker,
    private readonly stream: DisplayStream = process.stdout
  ) {}

  start(): void {
    this.unsubscribe = this.tracker.onChange(snapshot => this.render(snapshot))
  }

  stop(): void {
    this.unsubscribe?.()
    this.unsubscribe = undefined
  }

  render(snapshot: WorkerProgress[]): void {
    const labelWidth = Math.max(0, ...snapshot.map(state => state.label.length))
    let output = this.renderedLines > 0 ? `\x1b[${this.renderedLines}A` : ''

    for (const state of snapshot) {
      const line = formatProgressLine(state, labelWidth)
      output += '\x1b[2K' + (state.complete ? chalk.green(line) : line) + '\n'
    }

    this.renderedLines = snapshot.length
    this.stream.write(output)
  }
}

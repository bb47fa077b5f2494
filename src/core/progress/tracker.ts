import type { ProgressEvent } from '../../types/index.js'
import type { ProgressChannel } from './channel.js'

/**
 * Progress of one worker as seen from its events
 */
export interface WorkerProgress {
  workerId: string
  label: string
  /** Repository in progress, when it differs from the label */
  detail?: string
  /** Commands expected for the current repository; 0 until announced */
  total: number
  /** Commands started for the current repository */
  count: number
  complete: boolean
}

export type TrackerListener = (snapshot: WorkerProgress[]) => void

/**
 * Folds progress events into per-worker counters
 */
export class ProgressTracker {
  private readonly workers = new Map<string, WorkerProgress>()
  private readonly listeners = new Set<TrackerListener>()
  private unsubscribe?: () => void

  attach(channel: ProgressChannel): this {
    this.unsubscribe?.()
    this.unsubscribe = channel.subscribe(event => this.apply(event))
    return this
  }

  detach(): void {
    this.unsubscribe?.()
    this.unsubscribe = undefined
  }

  onChange(listener: TrackerListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Apply one event
   *
   * A `total` event starts a new repository, so the counter restarts at 0.
   */
  apply(event: ProgressEvent): void {
    const state = this.stateFor(event.workerId)

    switch (event.type) {
      case 'identity':
        state.label = event.label
        state.detail = event.detail
        break
      case 'total':
        state.total = event.total
        state.count = 0
        state.complete = false
        break
      case 'increment':
        state.count = state.total > 0 ? Math.min(state.count + 1, state.total) : state.count + 1
        break
      case 'complete':
        state.complete = true
        state.detail = undefined
        break
    }

    const snapshot = this.snapshot()
    for (const listener of this.listeners) {
      listener(snapshot)
    }
  }

  /**
   * Copy of every worker's state, in the order workers first appeared
   */
  snapshot(): WorkerProgress[] {
    return [...this.workers.values()].map(state => ({ ...state }))
  }

  get(workerId: string): WorkerProgress | undefined {
    const state = this.workers.get(workerId)
    return state ? { ...state } : undefined
  }

  private stateFor(workerId: string): WorkerProgress {
    let state = this.workers.get(workerId)
    if (!state) {
      state = { workerId, label: workerId, total: 0, count: 0, complete: false }
      this.workers.set(workerId, state)
    }
    return state
  }
}

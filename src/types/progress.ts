/**
 * Declares which repository (direct mode) or offset (queue mode) a worker is
 */
export interface IdentityEvent {
  type: 'identity'
  workerId: string
  label: string
  /** Repository currently being processed, when it differs from the label */
  detail?: string
}

/**
 * Sets the number of commands a worker will run for the current repository
 */
export interface TotalEvent {
  type: 'total'
  workerId: string
  total: number
  repo: string
}

/**
 * One command is about to run
 */
export interface IncrementEvent {
  type: 'increment'
  workerId: string
  command: string
}

export interface CompleteEvent {
  type: 'complete'
  workerId: string
}

export type ProgressEvent = IdentityEvent | TotalEvent | IncrementEvent | CompleteEvent

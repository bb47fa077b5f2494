/**
 * A condition that must hold before any worker is started
 * (credentials, input file, repository set, configuration values)
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PreconditionError'
  }
}

/**
 * Failure of a single worker
 */
export interface WorkerFailure {
  workerId: string
  message: string
}

/**
 * One or more workers threw; raised once every worker has been joined
 */
export class WorkerFailureError extends Error {
  constructor(public readonly failures: WorkerFailure[]) {
    super(
      `${failures.length} worker(s) failed:\n` +
        failures.map(f => `  - ${f.workerId}: ${f.message}`).join('\n')
    )
    this.name = 'WorkerFailureError'
  }
}

/**
 * Describe an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

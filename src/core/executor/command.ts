import { execFile, type ExecFileException } from 'child_process'

/**
 * Exit code reported for a command killed by its timeout
 */
export const TIMEOUT_EXIT_CODE = 124

/**
 * Exit code reported when the command could not be started at all
 */
export const SPAWN_FAILURE_EXIT_CODE = 127

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

export interface CommandOptions {
  cwd: string
  /** Kill the command after this many milliseconds; 0 disables the timeout */
  timeoutMs?: number
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
  timedOut: boolean
}

/**
 * Runs external commands (`git`, the scanner) for a worker
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult>
}

/**
 * Render a command line for logs
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ')
}

function exitCodeOf(error: ExecFileException, timedOut: boolean): number {
  if (timedOut) {
    return TIMEOUT_EXIT_CODE
  }
  if (typeof error.code === 'number') {
    return error.code
  }
  // string codes such as ENOENT mean the process never ran
  return SPAWN_FAILURE_EXIT_CODE
}

/**
 * Command runner backed by child_process.execFile
 *
 * A nonzero exit is a normal result, not a rejection.
 */
export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): Promise<CommandResult> {
    return new Promise(resolve => {
      execFile(
        command,
        args,
        {
          cwd: options.cwd,
          timeout: options.timeoutMs ?? 0,
          maxBuffer: MAX_OUTPUT_BYTES,
          encoding: 'utf-8'
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false })
            return
          }
          const timedOut = Boolean(options.timeoutMs) && error.killed === true && error.signal != null
          resolve({
            exitCode: exitCodeOf(error, timedOut),
            stdout,
            stderr: stderr || error.message,
            timedOut
          })
        }
      )
    })
  }
}

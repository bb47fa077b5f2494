import { z } from 'zod'

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

/**
 * Worker pool settings
 */
export const WorkersSchema = z.object({
  max: z.number()
    .int('Worker cap must be an integer')
    .min(1, 'Worker cap must be >= 1')
    .default(35)
    .describe('Maximum number of workers running at once'),
  idleTimeoutMs: z.number()
    .int()
    .min(0, 'Idle timeout must be >= 0')
    .default(10)
    .describe('How long a pool worker waits on an empty queue before it stops')
})

/**
 * Scanner invocation
 */
export const ScannerSchema = z.object({
  command: z.string()
    .min(1, 'Scanner command is required')
    .default('gitleaks')
    .describe('Executable run once per branch'),
  threads: z.number()
    .int()
    .min(1, 'Threads must be >= 1')
    .default(10)
    .describe('Parallelism hint passed to the scanner'),
  timeoutMs: z.number()
    .int()
    .min(0, 'Timeout must be >= 0')
    .default(0)
    .describe('Kill a scan after this many milliseconds (0 = never)')
})

export const GitSchema = z.object({
  command: z.string().min(1, 'Git command is required').default('git'),
  timeoutMs: z.number()
    .int()
    .min(0, 'Timeout must be >= 0')
    .default(0)
    .describe('Kill a clone or checkout after this many milliseconds (0 = never)')
})

export const PathsSchema = z.object({
  baseDir: z.string()
    .min(1)
    .optional()
    .describe('Directory holding scans/ (defaults to the working directory)'),
  reposFile: z.string()
    .min(1)
    .default('repos.txt')
    .describe('Newline-delimited list of repository addresses')
})

export const LoggingSchema = z.object({
  file: z.string()
    .min(1)
    .default('leakfan.log')
    .describe('Log file receiving every record of the run'),
  level: LogLevelSchema
    .default('debug')
    .describe('Lowest level written to the log file')
})

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .default('1.0'),
  workers: WorkersSchema.default({}),
  scanner: ScannerSchema.default({}),
  git: GitSchema.default({}),
  paths: PathsSchema.default({}),
  logging: LoggingSchema.default({})
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Validate configuration content
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {})
}

/**
 * Validate configuration with detailed errors
 */
export function validateConfigSafe(
  data: unknown
): { success: true; data: Config } | { success: false; errors: z.ZodError } {
  const result = ConfigSchema.safeParse(data ?? {})
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })
}

/**
 * Configuration with every default applied
 */
export function defaultConfig(): Config {
  return ConfigSchema.parse({})
}

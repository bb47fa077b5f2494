import { mkdir, readFile, writeFile } from 'fs/promises'
import { dirname, join, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import { type Config, defaultConfig, formatValidationErrors, validateConfigSafe } from './schema.js'

export const DEFAULT_CONFIG_FILENAME = 'leakfan.config.yaml'

export interface LoaderOptions {
  basePath?: string
}

/**
 * Path of the default configuration bundled with the package
 */
export function defaultConfigPath(): string {
  // src/core/config (or dist/core/config) -> config/default.yaml
  const here = dirname(fileURLToPath(import.meta.url))
  return join(here, '..', '..', '..', 'config', 'default.yaml')
}

export class ConfigLoader {
  private basePath: string

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
  }

  /**
   * Load configuration from a YAML file
   */
  async load(configPath: string): Promise<Config> {
    const absolutePath = resolve(this.basePath, configPath)
    const content = await this.readConfigFile(absolutePath)
    const raw = this.parseYaml(content, absolutePath)

    const validation = validateConfigSafe(raw)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid config file: ${configPath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }

    return validation.data
  }

  /**
   * Load the given file, or fall back to the built-in defaults
   */
  async resolve(configPath?: string): Promise<Config> {
    return configPath ? this.load(configPath) : defaultConfig()
  }

  /**
   * Load configuration from string content
   */
  loadFromString(content: string): Config {
    const validation = validateConfigSafe(this.parseYaml(content, '<string>'))
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(`Invalid config:\n${errors.join('\n')}`, '<string>', errors)
    }
    return validation.data
  }

  /**
   * Validate a config file without using it
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      await this.load(configPath)
      return { valid: true, errors: [] }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return {
        valid: false,
        errors: [error instanceof Error ? error.message : String(error)]
      }
    }
  }

  /**
   * Copy the bundled default configuration to `outputPath`
   *
   * An existing file is kept unless `force` is set.
   * @returns The absolute path written
   */
  async writeDefault(outputPath: string, options: { force?: boolean } = {}): Promise<string> {
    const absolutePath = resolve(this.basePath, outputPath)
    const content = await this.readConfigFile(defaultConfigPath())

    try {
      await mkdir(dirname(absolutePath), { recursive: true })
    } catch (error) {
      throw this.writeError(absolutePath, error)
    }

    try {
      await writeFile(absolutePath, content, { encoding: 'utf-8', flag: options.force ? 'w' : 'wx' })
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
        throw new ConfigLoadError(
          `File already exists: ${absolutePath}. Use --force to overwrite.`,
          absolutePath,
          ['EEXIST']
        )
      }
      throw this.writeError(absolutePath, error)
    }

    return absolutePath
  }

  private writeError(absolutePath: string, error: unknown): ConfigLoadError {
    const code = (error as NodeJS.ErrnoException).code || 'UNKNOWN'
    return new ConfigLoadError(`Failed to write config file: ${absolutePath} (${code})`, absolutePath, [code])
  }

  private parseYaml(content: string, source: string): unknown {
    try {
      return yaml.load(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ConfigLoadError(`Failed to parse config file: ${source}`, source, [message])
    }
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read config file: ${absolutePath}`,
        absolutePath,
        [(error as NodeJS.ErrnoException).code || 'UNKNOWN']
      )
    }
  }
}

/**
 * Custom error for configuration loading failures
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}

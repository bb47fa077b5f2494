/**
 * init command - Write the default configuration file
 */

import { DEFAULT_CONFIG_FILENAME, createConfigLoader } from '../../core/config/loader.js'
import { errorMessage } from '../../core/errors.js'

export { DEFAULT_CONFIG_FILENAME }

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

export async function initCommand(options: InitOptions): Promise<InitResult> {
  try {
    const outputPath = await createConfigLoader().writeDefault(
      options.output ?? DEFAULT_CONFIG_FILENAME,
      { force: options.force }
    )
    return { success: true, outputPath }
  } catch (error) {
    return { success: false, error: errorMessage(error) }
  }
}

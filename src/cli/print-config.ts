/* eslint-disable no-console */

import { ConfigLoadError, ConfigurationError } from '../core/errors'
import { loadConfigWithPath } from '../core/config'
import { EXIT_CONFIG_ERROR, type BaseArgs } from './types'
import type { CommandModule } from 'yargs'

export const printConfigCommand: CommandModule<BaseArgs, BaseArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  handler: async (argv) => {
    try {
      const { config, path } = await loadConfigWithPath({
        cwd: process.cwd(),
        configPath: argv.config,
      })

      console.log(JSON.stringify({ ...config, _source: path }, null, 2))

      if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        console.error('❌ Failed to load configuration:')
        console.error(error.message)
      } else if (error instanceof ConfigurationError) {
        console.error('❌ Configuration validation failed:')
        console.error(error.getErrorSummary())
      } else {
        console.error('❌ Unexpected error:', error)
      }
      process.exitCode = EXIT_CONFIG_ERROR
    }
  },
}

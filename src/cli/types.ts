/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

export interface CheckArgs extends BaseArgs {
  target?: string[]
  format?: 'cli' | 'json'
  output?: string
  color?: boolean
}

// Exit codes owned by the CLI: the engine itself never decides them
export const EXIT_OK = 0
export const EXIT_TARGET_FAILED = 1
export const EXIT_CONFIG_ERROR = 2

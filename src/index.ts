export { runChecks, runCheckSummary } from './netcheck'
export type { RunChecksOptions } from './api'

export * from './core'
export * from './probes'
export * from './reporting'
export { logger, Logger, parseLogLevel, type LogLevel } from './logger'

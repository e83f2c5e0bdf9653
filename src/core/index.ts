/**
 * Core module - target model, configuration, errors and the check runner
 */

export * from './types'
export * from './config'
export * from './errors'
export * from './scheduler'
export * from './runner'

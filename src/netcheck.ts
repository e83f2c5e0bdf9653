import { createRunner } from './core/runner'
import { parseTargets } from './core/config/validate'
import type { CheckResult, RunSummary } from './core/types'
import type { RunChecksOptions } from './api'

/**
 * Checks every target once, concurrently, and returns one result per target in
 * input order. Malformed descriptors (including a custom request with both or
 * neither of `params`/`json`) throw ConfigurationError before any probe starts.
 *
 * ```ts
 * const results = await runChecks([
 *   { kind: 'http', description: 'Login form', address: 'https://example.com/login',
 *     custom: { params: { user: 'probe' }, expectedStatus: 400 } },
 * ])
 * const allReachable = results.every((r) => r.outcome.status === 'success')
 * ```
 */
export async function runChecks(descriptors: readonly unknown[], options: RunChecksOptions = {}): Promise<CheckResult[]> {
  const summary = await runCheckSummary(descriptors, options)
  return summary.results
}

export async function runCheckSummary(
  descriptors: readonly unknown[],
  options: RunChecksOptions = {},
): Promise<RunSummary> {
  const targets = parseTargets(descriptors)
  const runner = createRunner(targets, { quiet: options.quiet ?? true, probers: options.probers })

  const { onResult, onComplete } = options
  if (onResult) {
    runner.on('targetComplete', onResult)
    runner.on('targetFailed', onResult)
  }
  if (onComplete) {
    runner.on('runComplete', onComplete)
  }

  return runner.run()
}

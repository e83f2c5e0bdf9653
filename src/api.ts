/**
 * Basic usage:
 * ```ts
 * import { runChecks } from 'netcheck'
 *
 * const results = await runChecks([
 *   { kind: 'tcp', description: 'SSH gateway', address: 'gateway.internal:22' },
 *   { kind: 'http', description: 'Status page', address: 'https://status.example.com' },
 * ])
 * ```
 */

import type { CheckResult, RunSummary, Target } from './core/types'
import type { ProberSet } from './probes'

export interface RunChecksOptions {
  /** Suppress run-level info logging */
  quiet?: boolean

  /** Replace the network probers (tests, dry runs) */
  probers?: Partial<ProberSet>

  /** Called once per target as soon as its probe settles, in completion order */
  onResult?: (result: CheckResult) => void

  /** Called once with the ordered summary after every probe settled */
  onComplete?: (summary: RunSummary) => void
}

export type { CheckResult, RunSummary, Target }

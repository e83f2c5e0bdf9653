import type { CheckResult, RunSummary, Target } from '../core/types'

const defaultTarget: Target = { kind: 'tcp', description: 'SSH', address: 'ssh.example.com:22' }

export function successResult(sequenceIndex: number, overrides: { target?: Target; elapsedMs?: number; httpStatus?: number | null } = {}): CheckResult {
  const target = overrides.target ?? defaultTarget
  return {
    description: target.description,
    target,
    sequenceIndex,
    outcome: { status: 'success', elapsedMs: overrides.elapsedMs ?? 12, httpStatus: overrides.httpStatus ?? null },
  }
}

export function statusMismatchResult(sequenceIndex: number, target: Target, status: number, details: string | null): CheckResult {
  return {
    description: target.description,
    target,
    sequenceIndex,
    outcome: {
      status: 'failure',
      elapsedMs: 30,
      error: { kind: 'status-mismatch', message: `Unexpected HTTP status: ${status} (expected 200)`, httpStatus: status, details },
    },
  }
}

export function connectionFailureResult(sequenceIndex: number, target: Target, message: string): CheckResult {
  return {
    description: target.description,
    target,
    sequenceIndex,
    outcome: { status: 'failure', elapsedMs: 5, error: { kind: 'connection', message, httpStatus: null, details: null } },
  }
}

export function summaryOf(results: CheckResult[], durationMs = 1234): RunSummary {
  const startTime = new Date('2024-01-01T00:00:00.000Z')
  const succeeded = results.filter((r) => r.outcome.status === 'success').length
  return {
    startTime,
    endTime: new Date(startTime.getTime() + durationMs),
    duration: durationMs,
    totalTargets: results.length,
    succeeded,
    failed: results.length - succeeded,
    passed: succeeded === results.length,
    results,
  }
}

import { Target } from './target'

// One probe of one target; sequenceIndex is the target's position in the input list
export interface CheckTask {
  id: string
  target: Target
  sequenceIndex: number
}

// What a prober hands back when the target is reachable
export interface ProbeReport {
  httpStatus: number | null
}

export type FailureKind = 'connection' | 'transport' | 'status-mismatch' | 'unexpected'

export interface ProbeFailure {
  kind: FailureKind
  message: string
  httpStatus: number | null
  details: string | null
}

export type CheckOutcome =
  | { status: 'success'; elapsedMs: number; httpStatus: number | null }
  | { status: 'failure'; elapsedMs: number; error: ProbeFailure }

export interface CheckResult {
  description: string
  target: Target
  sequenceIndex: number
  outcome: CheckOutcome
}

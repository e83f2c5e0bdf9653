import { CheckResult } from './execution'

// Run summary for reporting
export interface RunSummary {
  startTime: Date
  endTime: Date
  duration: number
  totalTargets: number
  succeeded: number
  failed: number
  passed: boolean
  results: CheckResult[] // ordered by sequenceIndex
}

import { CheckResult } from '../core/types/execution'
import { RunSummary } from '../core/types/reporting'

/**
 * ReportCollector accumulates check results as probes settle, in whatever order
 * they arrive, and hands them back ordered by their position in the input list
 */
export class ReportCollector {
  private results = new Map<number, CheckResult>()
  private runStartTime: Date
  private runEndTime?: Date

  constructor(private readonly expectedTargets?: number) {
    this.runStartTime = new Date()
  }

  addResult(result: CheckResult): void {
    if (this.results.has(result.sequenceIndex)) {
      throw new Error(`Duplicate result for target #${result.sequenceIndex} (${result.description})`)
    }
    this.results.set(result.sequenceIndex, result)
  }

  completeRun(): void {
    this.runEndTime = new Date()
  }

  getResults(): CheckResult[] {
    return Array.from(this.results.values()).sort((a, b) => a.sequenceIndex - b.sequenceIndex)
  }

  /**
   * Get aggregated run summary for reporting
   */
  getSummary(): RunSummary {
    const endTime = this.runEndTime || new Date()
    const duration = endTime.getTime() - this.runStartTime.getTime()

    const results = this.getResults()
    const succeeded = results.filter((result) => result.outcome.status === 'success').length
    const failed = results.length - succeeded
    const totalTargets = this.expectedTargets ?? results.length

    // Targets that never reported count against the run
    const passed = failed === 0 && results.length === totalTargets

    return {
      startTime: this.runStartTime,
      endTime,
      duration,
      totalTargets,
      succeeded,
      failed,
      passed,
      results,
    }
  }

  clear(): void {
    this.results.clear()
    this.runStartTime = new Date()
    this.runEndTime = undefined
  }
}

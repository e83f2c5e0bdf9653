import { RunSummary } from '../../core/types/reporting'
import { FailureKind, TargetKind } from '../../core/types'

export interface JSONReporterOptions {
  prettyPrint?: boolean
}

/**
 * JSON schema for machine-readable check reports
 */
export interface JSONReport {
  run: {
    id: string
    startTime: string // ISO string
    endTime: string // ISO string
    duration: number // milliseconds
    passed: boolean
    totalTargets: number
    succeeded: number
    failed: number
  }

  // In configuration order
  targets: Array<{
    index: number
    description: string
    kind: TargetKind
    address: string
    status: 'success' | 'failure'
    elapsedMs: number
    httpStatus: number | null
    error?: {
      kind: FailureKind
      message: string
      details: string | null
    }
  }>

  meta: {
    version: string
    generatedAt: string // ISO string
    generator: string
  }
}

/**
 * JSON Reporter that outputs machine-readable check results
 * for CI tools and scripts
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? false,
    }
  }

  generate(summary: RunSummary): string {
    const report = this.createReport(summary)

    if (this.options.prettyPrint) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }

  print(summary: RunSummary): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(summary))
  }

  async writeFile(summary: RunSummary, filePath: string): Promise<void> {
    const fs = await import('fs/promises')
    await fs.writeFile(filePath, this.generate(summary), 'utf-8')
  }

  createReport(summary: RunSummary): JSONReport {
    return {
      run: {
        id: `run-${summary.startTime.getTime()}`,
        startTime: summary.startTime.toISOString(),
        endTime: summary.endTime.toISOString(),
        duration: summary.duration,
        passed: summary.passed,
        totalTargets: summary.totalTargets,
        succeeded: summary.succeeded,
        failed: summary.failed,
      },

      targets: summary.results.map((result) => {
        const { outcome, target } = result
        const entry: JSONReport['targets'][number] = {
          index: result.sequenceIndex,
          description: result.description,
          kind: target.kind,
          address: target.address,
          status: outcome.status,
          elapsedMs: outcome.elapsedMs,
          httpStatus: outcome.status === 'success' ? outcome.httpStatus : outcome.error.httpStatus,
        }

        if (outcome.status === 'failure') {
          entry.error = {
            kind: outcome.error.kind,
            message: outcome.error.message,
            details: outcome.error.details,
          }
        }

        return entry
      }),

      meta: {
        version: '1.0.0',
        generatedAt: new Date().toISOString(),
        generator: 'netcheck-json-reporter',
      },
    }
  }
}

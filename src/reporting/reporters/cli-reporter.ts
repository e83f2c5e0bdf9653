import { RunSummary } from '../../core/types/reporting'
import { CheckResult } from '../../core/types/execution'
import { formatResultLine } from '../format'
import pc from 'picocolors'

export interface CLIReporterOptions {
  showColors?: boolean
  showSummary?: boolean
}

/**
 * CLI Reporter that prints one line per target in configuration order
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      showSummary: options.showSummary ?? true,
    }
  }

  generate(summary: RunSummary): string {
    const lines = summary.results.map((result) => this.formatLine(result))

    if (this.options.showSummary) {
      if (lines.length > 0) {
        lines.push('')
      }
      lines.push(this.formatSummary(summary))
    }

    return lines.join('\n')
  }

  print(summary: RunSummary): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(summary))
  }

  private formatLine(result: CheckResult): string {
    const marker = result.outcome.status === 'success' ? this.colorize('✓', 'green') : this.colorize('✗', 'red')
    return `${marker} ${formatResultLine(result)}`
  }

  private formatSummary(summary: RunSummary): string {
    const failed = summary.failed > 0 ? this.colorize(`${summary.failed} failed`, 'red') : `${summary.failed} failed`
    const duration = `${(summary.duration / 1000).toFixed(1)}s`
    return `Targets: ${summary.totalTargets} total, ${summary.succeeded} succeeded, ${failed} (${duration})`
  }

  private colorize(text: string, color: 'green' | 'red'): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
    }
  }
}

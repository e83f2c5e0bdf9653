import { CheckResult, ProbeFailure } from '../core/types/execution'

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

export function formatFailureDetail(error: ProbeFailure): string {
  if (error.kind === 'status-mismatch' && error.httpStatus !== null) {
    const details = error.details ? collapseWhitespace(error.details) : ''
    return details ? `Status: ${error.httpStatus}, Details: ${details}` : `Status: ${error.httpStatus}`
  }
  return collapseWhitespace(error.message)
}

/**
 * One line per target, no colour:
 *   Successfully connected to <description> in <ms>ms
 *   Failed to connect to <description> with: <detail>
 */
export function formatResultLine(result: CheckResult): string {
  const { outcome } = result
  if (outcome.status === 'success') {
    return `Successfully connected to ${result.description} in ${outcome.elapsedMs}ms`
  }
  return `Failed to connect to ${result.description} with: ${formatFailureDetail(outcome.error)}`
}

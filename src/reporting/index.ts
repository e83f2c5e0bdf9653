export { ReportCollector } from './report-collector'
export { formatResultLine, formatFailureDetail } from './format'
export {
  CLIReporter,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
} from './reporters'

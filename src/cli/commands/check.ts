import type { CommandModule } from 'yargs'
import { loadConfigWithPath } from '../../core/config'
import { ConfigLoadError, ConfigurationError } from '../../core/errors'
import { createRunner } from '../../core/runner'
import { CLIReporter, JSONReporter } from '../../reporting'
import { logger } from '../../logger'
import type { CheckResult, NetcheckConfig, RunSummary } from '../../core/types'
import { type BaseArgs, type CheckArgs, EXIT_CONFIG_ERROR, EXIT_TARGET_FAILED } from '../types'

export const checkCommand: CommandModule<BaseArgs, CheckArgs> = {
  command: 'check',
  describe: 'Check reachability of every configured target',
  builder: (yargs) => {
    return yargs
      .option('target', {
        alias: 't',
        type: 'string',
        array: true,
        describe: 'Check only the target(s) with this description',
      })
      .option('format', {
        alias: 'f',
        type: 'string',
        choices: ['cli', 'json'] as const,
        describe: 'Report format (json is implied by --quiet)',
      })
      .option('output', {
        alias: 'o',
        type: 'string',
        describe: 'Also write the JSON report to this file',
      })
      .option('color', {
        type: 'boolean',
        default: true,
        describe: 'Colour the terminal report',
      })
      .example('$0 check', 'Check every target in netcheck.config.json')
      .example('$0 check -c targets.json --target "Status page"', 'Check a single target')
      .example('$0 check --format json > report.json', 'Emit a machine-readable report')
  },
  handler: async (argv) => {
    try {
      const summary = await runTargetChecks(argv)
      if (!summary.passed) {
        process.exitCode = EXIT_TARGET_FAILED
      }
    } catch (error) {
      reportFatalError(error)
      process.exitCode = error instanceof ConfigLoadError || error instanceof ConfigurationError ? EXIT_CONFIG_ERROR : 1
    }
  },
}

async function runTargetChecks(args: CheckArgs): Promise<RunSummary> {
  logger.info('Loading configuration...')
  const { config, path } = await loadConfigWithPath({ cwd: process.cwd(), configPath: args.config })
  logger.info(`Loaded ${config.targets.length} target(s) from ${path}`)

  const targets = filterTargets(config, args.target).targets

  const runner = createRunner(targets, { quiet: args.quiet })
  setupProgressHandlers(runner)

  const summary = await runner.run()

  const format = args.format ?? (args.quiet ? 'json' : 'cli')
  if (format === 'json') {
    new JSONReporter({ prettyPrint: true }).print(summary)
  } else {
    new CLIReporter({ showColors: args.color ?? true }).print(summary)
  }

  if (args.output) {
    await new JSONReporter({ prettyPrint: true }).writeFile(summary, args.output)
    logger.info(`JSON report written to ${args.output}`)
  }

  return summary
}

/**
 * Keep only targets whose description matches one of the requested names
 */
export function filterTargets(config: NetcheckConfig, descriptions?: string[]): NetcheckConfig {
  if (!descriptions || descriptions.length === 0) {
    return config
  }

  const wanted = new Set(descriptions)
  const targets = config.targets.filter((target) => wanted.has(target.description))

  if (targets.length === 0) {
    throw new ConfigurationError(`No target matches ${descriptions.map((d) => `"${d}"`).join(', ')}`)
  }

  return { ...config, targets }
}

function setupProgressHandlers(runner: ReturnType<typeof createRunner>): void {
  runner.on('targetFailed', (result: CheckResult) => {
    if (result.outcome.status === 'failure' && result.outcome.error.kind === 'unexpected') {
      logger.warn(`Probe for "${result.description}" failed unexpectedly: ${result.outcome.error.message}`)
    }
  })
}

function reportFatalError(error: unknown): void {
  if (error instanceof ConfigurationError) {
    logger.error(
      error.validationErrors.length > 0 ? `${error.message}:\n${error.getErrorSummary()}` : error.message,
    )
  } else if (error instanceof ConfigLoadError) {
    logger.error(error.message)
  } else {
    logger.error('Target check failed:', error)
  }
}

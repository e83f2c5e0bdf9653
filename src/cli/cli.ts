import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { printConfigCommand } from './print-config'
import { checkCommand } from './commands/check'
import { logger, parseLogLevel } from '../logger'
import type { BaseArgs } from './types'

export function applyLogLevel(args: BaseArgs): void {
  if (args.verbose) {
    logger.setLevel('debug')
  } else if (args.quiet) {
    logger.setLevel('warn')
  } else {
    logger.setLevel(parseLogLevel(process.env.NETCHECK_LOG_LEVEL))
  }
}

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName('netcheck')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Enable verbose logging',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Suppress non-essential output',
      global: true,
    })
    .middleware(applyLogLevel)
    .command(checkCommand)
    .command(printConfigCommand)
    .demandCommand(1, 'You need to specify a command')
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  return createCli(argv).parseAsync()
}

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { printConfigCommand } from './print-config'
import { runCommand } from './run'

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName('perf-agent')
    .usage('$0 [command] [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'count',
      describe: 'Increase verbosity (specify multiple times for more). -vvvv for full debug output',
      global: true,
    })
    .command(runCommand)
    .command(printConfigCommand)
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  return createCli(argv).parseAsync()
}

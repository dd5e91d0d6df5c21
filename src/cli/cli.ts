import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { printConfigCommand } from './print-config'
import { runCommand } from './commands/run'
import { appsCommand } from './commands/apps'
import { historyCommand } from './commands/history'

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName('ui-capture')
    .usage('$0 [run] <task> [options]')
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
      describe: 'Only print the JSON result',
      global: true,
    })
    .option('headless', {
      type: 'boolean',
      describe: 'Run Chrome without a window',
      global: true,
    })
    .option('output-dir', {
      alias: 'o',
      type: 'string',
      describe: 'Directory for run outputs (default: ./outputs)',
      global: true,
    })
    .command(runCommand)
    .command(appsCommand)
    .command(historyCommand)
    .command(printConfigCommand)
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  const cli = createCli(argv)

  return cli.parseAsync()
}

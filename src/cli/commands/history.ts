/* eslint-disable no-console */
import { resolve } from 'node:path'
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { CLIReporter, collectHistory } from '../../reporting'
import { toConfigOverrides } from '../config-overrides'
import { handleCommandError } from '../handle-error'
import type { BaseArgs, HistoryArgs } from '../types'

export const historyCommand: CommandModule<BaseArgs, HistoryArgs> = {
  command: 'history',
  describe: 'List previous runs found under the output directory',
  builder: (yargs) => {
    return yargs.option('json', {
      type: 'boolean',
      describe: 'Print the history as JSON',
    })
  },
  handler: async (argv) => {
    try {
      const config = await loadConfig({ configPath: argv.config, cliArgs: toConfigOverrides(argv) })
      const history = await collectHistory(resolve(process.cwd(), config.outputDir))

      if (argv.json) {
        console.log(JSON.stringify(history, null, 2))
      } else {
        new CLIReporter({ showColors: true }).printHistory(history)
      }
    } catch (error) {
      handleCommandError(error)
    }
  },
}

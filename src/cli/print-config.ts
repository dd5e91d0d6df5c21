/* eslint-disable no-console */

import { loadConfig } from '../core/config'
import { AppRegistry } from '../apps'
import { maskSecret } from '../logger'
import { toConfigOverrides } from './config-overrides'
import { handleCommandError } from './handle-error'
import type { BaseArgs, PrintConfigArgs } from './types'
import type { CommandModule } from 'yargs'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return yargs.option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json'] as const,
      default: 'json',
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
    try {
      const config = await loadConfig({
        cwd: process.cwd(),
        configPath: argv.config,
        cliArgs: toConfigOverrides(argv),
      })

      const registry = new AppRegistry(config.apps)

      const output = {
        ...config,
        _resolvedApps: registry.keys(),
        _loginSecret: {
          env: config.login.secretEnv,
          value: maskSecret(process.env[config.login.secretEnv] ?? ''),
        },
      }

      console.log(JSON.stringify(output, null, 2))

      if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      handleCommandError(error)
    }
  },
}

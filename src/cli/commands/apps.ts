/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { AppRegistry, exampleTasks } from '../../apps'
import { handleCommandError } from '../handle-error'
import type { BaseArgs } from '../types'

export const appsCommand: CommandModule<BaseArgs, BaseArgs> = {
  command: 'apps',
  describe: 'List the supported apps and example tasks',
  handler: async (argv) => {
    try {
      const config = await loadConfig({ configPath: argv.config })
      const registry = new AppRegistry(config.apps)
      const apps = registry.listApps()
      const keyWidth = Math.max(...apps.map((app) => app.key.length))

      console.log('Supported apps:')
      for (const app of apps) {
        const deadline = app.complex ? ' (extended agent deadline)' : ''
        console.log(`  ${app.key.padEnd(keyWidth)}  ${app.name} - ${app.url}${deadline}`)
      }

      console.log('')
      console.log('Examples:')
      for (const task of exampleTasks) {
        console.log(`  ui-capture "${task}"`)
      }
    } catch (error) {
      handleCommandError(error)
    }
  },
}

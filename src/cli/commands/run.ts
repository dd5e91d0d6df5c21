/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { captureTask } from '../../ui-capture'
import { readManifest } from '../../capture/manifest-writer'
import type { Manifest } from '../../capture/manifest-writer'
import { CLIReporter, JSONReporter } from '../../reporting'
import { createLogger, logger } from '../../logger'
import type { CaptureResult } from '../../core/types'
import { toConfigOverrides } from '../config-overrides'
import { handleCommandError } from '../handle-error'
import type { BaseArgs, RunArgs } from '../types'

export const runCommand: CommandModule<BaseArgs, RunArgs> = {
  command: ['run [task..]', '$0 [task..]'],
  describe: 'Run a task in a web app and capture each UI state',
  builder: (yargs) => {
    return yargs
      .positional('task', {
        type: 'string',
        array: true,
        describe: 'What to do, naming the app (e.g. "Create an issue in GitHub")',
      })
      .option('app', {
        type: 'string',
        describe: 'App key to use instead of detecting it from the task',
      })
      .example('$0 "Create a project in Linear"', 'Detect Linear from the task and run it')
      .example('$0 run --app asana "Add a task due Friday"', 'Run a task in a named app')
      .example('$0 --headless --output-dir ./captures "Create an issue in GitHub"', 'Run without a window')
  },
  handler: async (argv) => {
    try {
      await runCapture(argv)
    } catch (error) {
      handleCommandError(error)
    }
  },
}

async function runCapture(args: RunArgs): Promise<void> {
  const task = (args.task ?? []).join(' ').trim()
  if (!task) {
    logger.error('A task is required, e.g. ui-capture "Create an issue in GitHub"')
    process.exitCode = 1
    return
  }

  const config = await loadConfig({
    configPath: args.config,
    cliArgs: toConfigOverrides(args),
  })

  const result = await captureTask({
    task,
    app: args.app,
    config,
    logger: createLogger({ level: config.logLevel }),
    onScreenshot: (record) => {
      if (!args.quiet) {
        logger.info(`Saved ${record.name}: ${record.file}`)
      }
    },
  })

  if (!args.quiet) {
    new CLIReporter({ showColors: true }).print(result, await loadManifest(result))
    console.log('')
  }

  new JSONReporter().print(result)
}

async function loadManifest(result: CaptureResult): Promise<Manifest | undefined> {
  if (result.status !== 'success') return undefined

  try {
    return await readManifest(result.manifest)
  } catch (error) {
    logger.warn(`Could not read manifest ${result.manifest}: ${error instanceof Error ? error.message : String(error)}`)
    return undefined
  }
}

import { TaskController, createTaskController } from './capture/task-controller'
import { validateConfig } from './core/config'
import { AppRegistry, detectApp } from './apps'
import type { CaptureResult } from './core/types'
import type { CaptureControllerOptions, CaptureOptions } from './api'

/**
 * Examples:
 * ```ts
 * // Detect the app from the task text
 * const result = await captureTask({ task: 'Create an issue in GitHub' })
 *
 * // Name the app and follow progress
 * const result = await captureTask({
 *   task: 'Add a task due Friday',
 *   app: 'asana',
 *   onScreenshot: (record) => console.log('Saved', record.file),
 * })
 * ```
 *
 * Invalid configuration throws, as does a missing secret when
 * `login.requireSecret` is set or an undefined ${VAR} in `login.identity`. Everything that goes wrong during the task itself comes back
 * as an error result.
 */
export async function captureTask(options: CaptureOptions): Promise<CaptureResult> {
  const task = options.task.trim()
  if (!task) {
    return { status: 'error', error: 'Task cannot be empty' }
  }

  const config = validateConfig(options.config ?? {})
  const registry = new AppRegistry(config.apps)

  const appKey = options.app ?? detectApp(task, registry)
  if (!appKey) {
    return {
      status: 'error',
      error: `No supported app detected in task. Supported apps: ${registry.keys().join(', ')}`,
    }
  }

  const controller = createCaptureController(options, registry)
  return controller.execute(appKey, task)
}

/**
 * Builds a reusable controller for running several tasks against one configuration
 */
export function createCaptureController(
  options: CaptureControllerOptions = {},
  registry?: AppRegistry,
): TaskController {
  const config = validateConfig(options.config ?? {})

  const controller = createTaskController({
    config,
    registry: registry ?? new AppRegistry(config.apps),
    agent: options.agent,
    launcher: options.launcher,
    logger: options.logger,
    env: options.env,
    cwd: options.cwd,
  })

  setupCallbacks(controller, options)

  return controller
}

function setupCallbacks(controller: TaskController, options: CaptureControllerOptions): void {
  if (options.onStateChange) {
    controller.on('stateChange', options.onStateChange)
  }

  if (options.onScreenshot) {
    controller.on('screenshot', options.onScreenshot)
  }
}

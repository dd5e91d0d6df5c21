/**
 * Basic usage:
 * ```ts
 * import { captureTask } from 'ui-capture'
 *
 * const result = await captureTask({
 *   task: 'Create a project in Linear',
 *   config: { agent: { module: './agents/browser-agent.js' } },
 * })
 * ```
 */

import type { CaptureConfigInput, ScreenshotRecord, TaskState } from './core/types'
import type { TaskAgent } from './agent/types'
import type { BrowserLauncher } from './browser/types'
import type { Logger } from './logger'

export interface CaptureControllerOptions {
  /** Raw configuration; validated and filled with defaults */
  config?: CaptureConfigInput

  /** Agent instance; loaded from `config.agent.module` when omitted */
  agent?: TaskAgent

  /** Browser launcher (default: Chrome through chrome-launcher) */
  launcher?: BrowserLauncher

  logger?: Logger

  /** Environment holding the login secret (default: process.env) */
  env?: NodeJS.ProcessEnv

  /** Base for relative output, profile and agent module paths */
  cwd?: string

  /** Progress callbacks */
  onStateChange?: (from: TaskState, to: TaskState) => void
  onScreenshot?: (record: ScreenshotRecord) => void
}

export interface CaptureOptions extends CaptureControllerOptions {
  /** What the agent should do, e.g. "Create an issue in GitHub" */
  task: string

  /** Application key; detected from the task text when omitted */
  app?: string
}

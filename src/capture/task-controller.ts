import { EventEmitter } from 'events'
import { mkdir } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import type {
  AppProfile,
  CaptureConfig,
  CaptureResult,
  Credentials,
  LoginOutcome,
  ScreenshotRecord,
  TaskRun,
  TaskState,
} from '../core/types'
import type { BrowserLauncher, BrowserPage, BrowserSession } from '../browser/types'
import type { AgentHistory, TaskAgent } from '../agent/types'
import { AppRegistry } from '../apps'
import { createChromeLauncher } from '../browser'
import { buildAgentPrompt, loadAgent } from '../agent'
import { LoginSequencer } from '../login/login-sequencer'
import { resolveCredentials } from '../core/utils/resolve-credentials'
import { createRunId } from '../core/utils/run-id'
import { withTimeout } from '../core/utils/timing'
import { ArtifactRecorder } from './artifact-recorder'
import { addUsage, emptyUsage, estimateCost } from './cost'
import { writeManifest } from './manifest-writer'
import { logger as defaultLogger, maskSecret } from '../logger'
import type { Logger } from '../logger'

export interface TaskControllerEvents {
  stateChange: (from: TaskState, to: TaskState) => void
  screenshot: (record: ScreenshotRecord) => void
}

export interface TaskControllerOptions {
  config: CaptureConfig
  registry?: AppRegistry
  launcher?: BrowserLauncher
  /** Agent to drive the browser; loaded from `config.agent.module` when omitted */
  agent?: TaskAgent
  loginSequencer?: LoginSequencer
  logger?: Logger
  env?: NodeJS.ProcessEnv
  cwd?: string
  now?: () => Date
}

export const DEFAULT_PROFILE_DIR = join(homedir(), '.ui-capture-chrome')

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error))

/**
 * Owns one browser session per task: launch, login, agent under a deadline,
 * artifact extraction, manifest. `execute` reports every failure in its
 * result instead of throwing, and always releases the session it acquired.
 */
export class TaskController extends EventEmitter {
  private readonly config: CaptureConfig
  private readonly registry: AppRegistry
  private readonly launcher: BrowserLauncher
  private readonly loginSequencer: LoginSequencer
  private readonly logger: Logger
  private readonly credentials: Credentials
  private readonly cwd: string
  private readonly now: () => Date
  private agent: TaskAgent | undefined
  private state: TaskState = 'init'
  private running = false

  constructor(options: TaskControllerOptions) {
    super()
    this.config = options.config
    this.logger = options.logger ?? defaultLogger
    this.registry = options.registry ?? new AppRegistry(options.config.apps)
    this.launcher = options.launcher ?? createChromeLauncher({ logger: this.logger })
    this.loginSequencer =
      options.loginSequencer ??
      new LoginSequencer({
        settleDelayMs: options.config.login.settleDelayMs,
        checkIntervalMs: options.config.login.checkIntervalMs,
        logger: this.logger,
      })
    this.agent = options.agent
    this.cwd = options.cwd ?? process.cwd()
    this.now = options.now ?? (() => new Date())

    // Read once; a missing secret either warns here or throws MissingSecretError
    this.credentials = resolveCredentials(options.config.login, this.logger, options.env ?? process.env)
  }

  getState(): TaskState {
    return this.state
  }

  /**
   * Runs `task` against the application registered under `appKey`
   */
  async execute(appKey: string, task: string): Promise<CaptureResult> {
    if (this.running) {
      return { status: 'error', error: 'A task is already running on this controller' }
    }

    this.running = true
    this.state = 'init'
    let session: BrowserSession | undefined

    try {
      const app = this.registry.findApp(appKey)
      if (!app) {
        this.logger.error(`Unknown app: ${appKey}`)
        return { status: 'error', error: `Unknown app: ${appKey}` }
      }

      const agent = await this.resolveAgent()
      const run = this.createRun(app, task)

      this.logger.info(`Run ${run.id}: ${task}`)
      this.logger.debug(`Login identity "${run.credentials.identity}", secret ${maskSecret(run.credentials.secret)}`)

      this.transition('browser_starting')
      await mkdir(run.outputDir, { recursive: true })

      session = await this.launcher.launch({
        profileDir: run.profileDir,
        executablePath: this.config.browser.executablePath,
        headless: this.config.browser.headless,
        chromeFlags: this.config.browser.chromeFlags,
      })

      this.logger.debug(`Browser session ready at ${session.cdpUrl}`)

      const page = await session.getCurrentPage()
      if (!page) {
        this.logger.error('Browser page not accessible')
        return { status: 'error', error: 'Browser page not accessible' }
      }

      const sequencerRan = this.shouldRunSequencer(agent)
      run.login = sequencerRan ? await this.loginSequencer.login(page, app, run.credentials) : 'skipped'
      this.logger.info(`Login: ${run.login}`)

      this.transition('agent_running')
      const history = await this.runAgent(agent, session, run, sequencerRan)

      this.transition('artifact_extraction')
      await this.extractArtifacts(run, history, page)

      const manifest = await writeManifest(run, { now: this.now })
      this.transition('manifest_written')
      this.logger.info(`Manifest written to ${manifest}`)

      return {
        status: 'success',
        runId: run.id,
        app: app.name,
        screenshots: run.screenshots.length,
        outputDir: run.outputDir,
        manifest,
        chromeProfile: run.profileDir,
        timedOut: run.timedOut,
        login: run.login,
        usage: run.usage,
        cost: run.cost,
      }
    } catch (error) {
      this.logger.error(`Task failed: ${errorMessage(error)}`, error instanceof Error ? error.stack : '')
      return { status: 'error', error: errorMessage(error) }
    } finally {
      if (session) {
        await this.releaseSession(session)
      }
      this.transition('terminated')
      this.running = false
    }
  }

  private async resolveAgent(): Promise<TaskAgent> {
    if (!this.agent) {
      this.agent = await loadAgent(this.config.agent, this.cwd)
    }
    return this.agent
  }

  private createRun(app: AppProfile, task: string): TaskRun {
    const startedAt = this.now()
    const id = createRunId(startedAt)
    const profileDir = this.config.browser.profileDir
      ? resolve(this.cwd, this.config.browser.profileDir)
      : DEFAULT_PROFILE_DIR

    return {
      id,
      app,
      task,
      credentials: this.credentials,
      screenshots: [],
      usage: emptyUsage(),
      outputDir: resolve(this.cwd, this.config.outputDir, id),
      profileDir,
      startedAt,
      timedOut: false,
      login: 'skipped',
    }
  }

  private shouldRunSequencer(agent: TaskAgent): boolean {
    switch (this.config.login.mode) {
      case 'sequencer':
        return true
      case 'agent':
        return false
      case 'auto':
        return agent.handlesLogin !== true
    }
  }

  private async runAgent(
    agent: TaskAgent,
    session: BrowserSession,
    run: TaskRun,
    loginHandled: boolean,
  ): Promise<AgentHistory | undefined> {
    const instruction = buildAgentPrompt(run.app, run.task, run.credentials, {
      mfaWaitSeconds: this.config.login.agentMfaWaitSeconds,
      loginHandled,
    })
    const timeoutSeconds = run.app.complex ? this.config.timeouts.complexAgentSeconds : this.config.timeouts.agentSeconds

    this.logger.info(`Agent running (deadline ${timeoutSeconds}s)`)

    const outcome = await withTimeout(
      agent.run({ instruction, model: this.config.agent.model, session }),
      timeoutSeconds * 1000,
      (error) => this.logger.warn(`Abandoned agent run failed after the deadline: ${errorMessage(error)}`),
    )

    if (!outcome.timedOut) {
      this.transition('agent_done')
      return outcome.value
    }

    run.timedOut = true
    this.transition('agent_timed_out')
    this.logger.warn(`Agent did not finish within ${timeoutSeconds}s; extracting partial results`)

    try {
      return agent.partialHistory?.()
    } catch (error) {
      this.logger.warn(`Could not read partial agent history: ${errorMessage(error)}`)
      return undefined
    }
  }

  private async extractArtifacts(run: TaskRun, history: AgentHistory | undefined, page: BrowserPage): Promise<void> {
    const recorder = new ArtifactRecorder({ outputDir: run.outputDir, logger: this.logger, now: this.now })
    const { screenshots, usage } = await recorder.extract(history, page)

    run.screenshots = screenshots
    run.usage = addUsage(run.usage, usage)
    run.cost = this.config.cost.enabled ? estimateCost(run.usage, this.config.cost.pricing) : undefined

    screenshots.forEach((record) => this.emit('screenshot', record))
    this.logger.info(`Captured ${screenshots.length} screenshot(s)`)

    if (run.cost) {
      this.logger.info(
        `Tokens: ${run.usage.totalTokens} (input ${run.usage.inputTokens}, output ${run.usage.outputTokens}, cached ${run.usage.cachedTokens}); estimated cost $${run.cost.estimatedCostUsd.toFixed(4)}`,
      )
    }
  }

  /**
   * Closes the session within `timeouts.cleanupMs`. Failures are logged only.
   */
  private async releaseSession(session: BrowserSession): Promise<void> {
    const { cleanupMs } = this.config.timeouts

    try {
      const outcome = await withTimeout(session.close(), cleanupMs, (error) =>
        this.logger.warn(`Browser session closed with an error after the cleanup deadline: ${errorMessage(error)}`),
      )
      if (outcome.timedOut) {
        this.logger.warn(`Browser session did not close within ${cleanupMs}ms`)
      }
    } catch (error) {
      this.logger.warn(`Failed to close browser session: ${errorMessage(error)}`)
    }
  }

  private transition(to: TaskState): void {
    const from = this.state
    this.state = to
    this.logger.debug(`State ${from} -> ${to}`)
    this.emit('stateChange', from, to)
  }
}

export function createTaskController(options: TaskControllerOptions): TaskController {
  return new TaskController(options)
}

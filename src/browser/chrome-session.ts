import { launch, type LaunchedChrome } from 'chrome-launcher'
import CDP from 'chrome-remote-interface'
import { mkdir } from 'node:fs/promises'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'
import { sleep, withTimeout } from '../core/utils/timing'
import type { BrowserLauncher, BrowserLaunchOptions, BrowserPage, BrowserSession, NavigateOptions } from './types'

export class BrowserLaunchError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'BrowserLaunchError'
  }
}

export interface ChromePageOptions {
  /** Longest wait for the load event after a navigation */
  loadTimeoutMs?: number
  networkIdleMs?: number
  networkIdleTimeoutMs?: number
  pollIntervalMs?: number
}

/**
 * BrowserPage backed by a Chrome DevTools Protocol client
 */
export class ChromePage implements BrowserPage {
  private options: Required<ChromePageOptions>

  constructor(
    private readonly client: CDP.Client,
    options: ChromePageOptions = {},
    private readonly logger: Logger = defaultLogger,
  ) {
    this.options = {
      loadTimeoutMs: 30000,
      networkIdleMs: 500,
      networkIdleTimeoutMs: 10000,
      pollIntervalMs: 250,
      ...options,
    }
  }

  async navigate(url: string, options: NavigateOptions = {}): Promise<void> {
    const loaded = this.client.Page.loadEventFired()
    const { errorText } = await this.client.Page.navigate({ url })
    if (errorText) {
      throw new Error(`Navigation to ${url} failed: ${errorText}`)
    }

    const outcome = await withTimeout(loaded, this.options.loadTimeoutMs)
    if (outcome.timedOut) {
      throw new Error(`Navigation to ${url} did not finish loading within ${this.options.loadTimeoutMs}ms`)
    }

    if (options.waitForNetworkIdle) {
      await this.waitForNetworkIdle()
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    const focused = await this.evaluate(`(() => {
      const el = document.querySelector(${JSON.stringify(selector)})
      if (!el) return false
      el.scrollIntoView({ block: 'center' })
      el.focus()
      if (typeof el.select === 'function') el.select()
      return true
    })()`)

    if (focused !== true) {
      throw new Error(`Element not found: ${selector}`)
    }

    await this.client.Input.insertText({ text: value })
  }

  async click(selector: string): Promise<void> {
    const clicked = await this.evaluate(`(() => {
      const el = document.querySelector(${JSON.stringify(selector)})
      if (!el) return false
      el.scrollIntoView({ block: 'center' })
      el.click()
      return true
    })()`)

    if (clicked !== true) {
      throw new Error(`Element not found: ${selector}`)
    }
  }

  async evaluate(expression: string): Promise<unknown> {
    const { result, exceptionDetails } = await this.client.Runtime.evaluate({
      expression,
      returnByValue: true,
      awaitPromise: true,
    })

    if (exceptionDetails) {
      throw new Error(`Evaluation failed: ${exceptionDetails.exception?.description ?? exceptionDetails.text}`)
    }

    const value: unknown = result.value
    return value
  }

  async screenshot(): Promise<Buffer> {
    const { data } = await this.client.Page.captureScreenshot({ format: 'png' })
    return Buffer.from(data, 'base64')
  }

  /**
   * Treats the page as idle once the resource timing count has been stable for
   * `networkIdleMs`. Gives up quietly after `networkIdleTimeoutMs`.
   */
  private async waitForNetworkIdle(): Promise<void> {
    const deadline = Date.now() + this.options.networkIdleTimeoutMs
    let lastCount: unknown = undefined
    let stableSince = Date.now()

    while (Date.now() < deadline) {
      const count = await this.evaluate("performance.getEntriesByType('resource').length")
      const now = Date.now()

      if (count !== lastCount) {
        lastCount = count
        stableSince = now
      } else if (now - stableSince >= this.options.networkIdleMs) {
        return
      }

      await sleep(this.options.pollIntervalMs)
    }

    this.logger.debug(`Network did not settle within ${this.options.networkIdleTimeoutMs}ms, continuing`)
  }
}

class ChromeSession implements BrowserSession {
  private page: ChromePage

  constructor(
    private readonly chrome: LaunchedChrome,
    private readonly client: CDP.Client,
    readonly profileDir: string,
    private readonly logger: Logger,
    pageOptions: ChromePageOptions,
  ) {
    this.page = new ChromePage(client, pageOptions, logger)
  }

  get port(): number {
    return this.chrome.port
  }

  get cdpUrl(): string {
    return `http://127.0.0.1:${this.chrome.port}`
  }

  async getCurrentPage(): Promise<BrowserPage | undefined> {
    return this.page
  }

  async close(): Promise<void> {
    try {
      await this.client.close()
    } catch (error) {
      this.logger.warn(`Failed to close DevTools connection: ${error instanceof Error ? error.message : String(error)}`)
    }
    await this.chrome.kill()
    this.logger.debug(`Chrome instance on port ${this.chrome.port} stopped`)
  }
}

export interface ChromeLauncherOptions {
  logLevel?: 'silent' | 'error' | 'info' | 'verbose'
  page?: ChromePageOptions
  logger?: Logger
}

/**
 * Launches Chrome against a persistent profile directory so cookies and
 * sign-in state carry over between runs. One profile directory must not be
 * shared by two live sessions.
 */
export class ChromeLauncher implements BrowserLauncher {
  private options: Required<Omit<ChromeLauncherOptions, 'logger'>>
  private logger: Logger

  constructor(options: ChromeLauncherOptions = {}) {
    this.options = {
      logLevel: options.logLevel ?? 'error',
      page: options.page ?? {},
    }
    this.logger = options.logger ?? defaultLogger
  }

  async launch(options: BrowserLaunchOptions): Promise<BrowserSession> {
    await mkdir(options.profileDir, { recursive: true })

    const chromeFlags = options.headless ? [...options.chromeFlags, '--headless=new'] : options.chromeFlags

    let chrome: LaunchedChrome
    try {
      chrome = await launch({
        chromePath: options.executablePath,
        userDataDir: options.profileDir,
        chromeFlags,
        logLevel: this.options.logLevel,
      })
    } catch (error) {
      throw new BrowserLaunchError(
        `Failed to launch Chrome: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      )
    }

    this.logger.debug(`Chrome launched (port: ${chrome.port}, profile: ${options.profileDir})`)

    try {
      const client = await CDP({ port: chrome.port })
      await Promise.all([client.Page.enable(), client.Runtime.enable()])
      return new ChromeSession(chrome, client, options.profileDir, this.logger, this.options.page)
    } catch (error) {
      await chrome.kill()
      throw new BrowserLaunchError(
        `Failed to connect to Chrome on port ${chrome.port}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      )
    }
  }
}

export function createChromeLauncher(options?: ChromeLauncherOptions): ChromeLauncher {
  return new ChromeLauncher(options)
}

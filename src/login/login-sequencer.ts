import type { AppProfile, Credentials, LoginOutcome } from '../core/types'
import type { BrowserPage } from '../browser/types'
import type { Logger } from '../logger'
import { logger as defaultLogger } from '../logger'
import { sleep as defaultSleep } from '../core/utils/timing'

export interface LoginSequencerOptions {
  settleDelayMs?: number
  checkIntervalMs?: number
  logger?: Logger
  sleep?: (ms: number) => Promise<void>
}

/**
 * Expression that is true once both credential fields hold a value
 */
export function credentialFieldsFilledExpression(app: AppProfile): string {
  return `(() => {
    const read = (selector) => {
      const el = document.querySelector(selector)
      return el && typeof el.value === 'string' ? el.value.trim() : ''
    }
    return read(${JSON.stringify(app.emailSelector)}) !== '' && read(${JSON.stringify(app.passwordSelector)}) !== ''
  })()`
}

/**
 * Drives the login page up to the point where a human supplies the second
 * factor, then waits for it within the app's budget. Never throws.
 */
export class LoginSequencer {
  private settleDelayMs: number
  private checkIntervalMs: number
  private logger: Logger
  private sleep: (ms: number) => Promise<void>

  constructor(options: LoginSequencerOptions = {}) {
    this.settleDelayMs = options.settleDelayMs ?? 2000
    this.checkIntervalMs = options.checkIntervalMs ?? 2000
    this.logger = options.logger ?? defaultLogger
    this.sleep = options.sleep ?? defaultSleep
  }

  async login(page: BrowserPage, app: AppProfile, credentials: Credentials): Promise<LoginOutcome> {
    try {
      this.logger.info(`Opening ${app.name} login page: ${app.loginUrl}`)
      await page.navigate(app.loginUrl, { waitForNetworkIdle: true })
      await this.sleep(this.settleDelayMs)

      await page.fill(app.emailSelector, credentials.identity)
      this.logger.debug(`Filled identity field (${app.emailSelector})`)

      try {
        await page.click(app.submitSelector)
      } catch (error) {
        // Some apps ask for identity and secret on one screen
        this.logger.warn(
          `Could not click ${app.name} submit control: ${error instanceof Error ? error.message : String(error)}`,
        )
      }

      return await this.waitForSecondFactor(page, app)
    } catch (error) {
      this.logger.warn(`${app.name} login sequence failed: ${error instanceof Error ? error.message : String(error)}`)
      return 'failed'
    }
  }

  private async waitForSecondFactor(page: BrowserPage, app: AppProfile): Promise<LoginOutcome> {
    const budgetMs = app.mfaWaitSeconds * 1000
    const expression = credentialFieldsFilledExpression(app)

    this.logger.info(`Waiting up to ${app.mfaWaitSeconds}s for the second factor to be entered in the browser`)

    for (let waited = 0; waited < budgetMs; waited += this.checkIntervalMs) {
      const filled = await page.evaluate(expression)
      if (filled === true) {
        this.logger.info(`${app.name} credential fields are filled, continuing`)
        return 'verified'
      }
      await this.sleep(this.checkIntervalMs)
    }

    this.logger.warn(`${app.name} login not confirmed after ${app.mfaWaitSeconds}s, proceeding anyway`)
    return 'unverified'
  }
}

export interface NavigateOptions {
  /** Wait for the resource count to stop changing after the load event */
  waitForNetworkIdle?: boolean
}

/**
 * Live page handle. Selectors are plain CSS selectors resolved in the page.
 */
export interface BrowserPage {
  navigate(url: string, options?: NavigateOptions): Promise<void>
  fill(selector: string, value: string): Promise<void>
  click(selector: string): Promise<void>
  /** Evaluates an expression in the page and returns its JSON value */
  evaluate(expression: string): Promise<unknown>
  screenshot(): Promise<Buffer>
}

export interface BrowserSession {
  /** Remote debugging port, for agents that attach over CDP */
  readonly port: number
  readonly cdpUrl: string
  readonly profileDir: string
  getCurrentPage(): Promise<BrowserPage | undefined>
  close(): Promise<void>
}

export interface BrowserLaunchOptions {
  profileDir: string
  executablePath?: string
  headless: boolean
  chromeFlags: string[]
}

export interface BrowserLauncher {
  launch(options: BrowserLaunchOptions): Promise<BrowserSession>
}

export { ChromeLauncher, ChromePage, BrowserLaunchError, createChromeLauncher } from './chrome-session'
export type { ChromeLauncherOptions, ChromePageOptions } from './chrome-session'
export type { BrowserLauncher, BrowserLaunchOptions, BrowserPage, BrowserSession, NavigateOptions } from './types'

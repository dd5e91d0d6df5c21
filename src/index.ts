export { captureTask, createCaptureController } from './ui-capture'
export type { CaptureOptions, CaptureControllerOptions } from './api'

export * from './core'
export * from './capture'
export { AppRegistry, AppRegistryError, builtInApps, exampleTasks, detectApp } from './apps'
export { LoginSequencer, credentialFieldsFilledExpression } from './login/login-sequencer'
export type { LoginSequencerOptions } from './login/login-sequencer'
export { buildAgentPrompt, loadAgent, AgentLoadError } from './agent'
export type {
  AgentFactory,
  AgentFactoryOptions,
  AgentHistory,
  AgentRequest,
  AgentScreenshot,
  AgentUsage,
  TaskAgent,
} from './agent'
export { ChromeLauncher, ChromePage, BrowserLaunchError, createChromeLauncher } from './browser'
export type { BrowserLauncher, BrowserLaunchOptions, BrowserPage, BrowserSession } from './browser'
export { createLogger, maskSecret } from './logger'
export type { Logger, LogLevel } from './logger'

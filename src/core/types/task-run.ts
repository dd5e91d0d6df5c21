import type { AppProfile } from './app-profile'
import type { TokenUsage, CostEstimate } from './usage'

export interface Credentials {
  identity: string
  secret: string
}

// Verified: both fields held values before the wait budget ran out
export type LoginOutcome = 'verified' | 'unverified' | 'failed' | 'skipped'

export interface ScreenshotRecord {
  step: number // 0-based, contiguous per run
  name: string
  timestamp: string // ISO-8601
  file: string
}

export interface TaskRun {
  id: string
  app: AppProfile
  task: string
  credentials: Credentials
  screenshots: ScreenshotRecord[]
  usage: TokenUsage
  cost?: CostEstimate
  outputDir: string
  profileDir: string
  startedAt: Date
  timedOut: boolean
  login: LoginOutcome
}

export type TaskState =
  | 'init'
  | 'browser_starting'
  | 'agent_running'
  | 'agent_done'
  | 'agent_timed_out'
  | 'artifact_extraction'
  | 'manifest_written'
  | 'terminated'

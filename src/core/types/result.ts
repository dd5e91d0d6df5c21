import type { LoginOutcome } from './task-run'
import type { TokenUsage, CostEstimate } from './usage'

export interface CaptureSuccess {
  status: 'success'
  runId: string
  app: string
  screenshots: number
  outputDir: string
  manifest: string
  chromeProfile: string
  timedOut: boolean
  login: LoginOutcome
  usage?: TokenUsage
  cost?: CostEstimate
}

export interface CaptureError {
  status: 'error'
  error: string
}

export type CaptureResult = CaptureSuccess | CaptureError

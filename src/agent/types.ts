import type { BrowserSession } from '../browser/types'

/**
 * Token counts as reported by the agent's model client. Field names vary
 * between agents, so both camelCase and snake_case are accepted.
 */
export interface AgentUsage {
  inputTokens?: number
  outputTokens?: number
  cachedTokens?: number
  input_tokens?: number
  output_tokens?: number
  cached_tokens?: number
}

/** A captured screenshot: base64 text, raw bytes, or null for a step without one */
export type AgentScreenshot = string | Uint8Array | null

/**
 * Record of what the agent did during one run
 */
export interface AgentHistory {
  screenshots?(): AgentScreenshot[]
  usage?(): AgentUsage | undefined
}

export interface AgentRequest {
  instruction: string
  model: string
  session: BrowserSession
}

export interface TaskAgent {
  /** True when the agent performs the login itself from the instruction */
  readonly handlesLogin?: boolean
  run(request: AgentRequest): Promise<AgentHistory>
  /** History recorded so far, for use after the run was abandoned on timeout */
  partialHistory?(): AgentHistory | undefined
}

export interface AgentFactoryOptions {
  model: string
  options: Record<string, unknown>
}

export type AgentFactory = (options: AgentFactoryOptions) => TaskAgent | Promise<TaskAgent>

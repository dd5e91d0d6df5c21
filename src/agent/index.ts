export { buildAgentPrompt, type PromptOptions } from './prompt'
export { loadAgent, AgentLoadError } from './load-agent'
export type {
  AgentFactory,
  AgentFactoryOptions,
  AgentHistory,
  AgentRequest,
  AgentScreenshot,
  AgentUsage,
  TaskAgent,
} from './types'

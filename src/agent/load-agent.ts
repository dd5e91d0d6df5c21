import { resolve } from 'node:path'
import type { AgentConfig } from '../core/types'
import type { AgentFactory, TaskAgent } from './types'

export class AgentLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'AgentLoadError'
  }
}

function isAgentFactory(value: unknown): value is AgentFactory {
  return typeof value === 'function'
}

function isTaskAgent(value: unknown): value is TaskAgent {
  return typeof value === 'object' && value !== null && 'run' in value && typeof value.run === 'function'
}

/**
 * Resolves the module specifier: relative paths against cwd, anything else
 * as a package name.
 */
function resolveSpecifier(specifier: string, cwd: string): string {
  return specifier.startsWith('.') || specifier.startsWith('/') ? resolve(cwd, specifier) : specifier
}

/**
 * Loads the agent plugin named in config. The module must export
 * `createAgent(options)` (or a default export) returning a TaskAgent.
 */
export async function loadAgent(config: AgentConfig, cwd: string = process.cwd()): Promise<TaskAgent> {
  if (!config.module) {
    throw new AgentLoadError('No agent module configured (set agent.module or CAPTURE_AGENT_MODULE)')
  }

  const specifier = resolveSpecifier(config.module, cwd)

  let agentModule: unknown
  try {
    agentModule = await import(specifier)
  } catch (error) {
    throw new AgentLoadError(
      `Failed to load agent module ${config.module}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    )
  }

  const factory =
    typeof agentModule === 'object' && agentModule !== null
      ? 'createAgent' in agentModule
        ? agentModule.createAgent
        : 'default' in agentModule
          ? agentModule.default
          : undefined
      : undefined

  if (!isAgentFactory(factory)) {
    throw new AgentLoadError(`Agent module ${config.module} does not export a createAgent function`)
  }

  const agent: unknown = await factory({ model: config.model, options: config.options })

  if (!isTaskAgent(agent)) {
    throw new AgentLoadError(`Agent module ${config.module} returned an object without a run() method`)
  }

  return agent
}
